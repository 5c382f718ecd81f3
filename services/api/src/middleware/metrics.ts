import type { ErrorRequestHandler, RequestHandler, Response } from "express";
import createError from "http-errors";
import { requestContextOf, withRequest } from "../context.js";
import { getAppLogger, type Logger } from "../logging.js";
import type { MetricCollectors } from "../metrics.js";

/** Status recorded when an undeclared error escapes the handler. */
export const FALLBACK_STATUS = 500;
/** Status recorded when the client closed the connection before the response finished. */
export const CLIENT_CLOSED_STATUS = 499;

export interface MetricsMiddleware {
  track: RequestHandler;
  recordErrors: ErrorRequestHandler;
}

interface InFlight {
  method: string;
  path: string;
  start: number;
  failure?: { error: unknown };
}

export function exceptionKind(error: unknown): string {
  return error instanceof Error ? error.constructor.name : typeof error;
}

export function statusForError(error: unknown): number {
  return createError.isHttpError(error) ? error.status : FALLBACK_STATUS;
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * `track` goes right after the request-id middleware; `recordErrors` goes after
 * every route. Counter, histogram and completion log are written once per
 * request when the response finishes or the connection closes.
 */
export function createMetricsMiddleware(
  collectors: MetricCollectors,
  logger: Logger = getAppLogger("request")
): MetricsMiddleware {
  const inFlight = new WeakMap<Response, InFlight>();

  const track: RequestHandler = (req, res, next) => {
    const entry: InFlight = { method: req.method, path: req.path, start: performance.now() };
    inFlight.set(res, entry);

    let finalized = false;
    const finalize = () => {
      if (finalized) return;
      finalized = true;

      const elapsed = (performance.now() - entry.start) / 1000;
      const status = entry.failure
        ? statusForError(entry.failure.error)
        : res.writableFinished
          ? res.statusCode
          : CLIENT_CLOSED_STATUS;

      collectors.requestCounter.labels({ method: entry.method, path: entry.path, status: String(status) }).inc();
      collectors.latencyHistogram.labels({ method: entry.method, path: entry.path }).observe(elapsed);
      withRequest(logger, requestContextOf(res)).info("request_completed", {
        method: entry.method,
        path: entry.path,
        status_code: status,
        elapsed_ms: round3(elapsed * 1000)
      });
    };

    res.once("finish", finalize);
    res.once("close", finalize);
    next();
  };

  const recordErrors: ErrorRequestHandler = (err, req, res, next) => {
    const entry = inFlight.get(res);
    const method = entry ? entry.method : req.method;
    const path = entry ? entry.path : req.path;
    if (entry) entry.failure = { error: err };

    collectors.errorCounter.labels({ method, path, exception: exceptionKind(err) }).inc();
    next(err);
  };

  return { track, recordErrors };
}
