import { randomUUID } from "node:crypto";
import type { RequestHandler } from "express";
import { trace } from "@opentelemetry/api";

export const DEFAULT_REQUEST_ID_HEADER = "X-Request-ID";

export interface RequestIdOptions {
  headerName?: string;
  generate?: () => string;
}

/**
 * Reuses the caller's request id or mints a UUID, echoes it on the response
 * before anything downstream runs, and publishes it as `res.locals.requestContext`.
 */
export function requestIdMiddleware(options: RequestIdOptions = {}): RequestHandler {
  const headerName = options.headerName ?? DEFAULT_REQUEST_ID_HEADER;
  const generate = options.generate ?? randomUUID;

  return (req, res, next) => {
    const incoming = req.get(headerName);
    const requestId = incoming && incoming.trim() ? incoming : generate();
    const controller = new AbortController();

    res.setHeader(headerName, requestId);
    res.locals.requestContext = { requestId, signal: controller.signal };
    res.once("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    trace.getActiveSpan()?.setAttribute("http.request_id", requestId);
    next();
  };
}
