import type { Response } from "express";
import type { Logger } from "./logging.js";

/** Per-request values threaded explicitly from the request-id middleware downwards. */
export interface RequestContext {
  readonly requestId: string;
  /** Aborts when the client goes away before the response finished. */
  readonly signal: AbortSignal;
}

declare global {
  namespace Express {
    interface Locals {
      requestContext?: RequestContext;
    }
  }
}

export function requestContextOf(res: Response): RequestContext | undefined {
  return res.locals.requestContext;
}

export function withRequest(logger: Logger, ctx: RequestContext | undefined): Logger {
  return ctx ? logger.with({ request_id: ctx.requestId }) : logger;
}
