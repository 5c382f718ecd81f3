import { STATUS_CODES } from "node:http";
import type { ErrorRequestHandler } from "express";
import createError from "http-errors";

/**
 * Answers declared HTTP errors as `{ detail }` JSON. Anything else is passed on
 * to Express's default error handler.
 */
export const declaredErrorHandler: ErrorRequestHandler = (err, _req, res, next) => {
  if (!createError.isHttpError(err) || res.headersSent) {
    next(err);
    return;
  }

  res.status(err.status).json({ detail: err.expose ? err.message : STATUS_CODES[err.status] });
};
