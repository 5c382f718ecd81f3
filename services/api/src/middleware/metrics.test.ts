import express, { type Express } from "express";
import createError from "http-errors";
import { Registry } from "prom-client";
import request from "supertest";
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { requestContextOf } from "../context.js";
import { configureLogging, resetLogging } from "../logging.js";
import { createCollectors } from "../metrics.js";
import { captureLines, seriesTotal } from "../test-helpers.js";
import { declaredErrorHandler } from "./errors.js";
import { createMetricsMiddleware, exceptionKind, statusForError } from "./metrics.js";
import { requestIdMiddleware } from "./request-id.js";

function instrumentedApp(registry: Registry, onHang: (signal: AbortSignal | undefined) => void = () => {}) {
  const app = express();
  const metrics = createMetricsMiddleware(createCollectors(registry));

  app.use(requestIdMiddleware());
  app.use(metrics.track);
  app.get("/ok", (_req, res) => {
    res.json({ ok: true });
  });
  app.get("/missing", () => {
    throw createError(404, "nothing here");
  });
  app.get("/broken", () => {
    throw new TypeError("cannot read");
  });
  app.get("/unavailable", () => {
    throw Object.assign(new RangeError("busy"), { status: 503 });
  });
  app.get("/hang", (_req, res) => {
    onHang(requestContextOf(res)?.signal);
  });
  app.use(metrics.recordErrors);
  app.use(declaredErrorHandler);
  return app;
}

describe("createMetricsMiddleware", () => {
  const capture = captureLines();
  let registry: Registry;
  let app: Express;

  beforeAll(async () => {
    await configureLogging({ write: capture.write });
  });

  afterAll(async () => {
    await resetLogging();
  });

  beforeEach(() => {
    capture.lines.length = 0;
    registry = new Registry();
    app = instrumentedApp(registry);
  });

  it("counts a successful request with its status", async () => {
    await request(app).get("/ok").expect(200);

    await vi.waitFor(async () => {
      expect(await seriesTotal(registry, "requests_total", { method: "GET", path: "/ok", status: "200" })).toBe(1);
    });
    expect(await seriesTotal(registry, "request_latency_seconds_count", { method: "GET", path: "/ok" })).toBe(1);
    expect(await seriesTotal(registry, "errors_total")).toBe(0);
  });

  it("labels a declared error with its own status and kind", async () => {
    const res = await request(app).get("/missing");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ detail: "nothing here" });
    await vi.waitFor(async () => {
      expect(await seriesTotal(registry, "requests_total", { path: "/missing", status: "404" })).toBe(1);
    });
    expect(await seriesTotal(registry, "errors_total", { method: "GET", path: "/missing", exception: "NotFoundError" })).toBe(1);
    expect(await seriesTotal(registry, "request_latency_seconds_count", { path: "/missing" })).toBe(1);
  });

  it("records an undeclared error once in every collector as a 500", async () => {
    const res = await request(app).get("/broken");

    expect(res.status).toBe(500);
    await vi.waitFor(async () => {
      expect(await seriesTotal(registry, "requests_total", { path: "/broken" })).toBe(1);
    });
    expect(await seriesTotal(registry, "requests_total", { path: "/broken", status: "500" })).toBe(1);
    expect(await seriesTotal(registry, "request_latency_seconds_count", { path: "/broken" })).toBe(1);
    expect(await seriesTotal(registry, "errors_total", { path: "/broken", exception: "TypeError" })).toBe(1);
    expect(await seriesTotal(registry, "errors_total")).toBe(1);
  });

  it("uses the fallback status for undeclared errors whatever the response says", async () => {
    const res = await request(app).get("/unavailable");

    expect(res.status).toBe(503);
    await vi.waitFor(async () => {
      expect(await seriesTotal(registry, "requests_total", { path: "/unavailable", status: "500" })).toBe(1);
    });
    expect(await seriesTotal(registry, "errors_total", { exception: "RangeError" })).toBe(1);
  });

  it("keeps counter and histogram totals equal to the number of requests", async () => {
    const paths = ["/ok", "/broken", "/ok", "/missing", "/ok", "/broken", "/ok"];
    for (const path of paths) await request(app).get(path);

    await vi.waitFor(async () => {
      expect(await seriesTotal(registry, "requests_total")).toBe(paths.length);
    });
    expect(await seriesTotal(registry, "request_latency_seconds_count")).toBe(paths.length);
    expect(await seriesTotal(registry, "requests_total", { path: "/ok" })).toBe(4);
    expect(await seriesTotal(registry, "errors_total")).toBe(3);
  });

  it("records a request the client abandoned as 499", async () => {
    let signal: AbortSignal | undefined;
    app = instrumentedApp(registry, (received) => {
      signal = received;
    });

    await expect(request(app).get("/hang").timeout(100)).rejects.toThrow("Timeout");

    await vi.waitFor(async () => {
      expect(await seriesTotal(registry, "requests_total", { method: "GET", path: "/hang", status: "499" })).toBe(1);
    });
    expect(await seriesTotal(registry, "requests_total", { path: "/hang" })).toBe(1);
    expect(await seriesTotal(registry, "request_latency_seconds_count", { path: "/hang" })).toBe(1);
    expect(await seriesTotal(registry, "errors_total")).toBe(0);
    expect(signal?.aborted).toBe(true);
  });

  it("logs one completion record carrying the request id", async () => {
    await request(app).get("/missing").set("X-Request-ID", "abc-123");

    await vi.waitFor(() => {
      expect(capture.records().filter((record) => record.message === "request_completed")).toHaveLength(1);
    });
    const [completed] = capture.records().filter((record) => record.message === "request_completed");
    expect(completed).toMatchObject({
      name: "microtrace.request",
      levelname: "INFO",
      request_id: "abc-123",
      method: "GET",
      path: "/missing",
      status_code: 404
    });
    expect(typeof completed.elapsed_ms).toBe("number");
    expect(Number(completed.elapsed_ms)).toBe(Math.round(Number(completed.elapsed_ms) * 1000) / 1000);
  });
});

describe("exceptionKind", () => {
  it("names errors after their class", () => {
    expect(exceptionKind(new TypeError("x"))).toBe("TypeError");
    expect(exceptionKind(createError(422))).toBe("UnprocessableEntityError");
  });

  it("falls back to the value's type for thrown non-errors", () => {
    expect(exceptionKind("oops")).toBe("string");
    expect(exceptionKind(undefined)).toBe("undefined");
  });
});

describe("statusForError", () => {
  it("uses the status of declared errors", () => {
    expect(statusForError(createError(409))).toBe(409);
  });

  it("falls back to 500 for anything else", () => {
    expect(statusForError(new Error("x"))).toBe(500);
  });
});
