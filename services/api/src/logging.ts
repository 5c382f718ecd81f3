import { configure, getLogger, reset } from "@logtape/logtape";
import type { LogLevel, LogRecord, Logger, Sink } from "@logtape/logtape";
import { context, trace } from "@opentelemetry/api";

export const ROOT_CATEGORY = "microtrace";
export const NO_REQUEST_ID = "-";

export interface LoggingOptions {
  level?: LogLevel;
  /** Receives one serialized record per call, newline included. Defaults to stdout. */
  write?: (line: string) => void;
}

let configPromise: Promise<void> | null = null;
let configured = false;

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    const seen = new WeakSet<object>();
    return JSON.stringify(value, (_key, val: unknown) => {
      if (typeof val === "object" && val !== null) {
        if (seen.has(val)) return "[Circular]";
        seen.add(val);
      }
      return typeof val === "bigint" ? val.toString() : val;
    });
  }
}

function formatMessage(record: LogRecord): string {
  return record.message.map((part) => (typeof part === "string" ? part : String(part))).join("");
}

export function createJsonSink(write: (line: string) => void): Sink {
  return (record: LogRecord) => {
    const { request_id: requestId, ...extra } = record.properties;
    const span = trace.getSpan(context.active());
    const spanCtx = span ? span.spanContext() : null;
    const payload = {
      asctime: new Date(record.timestamp).toISOString(),
      levelname: record.level.toUpperCase(),
      name: record.category.join("."),
      message: formatMessage(record),
      request_id: typeof requestId === "string" && requestId ? requestId : NO_REQUEST_ID,
      ...extra,
      trace_id: spanCtx ? spanCtx.traceId : "",
      span_id: spanCtx ? spanCtx.spanId : ""
    };
    write(safeStringify(payload) + "\n");
  };
}

/**
 * Installs the JSON sink for every `microtrace.*` logger. Only the first call
 * configures anything; later and concurrent calls resolve to the same result.
 */
export async function configureLogging(options: LoggingOptions = {}): Promise<void> {
  if (configured) return;
  if (configPromise) return configPromise;

  configPromise = doConfigureLogging(options)
    .then(() => {
      configured = true;
    })
    .catch((err: unknown) => {
      configPromise = null;
      throw err;
    });
  return configPromise;
}

async function doConfigureLogging(options: LoggingOptions): Promise<void> {
  const write = options.write ?? ((line: string) => process.stdout.write(line));

  await configure({
    sinks: { json: createJsonSink(write) },
    loggers: [
      { category: ["logtape", "meta"], lowestLevel: "warning", sinks: ["json"] },
      { category: [ROOT_CATEGORY], lowestLevel: options.level ?? "info", sinks: ["json"] }
    ]
  });
}

/** @internal Test teardown only. */
export async function resetLogging(): Promise<void> {
  await reset();
  configPromise = null;
  configured = false;
}

export function getAppLogger(...name: string[]): Logger {
  return getLogger([ROOT_CATEGORY, ...name]);
}

export type { Logger, LogLevel };
