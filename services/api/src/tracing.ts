import type { IncomingMessage } from "node:http";
import { context, diag, DiagConsoleLogger, DiagLogLevel, propagation, trace } from "@opentelemetry/api";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { registerInstrumentations } from "@opentelemetry/instrumentation";
import { ExpressInstrumentation } from "@opentelemetry/instrumentation-express";
import { HttpInstrumentation } from "@opentelemetry/instrumentation-http";
import { UndiciInstrumentation } from "@opentelemetry/instrumentation-undici";
import { resourceFromAttributes } from "@opentelemetry/resources";
import { BatchSpanProcessor, NodeTracerProvider, type SpanExporter } from "@opentelemetry/sdk-trace-node";
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from "@opentelemetry/semantic-conventions";
import { getAppLogger } from "./logging.js";

export interface TracingOptions {
  serviceName: string;
  serviceVersion?: string;
  /** Collector base URL; `/v1/traces` is appended. Falls back to the exporter's default. */
  otlpEndpoint?: string;
  /** Inbound paths that never get a server span. */
  excludedPaths?: string[];
  exporter?: SpanExporter;
}

export const DEFAULT_EXCLUDED_PATHS = ["/metrics", "/health"];

const MAX_QUEUE_SIZE = 2048;
const MAX_EXPORT_BATCH_SIZE = 512;
const SCHEDULED_DELAY_MS = 5_000;

const logger = getAppLogger("tracing");

let tracerProvider: NodeTracerProvider | null = null;
let frameworkInstrumented = false;
const disablers: Array<() => void> = [];

function pathOf(request: IncomingMessage): string {
  const url = request.url ?? "/";
  const query = url.indexOf("?");
  return query === -1 ? url : url.slice(0, query);
}

/** OTLP/HTTP traces URL for a collector base URL, with or without a trailing slash. */
export function tracesUrl(endpoint: string): string {
  return `${endpoint.replace(/\/+$/, "")}/v1/traces`;
}

/**
 * Builds and registers the process tracer provider together with HTTP
 * instrumentation (inbound server requests, outbound `http` and `fetch` calls).
 * Repeated calls return the provider from the first call untouched.
 */
export function configureTracing(options: TracingOptions): NodeTracerProvider {
  if (tracerProvider) return tracerProvider;

  diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.WARN);

  const exporter =
    options.exporter ??
    new OTLPTraceExporter(options.otlpEndpoint ? { url: tracesUrl(options.otlpEndpoint) } : {});

  const provider = new NodeTracerProvider({
    resource: resourceFromAttributes({
      [ATTR_SERVICE_NAME]: options.serviceName,
      [ATTR_SERVICE_VERSION]: options.serviceVersion ?? "0.0.0"
    }),
    spanProcessors: [
      new BatchSpanProcessor(exporter, {
        maxQueueSize: MAX_QUEUE_SIZE,
        maxExportBatchSize: MAX_EXPORT_BATCH_SIZE,
        scheduledDelayMillis: SCHEDULED_DELAY_MS
      })
    ]
  });
  provider.register();

  const excluded = new Set(options.excludedPaths ?? DEFAULT_EXCLUDED_PATHS);
  disablers.push(
    registerInstrumentations({
      tracerProvider: provider,
      instrumentations: [
        new HttpInstrumentation({
          ignoreIncomingRequestHook: (request) => excluded.has(pathOf(request))
        }),
        new UndiciInstrumentation()
      ]
    })
  );

  tracerProvider = provider;
  logger.info("tracing_initialized", { service: options.serviceName });
  return provider;
}

/** Adds Express route and middleware spans. Configures tracing first when needed. */
export function instrumentFramework(options: TracingOptions): void {
  if (frameworkInstrumented) return;

  const provider = configureTracing(options);
  disablers.push(
    registerInstrumentations({
      tracerProvider: provider,
      instrumentations: [new ExpressInstrumentation()]
    })
  );
  frameworkInstrumented = true;
}

export function isFrameworkInstrumented(): boolean {
  return frameworkInstrumented;
}

/**
 * Flushes pending spans, removes the instrumentations and unregisters the
 * global provider so that tracing can be configured again.
 */
export async function shutdownTracing(): Promise<void> {
  const provider = tracerProvider;
  tracerProvider = null;
  frameworkInstrumented = false;

  for (const disable of disablers.splice(0)) disable();
  if (!provider) return;

  try {
    await provider.shutdown();
  } finally {
    trace.disable();
    context.disable();
    propagation.disable();
  }
}
