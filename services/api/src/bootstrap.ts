import type { Express } from "express";
import type { SpanExporter } from "@opentelemetry/sdk-trace-node";
import type { Config } from "./config.js";
import { configureLogging, type LoggingOptions } from "./logging.js";
import { createCollectors, Registry } from "./metrics.js";
import { configureTracing, DEFAULT_EXCLUDED_PATHS, instrumentFramework, type TracingOptions } from "./tracing.js";
import { WorkerService } from "./worker.js";

type AppModule = typeof import("./app.js");

export interface BootstrapOptions {
  write?: LoggingOptions["write"];
  exporter?: SpanExporter;
  /** Loads the module that imports express. */
  loadApp?: () => Promise<AppModule>;
}

const loadAppModule = (): Promise<AppModule> => import("./app.js");

/**
 * Configures logging and tracing, and only then loads the application module,
 * so that express is imported after its instrumentation is registered.
 */
export async function bootstrap(config: Config, options: BootstrapOptions = {}): Promise<Express> {
  await configureLogging({ level: config.LOG_LEVEL, write: options.write });

  if (config.OTEL_ENABLED) {
    const tracing: TracingOptions = {
      serviceName: config.OTEL_SERVICE_NAME,
      serviceVersion: config.OTEL_SERVICE_VERSION,
      otlpEndpoint: config.OTEL_EXPORTER_OTLP_ENDPOINT,
      excludedPaths: DEFAULT_EXCLUDED_PATHS,
      exporter: options.exporter
    };
    configureTracing(tracing);
    instrumentFramework(tracing);
  }

  const { createApp } = await (options.loadApp ?? loadAppModule)();
  const registry = new Registry();
  return createApp({
    worker: new WorkerService({
      chaosEnabled: config.CHAOS_ENABLED,
      chaosProbability: config.CHAOS_PROBABILITY,
      cancellation: config.CHAOS_CANCELLATION
    }),
    registry,
    collectors: createCollectors(registry),
    serviceName: config.OTEL_SERVICE_NAME,
    requestIdHeader: config.REQUEST_ID_HEADER
  });
}
