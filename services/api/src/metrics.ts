import { Counter, Histogram, Registry } from "prom-client";

export interface MetricCollectors {
  requestCounter: Counter<"method" | "path" | "status">;
  latencyHistogram: Histogram<"method" | "path">;
  errorCounter: Counter<"method" | "path" | "exception">;
}

export function createCollectors(registry: Registry): MetricCollectors {
  return {
    requestCounter: new Counter({
      name: "requests_total",
      help: "Total number of HTTP requests processed.",
      labelNames: ["method", "path", "status"] as const,
      registers: [registry]
    }),
    latencyHistogram: new Histogram({
      name: "request_latency_seconds",
      help: "Request latency in seconds.",
      labelNames: ["method", "path"] as const,
      registers: [registry]
    }),
    errorCounter: new Counter({
      name: "errors_total",
      help: "Total number of exceptions raised by requests.",
      labelNames: ["method", "path", "exception"] as const,
      registers: [registry]
    })
  };
}

export { Registry };
