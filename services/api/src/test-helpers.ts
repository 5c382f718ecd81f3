import type { Registry } from "prom-client";

/**
 * Sums every sample of `series` whose labels include `labels`. Histogram
 * series are addressed by their suffixed name, e.g. `request_latency_seconds_count`.
 */
export async function seriesTotal(
  registry: Registry,
  series: string,
  labels: Record<string, string> = {}
): Promise<number> {
  let total = 0;
  for (const metric of await registry.getMetricsAsJSON()) {
    for (const sample of metric.values) {
      const name = "metricName" in sample && typeof sample.metricName === "string" ? sample.metricName : metric.name;
      if (name !== series) continue;
      const matches = Object.entries(labels).every(([key, expected]) => String(sample.labels[key]) === expected);
      if (matches) total += sample.value;
    }
  }
  return total;
}

export function captureLines(): { lines: string[]; records: () => Array<Record<string, unknown>>; write: (line: string) => void } {
  const lines: string[] = [];
  return {
    lines,
    records: () => lines.map((line) => JSON.parse(line)),
    write: (line) => {
      lines.push(line);
    }
  };
}
