import { setTimeout as delay } from "node:timers/promises";
import { SpanStatusCode, trace } from "@opentelemetry/api";
import { type RequestContext, withRequest } from "./context.js";
import { getAppLogger, type Logger } from "./logging.js";

export interface AnalysisResult {
  readonly sum: number;
  readonly difference: number;
}

export interface Analyzer {
  analyze(a: number, b: number, ctx?: RequestContext): Promise<AnalysisResult>;
}

/**
 * What happens to an in-flight chaos delay when the client disconnects:
 * `ignore` lets it run out, `abort` rejects it with an AbortError.
 */
export type ChaosCancellation = "ignore" | "abort";

export interface WorkerOptions {
  chaosEnabled?: boolean;
  chaosProbability?: number;
  chaosMinDelayMs?: number;
  chaosMaxDelayMs?: number;
  baseDelayMs?: number;
  cancellation?: ChaosCancellation;
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  logger?: Logger;
}

export const CHAOS_PROBABILITY = 0.05;
export const CHAOS_MIN_DELAY_MS = 100;
export const CHAOS_MAX_DELAY_MS = 200;
export const BASE_DELAY_MS = 10;

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return delay(ms, undefined, signal ? { signal } : undefined);
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export class WorkerService implements Analyzer {
  private readonly chaosEnabled: boolean;
  private readonly chaosProbability: number;
  private readonly chaosMinDelayMs: number;
  private readonly chaosMaxDelayMs: number;
  private readonly baseDelayMs: number;
  private readonly cancellation: ChaosCancellation;
  private readonly random: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly logger: Logger;
  private readonly tracer = trace.getTracer("microtrace.worker");

  constructor(options: WorkerOptions = {}) {
    this.chaosEnabled = options.chaosEnabled ?? false;
    this.chaosProbability = options.chaosProbability ?? CHAOS_PROBABILITY;
    this.chaosMinDelayMs = options.chaosMinDelayMs ?? CHAOS_MIN_DELAY_MS;
    this.chaosMaxDelayMs = options.chaosMaxDelayMs ?? CHAOS_MAX_DELAY_MS;
    this.baseDelayMs = options.baseDelayMs ?? BASE_DELAY_MS;
    this.cancellation = options.cancellation ?? "ignore";
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? getAppLogger("worker");
  }

  async analyze(a: number, b: number, ctx?: RequestContext): Promise<AnalysisResult> {
    const log = withRequest(this.logger, ctx);

    return this.tracer.startActiveSpan("WorkerService.analyze", async (span) => {
      try {
        span.setAttribute("worker.input_a", a);
        span.setAttribute("worker.input_b", b);

        // Simulated work so timings show up in metrics and traces.
        await this.sleep(this.baseDelayMs);

        span.setAttribute("worker.chaos_enabled", this.chaosEnabled);
        if (this.chaosEnabled && this.random() < this.chaosProbability) {
          const delayMs = this.chaosMinDelayMs + this.random() * (this.chaosMaxDelayMs - this.chaosMinDelayMs);
          span.setAttribute("worker.chaos_delay_ms", round3(delayMs));
          log.info("chaos_injected", { delay_ms: round3(delayMs), probability: this.chaosProbability });
          await this.sleep(delayMs, this.cancellation === "abort" ? ctx?.signal : undefined);
        }

        const result: AnalysisResult = Object.freeze({ sum: a + b, difference: a - b });
        span.setAttribute("worker.sum", result.sum);
        span.setAttribute("worker.difference", result.difference);
        log.debug("analysis_completed", { input_a: a, input_b: b, sum: result.sum });
        return result;
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        span.recordException(error);
        span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
        throw err;
      } finally {
        span.end();
      }
    });
  }
}
