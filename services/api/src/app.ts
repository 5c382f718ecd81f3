import express, { type Express, type Request, type Response } from "express";
import type { Registry } from "prom-client";
import { z } from "zod";
import { requestContextOf, withRequest } from "./context.js";
import { getAppLogger } from "./logging.js";
import type { MetricCollectors } from "./metrics.js";
import { declaredErrorHandler } from "./middleware/errors.js";
import { createMetricsMiddleware } from "./middleware/metrics.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import type { Analyzer } from "./worker.js";

export interface AppDependencies {
  worker: Analyzer;
  registry: Registry;
  collectors: MetricCollectors;
  serviceName?: string;
  requestIdHeader?: string;
}

export const analyzeRequestSchema = z.object({
  a: z.number().finite(),
  b: z.number().finite()
});

const logger = getAppLogger("api");

export function createApp(deps: AppDependencies): Express {
  const app = express();
  const metrics = createMetricsMiddleware(deps.collectors);
  const serviceName = deps.serviceName ?? "microtrace";

  app.use(requestIdMiddleware({ headerName: deps.requestIdHeader }));
  app.use(metrics.track);
  app.use(express.json());

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", service: serviceName });
  });

  app.post("/analyze", async (req: Request, res: Response) => {
    const ctx = requestContextOf(res);
    const log = withRequest(logger, ctx);
    const parsed = analyzeRequestSchema.safeParse(req.body);

    if (!parsed.success) {
      res.status(422).json({
        detail: parsed.error.issues.map((issue) => ({
          loc: ["body", ...issue.path],
          msg: issue.message,
          type: issue.code
        }))
      });
      return;
    }

    const { a, b } = parsed.data;
    log.info("analyze_request", { input_a: a, input_b: b });
    const result = await deps.worker.analyze(a, b, ctx);
    log.info("analyze_response", { sum: result.sum, difference: result.difference });
    res.json({ sum: result.sum, difference: result.difference });
  });

  app.get("/metrics", async (_req: Request, res: Response) => {
    res.set("Content-Type", deps.registry.contentType);
    res.end(await deps.registry.metrics());
  });

  app.use(metrics.recordErrors);
  app.use(declaredErrorHandler);

  return app;
}
