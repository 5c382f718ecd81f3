import { bootstrap } from "./bootstrap.js";
import { loadConfig } from "./config.js";
import { getAppLogger } from "./logging.js";
import { shutdownTracing } from "./tracing.js";

const config = loadConfig();
const app = await bootstrap(config);
const logger = getAppLogger("api");

const server = app.listen(config.PORT, () => {
  logger.info("server_started", { port: config.PORT, chaos_enabled: config.CHAOS_ENABLED });
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info("server_stopping", { signal });

  await new Promise<void>((resolve) => server.close(() => resolve()));
  try {
    await shutdownTracing();
  } catch (err) {
    logger.error("tracing_shutdown_failed", { error: err instanceof Error ? err.message : String(err) });
  }
  process.exit(0);
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
