import "dotenv/config";
import { initEnv } from "./config/env.js";
import { logger } from "./utils/logger.js";
import { errorMessage } from "./middleware/error.js";
import { createAppContext } from "./context.js";
import { createApp } from "./app.js";

const env = initEnv();

logger.info({ msg: "Starting application" });

const context = await createAppContext(env, logger);
const app = createApp(context);

const server = app.listen(env.PORT, () => {
  logger.info({
    msg: "Server started",
    port: env.PORT,
    environment: env.NODE_ENV,
    datastore: context.store ? "connected" : "disabled",
  });
});

function gracefulShutdown(signal: string) {
  logger.info({
    msg: "Graceful shutdown initiated",
    signal,
  });

  setTimeout(() => {
    logger.error({
      msg: "Forced shutdown after timeout",
    });
    process.exit(1);
  }, 10000).unref();

  server.close((err) => {
    if (err) {
      logger.error({
        msg: "Error during shutdown",
        error: err.message,
      });
      process.exit(1);
    }

    context
      .close()
      .then(() => {
        logger.info({
          msg: "Server closed gracefully",
        });
        process.exit(0);
      })
      .catch((closeError: unknown) => {
        logger.error({
          msg: "Error closing database pool",
          error: errorMessage(closeError),
        });
        process.exit(1);
      });
  });
}

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));

export default app;
