import express from "express";
import type { AppContext } from "./context.js";
import { createHelmet } from "./middleware/helmet.js";
import { createCors } from "./middleware/cors.js";
import { requestLog } from "./middleware/requestLog.js";
import { createErrorHandler, notFoundHandler } from "./middleware/error.js";
import { createHealthRoutes } from "./routes/health.js";
import { createMealRoutes } from "./routes/meals.js";

export type AppDeps = Pick<AppContext, "env" | "logger" | "mealDb" | "store">;

export function createApp(context: AppDeps) {
  const app = express();

  app.disable("x-powered-by");
  app.use(express.json({ limit: "256kb" }));

  app.use(createHelmet(context.env));
  app.use(createCors(context.env));
  app.use(requestLog(context.logger));

  app.use(createHealthRoutes(context));
  app.use(createMealRoutes(context));

  app.use(notFoundHandler);
  app.use(createErrorHandler(context.logger));

  return app;
}
