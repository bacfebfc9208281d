import { Router } from "express";
import { asyncHandler, errorMessage } from "../middleware/error.js";
import type { MealStore } from "../services/mealStore.js";
import type { HealthStatus } from "../types/contracts.js";

export async function checkHealth(store: MealStore | null): Promise<HealthStatus> {
  if (!store) {
    return { status: "error", message: "No database pool" };
  }

  try {
    await store.ping();
    return { status: "healthy", database: "connected" };
  } catch (error) {
    return { status: "error", message: errorMessage(error) };
  }
}

export function createHealthRoutes(context: { store: MealStore | null }) {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({ status: "online", message: "API is running" });
  });

  router.get("/health", asyncHandler(async (_req, res) => {
    res.json(await checkHealth(context.store));
  }));

  return router;
}
