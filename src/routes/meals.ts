import { Router } from "express";
import { asyncHandler } from "../middleware/error.js";
import { searchMeals } from "../services/mealSearch.js";
import { addMeal, parseNewMeal } from "../services/mealWriter.js";
import type { AppContext } from "../context.js";

export function createMealRoutes(context: Pick<AppContext, "mealDb" | "store" | "logger">) {
  const router = Router();

  router.get("/meals/:term", asyncHandler(async (req, res) => {
    const result = await searchMeals(req.params.term ?? "", {
      mealDb: context.mealDb,
      store: context.store,
      logger: context.logger
    });
    res.json(result);
  }));

  // Express matches "/add_meal/" here as well
  router.post("/add_meal", asyncHandler(async (req, res) => {
    const meal = parseNewMeal(req.body);
    const ack = await addMeal(meal, context.store);
    context.logger.info({ msg: "Meal insert", name: meal.name, inserted: ack.inserted });
    res.json(ack);
  }));

  return router;
}
