import { z } from "zod";
import { AppError, errorMessage } from "../middleware/error.js";
import type { MealStore } from "./mealStore.js";
import type { AddMealAck, NewMeal } from "../types/contracts.js";

const optionalText = (fallback: string) =>
  z.string().trim().nullish().transform((value) => value || fallback);

const ingredientsSchema = z
  .union([z.array(z.string()), z.string()])
  .nullish()
  .transform((value) => {
    const items = typeof value === "string" ? value.split(",") : value ?? [];
    return items.map((item) => item.trim()).filter((item) => item.length > 0);
  });

export const newMealSchema = z.object({
  name: z.string().trim().min(1, "name is required"),
  category: optionalText("Miscellaneous"),
  area: optionalText("Unknown"),
  instructions: optionalText(""),
  ingredients: ingredientsSchema,
  images: optionalText(""),
  minutes: z.coerce.number().int().min(0).nullish().transform((value) => value ?? null)
});

/** Throws ZodError for an invalid body; the error middleware turns it into a 400. */
export function parseNewMeal(body: unknown): NewMeal {
  return newMealSchema.parse(body ?? {});
}

/**
 * Inserts a meal unless one with the same name exists. A duplicate is
 * acknowledged with `inserted: false` rather than rejected.
 */
export async function addMeal(meal: NewMeal, store: MealStore | null): Promise<AddMealAck> {
  if (!store) {
    throw new AppError("Database not available", 500, "database_unavailable");
  }

  const outcome = await store.insert(meal).catch((error: unknown) => {
    throw new AppError(`Failed to add meal: ${errorMessage(error)}`, 500, "database_error");
  });

  return {
    status: "ok",
    message: outcome.inserted ? "Meal added" : "Meal already exists",
    inserted: outcome.inserted,
    idMeal: outcome.id
  };
}
