import { z } from "zod";
import { errorMessage } from "../middleware/error.js";
import type { Meal, SourceResult } from "../types/contracts.js";

type FetchLike = typeof fetch;

export type MealDbOptions = {
  apiURL: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
};

export type MealDbClient = {
  search(term: string): Promise<SourceResult>;
};

const DEFAULT_TIMEOUT_MS = 10_000;
const MAX_INGREDIENT_COLUMNS = 20;

const nullableText = z.string().nullish().transform((value) => value ?? null);

const mealDbMealSchema = z
  .object({
    idMeal: z.union([z.string(), z.number()]).transform(String),
    strMeal: z.string(),
    strCategory: nullableText,
    strArea: nullableText,
    strInstructions: nullableText,
    strMealThumb: nullableText,
    strTags: nullableText,
    strYoutube: nullableText
  })
  .passthrough();

const mealDbResponseSchema = z.object({
  meals: z.array(z.unknown()).nullable()
});

export function createMealDbClient(options: MealDbOptions): MealDbClient {
  const fetchImpl = options.fetchImpl ?? fetch;
  const timeoutMs = normalizeTimeout(options.timeoutMs);

  return {
    async search(term: string): Promise<SourceResult> {
      const endpoint = new URL(options.apiURL);
      endpoint.searchParams.set("s", term);

      try {
        const data = await fetchJSON(endpoint.toString(), fetchImpl, timeoutMs);
        return { ok: true, meals: parseMealDbResponse(data) };
      } catch (error) {
        return { ok: false, meals: [], error: `MealDB API error: ${errorMessage(error)}` };
      }
    }
  };
}

/**
 * Converts a TheMealDB search payload into unified meals. `{ meals: null }`
 * is TheMealDB's "no match" answer; entries without an id or a name are skipped.
 */
export function parseMealDbResponse(payload: unknown): Meal[] {
  const parsed = mealDbResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error("Unexpected MealDB response shape");
  }

  return (parsed.data.meals ?? [])
    .map((raw) => mapMealDbMeal(raw))
    .filter((meal): meal is Meal => meal !== null);
}

function mapMealDbMeal(raw: unknown): Meal | null {
  const parsed = mealDbMealSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  const meal = parsed.data;
  if (!meal.idMeal.trim() || !meal.strMeal.trim()) {
    return null;
  }

  const { ingredients, measures } = collectIngredientColumns(meal);
  return {
    idMeal: meal.idMeal,
    strMeal: meal.strMeal,
    strCategory: meal.strCategory,
    strArea: meal.strArea,
    strInstructions: meal.strInstructions,
    strMealThumb: meal.strMealThumb,
    strIngredients: ingredients,
    strMeasures: measures,
    strTags: splitTags(meal.strTags),
    strYoutube: meal.strYoutube?.trim() || null,
    source: "MealDB"
  };
}

// TheMealDB spreads ingredients over strIngredient1..strIngredient20 and their
// measures over strMeasure1..strMeasure20, blanks included.
function collectIngredientColumns(meal: Record<string, unknown>): { ingredients: string[]; measures: string[] } {
  const ingredients: string[] = [];
  const measures: string[] = [];
  for (let index = 1; index <= MAX_INGREDIENT_COLUMNS; index += 1) {
    const value = meal[`strIngredient${index}`];
    if (typeof value === "string" && value.trim()) {
      const measure = meal[`strMeasure${index}`];
      ingredients.push(value.trim());
      measures.push(typeof measure === "string" ? measure.trim() : "");
    }
  }
  return { ingredients, measures };
}

function splitTags(tags: string | null): string[] {
  if (!tags) return [];
  return tags
    .split(",")
    .map((tag) => tag.trim())
    .filter(Boolean);
}

async function fetchJSON(url: string, fetchImpl: FetchLike, timeoutMs: number): Promise<unknown> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetchImpl(url, {
      method: "GET",
      headers: { Accept: "application/json" },
      signal: controller.signal
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }

    return await response.json();
  } catch (error) {
    if (controller.signal.aborted) {
      throw new Error(`timed out after ${timeoutMs}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timeout);
  }
}

function normalizeTimeout(timeoutMs: number | undefined): number {
  if (typeof timeoutMs !== "number" || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return DEFAULT_TIMEOUT_MS;
  }
  return Math.floor(timeoutMs);
}
