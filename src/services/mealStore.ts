import { z } from "zod";
import type { SqlClient } from "./database.js";
import type { InsertOutcome, Meal, NewMeal } from "../types/contracts.js";

export interface MealStore {
  search(term: string): Promise<Meal[]>;
  insert(meal: NewMeal): Promise<InsertOutcome>;
  ping(): Promise<void>;
}

const MEALS_TABLE = "extra_meals";

const SEARCH_SQL = `
  SELECT id, name, category, area, instructions, images, ingredients, minutes,
    CASE WHEN LOWER(name) = LOWER($1) THEN 1 ELSE 2 END AS match_priority
  FROM ${MEALS_TABLE}
  WHERE LOWER(name) LIKE LOWER($2) ESCAPE '\\'
  ORDER BY match_priority ASC, name ASC
`;

const INSERT_SQL = `
  INSERT INTO ${MEALS_TABLE} (name, category, area, instructions, ingredients, images, minutes)
  VALUES ($1, $2, $3, $4, $5, $6, $7)
  ON CONFLICT (name) DO NOTHING
  RETURNING id
`;

const idSchema = z.union([z.number(), z.string()]).transform(String);

const mealRowSchema = z.object({
  id: idSchema,
  name: z.string(),
  category: z.string().nullish(),
  area: z.string().nullish(),
  instructions: z.string().nullish(),
  images: z.string().nullish(),
  ingredients: z.union([z.string(), z.array(z.string())]).nullish(),
  minutes: z.union([z.number(), z.string()]).nullish()
});

const insertedRowSchema = z.object({ id: idSchema });

export type MealRow = z.input<typeof mealRowSchema>;

export class PostgresMealStore implements MealStore {
  constructor(private readonly db: SqlClient) {}

  async search(term: string): Promise<Meal[]> {
    const result = await this.db.query(SEARCH_SQL, [term, `%${escapeLikePattern(term)}%`]);
    return result.rows
      .map((row) => normalizeMealRow(row))
      .filter((meal): meal is Meal => meal !== null);
  }

  async insert(meal: NewMeal): Promise<InsertOutcome> {
    const result = await this.db.query(INSERT_SQL, [
      meal.name,
      meal.category,
      meal.area,
      meal.instructions,
      encodeIngredientList(meal.ingredients),
      meal.images,
      meal.minutes
    ]);

    const inserted = insertedRowSchema.safeParse(result.rows[0]);
    if (!inserted.success) {
      return { inserted: false, id: null };
    }
    return { inserted: true, id: inserted.data.id };
  }

  async ping(): Promise<void> {
    await this.db.query("SELECT 1");
  }
}

export function normalizeMealRow(row: unknown): Meal | null {
  const parsed = mealRowSchema.safeParse(row);
  if (!parsed.success) {
    return null;
  }

  const meal = parsed.data;
  return {
    idMeal: meal.id,
    strMeal: meal.name,
    strCategory: meal.category ?? null,
    strArea: meal.area ?? null,
    strInstructions: meal.instructions ?? null,
    strMealThumb: meal.images ?? null,
    strIngredients: parseIngredientList(meal.ingredients),
    minutes: toMinutes(meal.minutes),
    source: "Supabase DB"
  };
}

/**
 * Reads the stored ingredient column. Rows written by older importers hold a
 * quoted list literal (`['salt', 'black pepper']`), newer ones a plain comma
 * list; text[] columns come back from pg as arrays already.
 */
export function parseIngredientList(value: string | string[] | null | undefined): string[] {
  if (!value) {
    return [];
  }

  const parts = Array.isArray(value)
    ? value
    : value.trim().replace(/^\[/, "").replace(/\]$/, "").split(",");

  return parts
    .map((part) => part.trim().replace(/^['"]|['"]$/g, "").trim())
    .filter((part) => part.length > 0);
}

export function encodeIngredientList(ingredients: readonly string[]): string {
  const items = ingredients
    .map((item) => item.replace(/[',[\]]/g, " ").replace(/\s+/g, " ").trim())
    .filter((item) => item.length > 0)
    .map((item) => `'${item}'`);
  return `[${items.join(", ")}]`;
}

export function escapeLikePattern(term: string): string {
  return term.replace(/[\\%_]/g, (match) => `\\${match}`);
}

function toMinutes(value: number | string | null | undefined): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}
