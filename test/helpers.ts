import pino from "pino";
import type { MealDbClient } from "../src/services/mealDb.js";
import type { MealStore } from "../src/services/mealStore.js";
import type { InsertOutcome, Meal, MealSource, NewMeal, SourceResult } from "../src/types/contracts.js";

export const silentLogger = pino({ level: "silent" });

export function makeMeal(index: number, source: MealSource, overrides: Partial<Meal> = {}): Meal {
  return {
    idMeal: String(index),
    strMeal: `Meal ${index}`,
    strCategory: "Chicken",
    strArea: "British",
    strInstructions: "Cook it.",
    strMealThumb: null,
    strIngredients: ["chicken", "salt"],
    source,
    ...overrides
  };
}

export function makeMeals(count: number, source: MealSource, startAt: number = 1): Meal[] {
  return Array.from({ length: count }, (_, offset) => makeMeal(startAt + offset, source));
}

export function stubMealDb(result: SourceResult | (() => Promise<SourceResult>)): MealDbClient & { terms: string[] } {
  const terms: string[] = [];
  return {
    terms,
    async search(term: string) {
      terms.push(term);
      return typeof result === "function" ? result() : result;
    }
  };
}

type InMemoryMealStoreOptions = {
  failWith?: string;
};

/** In-process stand-in for the Postgres table, same matching and conflict rules. */
export class InMemoryMealStore implements MealStore {
  readonly terms: string[] = [];
  private readonly rows: Meal[] = [];
  private nextId = 1;

  constructor(seed: Meal[] = [], private readonly options: InMemoryMealStoreOptions = {}) {
    for (const meal of seed) {
      this.rows.push({ ...meal, source: "Supabase DB" });
    }
  }

  async search(term: string): Promise<Meal[]> {
    this.fail();
    this.terms.push(term);
    const needle = term.toLowerCase();
    return this.rows
      .filter((meal) => meal.strMeal.toLowerCase().includes(needle))
      .sort((left, right) => priority(left, needle) - priority(right, needle));
  }

  async insert(meal: NewMeal): Promise<InsertOutcome> {
    this.fail();
    if (this.rows.some((row) => row.strMeal === meal.name)) {
      return { inserted: false, id: null };
    }
    const id = String(this.nextId);
    this.nextId += 1;
    this.rows.push({
      idMeal: id,
      strMeal: meal.name,
      strCategory: meal.category,
      strArea: meal.area,
      strInstructions: meal.instructions,
      strMealThumb: meal.images,
      strIngredients: meal.ingredients,
      minutes: meal.minutes,
      source: "Supabase DB"
    });
    return { inserted: true, id };
  }

  async ping(): Promise<void> {
    this.fail();
  }

  get size(): number {
    return this.rows.length;
  }

  private fail(): void {
    if (this.options.failWith) {
      throw new Error(this.options.failWith);
    }
  }
}

function priority(meal: Meal, needle: string): number {
  return meal.strMeal.toLowerCase() === needle ? 1 : 2;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
