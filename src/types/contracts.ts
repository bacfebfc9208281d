export const MEAL_SOURCES = ["MealDB", "Supabase DB"] as const;

export type MealSource = (typeof MEAL_SOURCES)[number];

export type Meal = {
  idMeal: string;
  strMeal: string;
  strCategory: string | null;
  strArea: string | null;
  strInstructions: string | null;
  strMealThumb: string | null;
  strIngredients: string[];
  // MealDB only: measure for each entry of strIngredients, "" when none is given
  strMeasures?: string[];
  strTags?: string[];
  strYoutube?: string | null;
  minutes?: number | null;
  source: MealSource;
};

export type SourceResult =
  | { ok: true; meals: Meal[] }
  | { ok: false; meals: []; error: string };

export type SearchResult = {
  total_available: number;
  mealdb_count: number;
  supabase_count: number;
  returned_results: number;
  max_results: number;
  data: Meal[];
};

export type NewMeal = {
  name: string;
  category: string;
  area: string;
  instructions: string;
  ingredients: string[];
  images: string;
  minutes: number | null;
};

export type InsertOutcome = {
  inserted: boolean;
  id: string | null;
};

export type AddMealAck = {
  status: "ok";
  message: "Meal added" | "Meal already exists";
  inserted: boolean;
  idMeal: string | null;
};

export type HealthStatus =
  | { status: "healthy"; database: "connected" }
  | { status: "error"; message: string };
