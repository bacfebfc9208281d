import { AppError, ValidationError, errorMessage } from "../middleware/error.js";
import type { Logger } from "../utils/logger.js";
import type { MealDbClient } from "./mealDb.js";
import type { MealStore } from "./mealStore.js";
import { MAX_RESULTS, balancedSample, type RandomSource } from "./sampling.js";
import type { Meal, SearchResult, SourceResult } from "../types/contracts.js";

export const MIN_TERM_LENGTH = 2;

export type MealSearchDeps = {
  mealDb: MealDbClient;
  store: MealStore | null;
  logger: Logger;
  random?: RandomSource;
};

export async function searchMeals(rawTerm: string, deps: MealSearchDeps): Promise<SearchResult> {
  const term = rawTerm.trim();
  if (term.length < MIN_TERM_LENGTH) {
    throw new ValidationError(`Search term must be at least ${MIN_TERM_LENGTH} characters`);
  }

  const log = deps.logger.child({ term });
  log.info({ msg: "Searching meals" });

  const [mealDb, supabase] = await Promise.all([
    settle(() => deps.mealDb.search(term)),
    settle(() => searchStore(deps.store, term))
  ]);

  reportFailure(log, "MealDB", mealDb);
  reportFailure(log, "Supabase DB", supabase);

  log.info({
    msg: "Source results",
    mealdbCount: mealDb.meals.length,
    supabaseCount: supabase.meals.length
  });

  try {
    return buildSearchResult(mealDb.meals, supabase.meals, deps.random);
  } catch (error) {
    throw new AppError(`Failed to merge meal results: ${errorMessage(error)}`, 500, "search_failed");
  }
}

export function buildSearchResult(
  mealDbMeals: readonly Meal[],
  supabaseMeals: readonly Meal[],
  random: RandomSource = Math.random
): SearchResult {
  const data = balancedSample(mealDbMeals, supabaseMeals, MAX_RESULTS, random);

  return {
    total_available: mealDbMeals.length + supabaseMeals.length,
    mealdb_count: mealDbMeals.length,
    supabase_count: supabaseMeals.length,
    returned_results: data.length,
    max_results: MAX_RESULTS,
    data
  };
}

async function searchStore(store: MealStore | null, term: string): Promise<SourceResult> {
  if (!store) {
    return { ok: false, meals: [], error: "No database pool" };
  }
  return { ok: true, meals: await store.search(term) };
}

// A branch never rejects: whatever goes wrong becomes an empty failure result.
async function settle(run: () => Promise<SourceResult>): Promise<SourceResult> {
  try {
    return await run();
  } catch (error) {
    return { ok: false, meals: [], error: errorMessage(error) };
  }
}

function reportFailure(log: Logger, source: string, result: SourceResult): void {
  if (!result.ok) {
    log.warn({ msg: "Meal source failed", source, error: result.error });
  }
}
