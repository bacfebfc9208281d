import test from "node:test";
import assert from "node:assert/strict";
import type { Server } from "node:http";
import pino from "pino";
import { z } from "zod";
import { createApp, type AppDeps } from "../src/app.js";
import { parseEnv } from "../src/config/env.js";
import type { MealStore } from "../src/services/mealStore.js";
import type { SourceResult } from "../src/types/contracts.js";
import type { Logger } from "../src/utils/logger.js";
import { InMemoryMealStore, makeMeals, silentLogger, stubMealDb } from "./helpers.js";

const searchResultSchema = z.object({
  total_available: z.number(),
  mealdb_count: z.number(),
  supabase_count: z.number(),
  returned_results: z.number(),
  max_results: z.number(),
  data: z.array(z.object({ idMeal: z.string(), source: z.string() }).passthrough())
});

const errorBodySchema = z.object({
  error: z.string(),
  message: z.string(),
  details: z.array(z.object({ path: z.string(), message: z.string() })).optional()
});

type ServerOptions = {
  mealDb?: SourceResult;
  store?: MealStore | null;
  logger?: Logger;
};

async function withServer<T>(options: ServerOptions, run: (baseURL: string) => Promise<T>): Promise<T> {
  const deps: AppDeps = {
    env: parseEnv({ NODE_ENV: "test" }),
    logger: options.logger ?? silentLogger,
    mealDb: stubMealDb(options.mealDb ?? { ok: true, meals: [] }),
    store: options.store === undefined ? new InMemoryMealStore() : options.store
  };
  const app = createApp(deps);

  const server = await new Promise<Server>((resolve, reject) => {
    const instance = app.listen(0, () => resolve(instance));
    instance.on("error", reject);
  });

  const address = server.address();
  if (!address || typeof address === "string") {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    throw new Error("Failed to resolve test server address");
  }

  const baseURL = `http://127.0.0.1:${address.port}`;
  try {
    return await run(baseURL);
  } finally {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}

const logLineSchema = z.object({
  level: z.string(),
  msg: z.string(),
  code: z.string().optional(),
  statusCode: z.number().optional()
}).passthrough();

function capturingLogger(): { logger: Logger; lines: () => z.infer<typeof logLineSchema>[] } {
  const raw: string[] = [];
  const logger = pino(
    { level: "info", formatters: { level: (label) => ({ level: label }) } },
    { write: (line: string) => { raw.push(line); } }
  );
  return {
    logger,
    lines: () => raw.map((line) => logLineSchema.parse(JSON.parse(line)))
  };
}

function postJSON(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body)
  });
}

test("GET / reports the API as online", async () => {
  await withServer({}, async (baseURL) => {
    const response = await fetch(`${baseURL}/`);

    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), { status: "online", message: "API is running" });
    assert.equal(response.headers.get("access-control-allow-origin"), "*");
  });
});

test("GET /health reports datastore reachability", async () => {
  await withServer({}, async (baseURL) => {
    const response = await fetch(`${baseURL}/health`);
    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), { status: "healthy", database: "connected" });
  });

  await withServer({ store: null }, async (baseURL) => {
    const response = await fetch(`${baseURL}/health`);
    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), { status: "error", message: "No database pool" });
  });

  await withServer({ store: new InMemoryMealStore([], { failWith: "connection refused" }) }, async (baseURL) => {
    const response = await fetch(`${baseURL}/health`);
    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), { status: "error", message: "connection refused" });
  });
});

test("GET /meals/:term rejects a one-character term", async () => {
  await withServer({}, async (baseURL) => {
    const response = await fetch(`${baseURL}/meals/a`);

    assert.equal(response.status, 400);
    assert.deepEqual(await response.json(), {
      error: "validation_error",
      message: "Search term must be at least 2 characters"
    });
  });
});

test("GET /meals/:term merges both sources", async () => {
  const store = new InMemoryMealStore(makeMeals(3, "Supabase DB", 100));
  const mealDb: SourceResult = { ok: true, meals: makeMeals(15, "MealDB") };

  await withServer({ mealDb, store }, async (baseURL) => {
    const response = await fetch(`${baseURL}/meals/${encodeURIComponent("Meal 10")}`);

    assert.equal(response.status, 200);
    const payload = searchResultSchema.parse(await response.json());
    assert.equal(payload.total_available, 18);
    assert.equal(payload.mealdb_count, 15);
    assert.equal(payload.supabase_count, 3);
    assert.equal(payload.returned_results, 13);
    assert.equal(payload.max_results, 20);
    assert.equal(payload.data.length, 13);
    assert.equal(payload.data.filter((meal) => meal.source === "Supabase DB").length, 3);
  });
});

test("GET /meals/:term answers 200 with zero counts when both sources fail", async () => {
  const store = new InMemoryMealStore([], { failWith: "database is down" });
  const mealDb: SourceResult = { ok: false, meals: [], error: "MealDB API error: HTTP 502" };

  await withServer({ mealDb, store }, async (baseURL) => {
    const response = await fetch(`${baseURL}/meals/zz`);

    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), {
      total_available: 0,
      mealdb_count: 0,
      supabase_count: 0,
      returned_results: 0,
      max_results: 20,
      data: []
    });
  });
});

test("GET /meals/:term answers 400 for an undecodable term", async () => {
  await withServer({}, async (baseURL) => {
    const response = await fetch(`${baseURL}/meals/%E0%A4%A`);
    assert.equal(response.status, 400);

    const payload = errorBodySchema.parse(await response.json());
    assert.equal(payload.error, "bad_request");
    assert.equal(payload.message, "Failed to decode param '%E0%A4%A'");
  });
});

test("errors are logged through the injected logger", async () => {
  const capture = capturingLogger();
  await withServer({ logger: capture.logger }, async (baseURL) => {
    const response = await fetch(`${baseURL}/meals/%E0%A4%A`);
    assert.equal(response.status, 400);
  });

  const errorLines = capture.lines().filter((line) => line.msg === "Client error");
  assert.equal(errorLines.length, 1);
  assert.equal(errorLines[0]?.level, "warn");
  assert.equal(errorLines[0]?.code, "bad_request");
  assert.equal(errorLines[0]?.statusCode, 400);
});

test("POST /add_meal/ acknowledges new and duplicate names alike", async () => {
  const store = new InMemoryMealStore();

  await withServer({ store }, async (baseURL) => {
    const first = await postJSON(`${baseURL}/add_meal/`, { name: "Fish Pie", ingredients: ["cod", "potatoes"] });
    assert.equal(first.status, 200);
    assert.deepEqual(await first.json(), { status: "ok", message: "Meal added", inserted: true, idMeal: "1" });

    const second = await postJSON(`${baseURL}/add_meal`, { name: "Fish Pie" });
    assert.equal(second.status, 200);
    assert.deepEqual(await second.json(), {
      status: "ok",
      message: "Meal already exists",
      inserted: false,
      idMeal: null
    });
  });

  assert.equal(store.size, 1);
});

test("POST /add_meal/ validates the body", async () => {
  await withServer({}, async (baseURL) => {
    const response = await postJSON(`${baseURL}/add_meal/`, { category: "Dessert" });

    assert.equal(response.status, 400);
    const payload = errorBodySchema.parse(await response.json());
    assert.equal(payload.error, "validation_error");
    assert.equal(payload.details?.[0]?.path, "name");
  });
});

test("POST /add_meal/ rejects malformed JSON", async () => {
  await withServer({}, async (baseURL) => {
    const response = await fetch(`${baseURL}/add_meal/`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{\"name\":"
    });

    assert.equal(response.status, 400);
    const payload = errorBodySchema.parse(await response.json());
    assert.equal(payload.error, "invalid_body");
  });
});

test("POST /add_meal/ fails with 500 without a datastore", async () => {
  await withServer({ store: null }, async (baseURL) => {
    const response = await postJSON(`${baseURL}/add_meal/`, { name: "Fish Pie" });

    assert.equal(response.status, 500);
    assert.deepEqual(await response.json(), {
      error: "database_unavailable",
      message: "Database not available"
    });
  });
});

test("unknown routes answer 404", async () => {
  await withServer({}, async (baseURL) => {
    const response = await fetch(`${baseURL}/recipes`);

    assert.equal(response.status, 404);
    assert.equal(errorBodySchema.parse(await response.json()).error, "not_found");
  });
});
