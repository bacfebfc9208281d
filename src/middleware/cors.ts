import cors from "cors";
import type { Env } from "../config/env.js";

export function createCors(env: Pick<Env, "CORS_ORIGIN">) {
  return cors({
    origin: env.CORS_ORIGIN,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "X-Request-ID"],
    credentials: true,
    maxAge: 86400,
  });
}
