import helmet from "helmet";
import type { Env } from "../config/env.js";

// JSON-only API: nothing is ever rendered, so the CSP can deny everything.
export function createHelmet(env: Pick<Env, "NODE_ENV">) {
  return helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    hsts: env.NODE_ENV === "production" ? {
      maxAge: 31536000,
      includeSubDomains: true,
      preload: true,
    } : false,
  });
}
