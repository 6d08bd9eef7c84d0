/**
 * Health check
 */

import type { Hono } from "hono";
import { ENDPOINTS } from "@credvault/shared";
import type { HealthResponse } from "@credvault/shared";
import type { AppEnv } from "../app.js";

export function setupHealthEndpoint(app: Hono<AppEnv>) {
  app.get(ENDPOINTS.HEALTH, (c) => {
    const body: HealthResponse = {
      status: "healthy",
      timestamp: new Date().toISOString(),
    };
    return c.json(body);
  });
}
