/**
 * Health & Monitoring Routes
 *
 * Liveness, readiness and Prometheus metrics.
 */

import type { FastifyPluginAsync } from "fastify";
import { getMetrics } from "../metrics.js";
import type { Hub } from "../hub.js";

/**
 * Dependency probes. Each resolves true when the dependency answers.
 */
export interface ReadinessChecks {
  database: () => Promise<boolean>;
  cache: () => Promise<boolean>;
}

export interface HealthRouteOptions {
  hub: Hub;
  readiness: ReadinessChecks;
}

type CheckStatus = "ok" | "error";

async function probe(check: () => Promise<boolean>): Promise<CheckStatus> {
  try {
    return (await check()) ? "ok" : "error";
  } catch {
    return "error";
  }
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (fastify, options) => {
  const { hub, readiness } = options;

  // Liveness probe - no dependencies
  fastify.get("/health", async () => {
    return { status: "ok", timestamp: new Date().toISOString() };
  });

  // Readiness probe - checks dependencies
  fastify.get("/health/ready", async (_request, reply) => {
    const [database, cache] = await Promise.all([
      probe(readiness.database),
      probe(readiness.cache),
    ]);
    const checks = { hub: hub.running ? "ok" : "error", database, cache };

    // Live clicks still flow without the database or cache; only the
    // snapshots degrade
    let status: "ok" | "degraded" | "unhealthy";
    if (!hub.running || (database === "error" && cache === "error")) {
      status = "unhealthy";
    } else if (database === "error" || cache === "error") {
      status = "degraded";
    } else {
      status = "ok";
    }

    return reply.status(status === "unhealthy" ? 503 : 200).send({
      status,
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  // Prometheus metrics
  fastify.get("/metrics", async (_request, reply) => {
    const body = getMetrics({
      activeConnections: hub.activeConnectionCount(),
      activeTopics: hub.activeTopics().length,
    });
    return reply.type("text/plain; version=0.0.4").send(body);
  });
};
