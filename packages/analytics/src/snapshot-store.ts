/**
 * PostgreSQL Snapshot Store
 *
 * Raw SQL aggregation of click events into an AnalyticsSnapshot.
 * Uses `pg` directly - NO ORM, NO query builder.
 *
 * Schema (owned by the link management service):
 * - links(id, short_code, original_url, created_at, deleted_at)
 * - click_events(link_id, created_at, ip_hash, country, bot)
 *
 * Read-only: this store never writes to the database.
 */

import { Pool } from "pg";
import { z } from "zod";
import type { Logger } from "@linkcast/logger";
import { ANALYTICS_WINDOWS, isValidShortCode, type AnalyticsSnapshot } from "@linkcast/shared";
import { AnalyticsError, type SnapshotProvider } from "./types.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Minimal pg.Pool interface (what we actually use)
 * Allows faking the database in tests without importing pg
 */
export interface QueryablePool {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}

export interface SnapshotStoreOptions {
  /** Per-query timeout in milliseconds */
  timeoutMs?: number;
  logger?: Logger;
}

// Row decoders. COUNT(...) is cast to int in SQL; dates arrive as Date from
// pg but coerce keeps string timestamps working too.
const linkRow = z.object({
  id: z.union([z.string(), z.number()]),
  original_url: z.string(),
  created_at: z.coerce.date(),
});

const totalsRow = z.object({
  total_clicks: z.coerce.number(),
  unique_visitors: z.coerce.number(),
  bot_clicks: z.coerce.number(),
});

const lastClickRow = z.object({
  last_click_at: z.coerce.date().nullable(),
});

const dailyRow = z.object({
  date: z.string(),
  clicks: z.coerce.number(),
});

const countryRow = z.object({
  country: z.string(),
  clicks: z.coerce.number(),
});

// =============================================================================
// SQL Queries
// =============================================================================

const LINK_QUERY = `
  SELECT id, original_url, created_at
  FROM links
  WHERE short_code = $1
    AND deleted_at IS NULL
  LIMIT 1
`;

const TOTALS_QUERY = `
  SELECT
    COUNT(*)::int AS total_clicks,
    COUNT(DISTINCT ip_hash)::int AS unique_visitors,
    COUNT(*) FILTER (WHERE bot)::int AS bot_clicks
  FROM click_events
  WHERE link_id = $1
    AND created_at >= NOW() - make_interval(days => $2)
`;

const LAST_CLICK_QUERY = `
  SELECT MAX(created_at) AS last_click_at
  FROM click_events
  WHERE link_id = $1
`;

const DAILY_QUERY = `
  SELECT to_char(date_trunc('day', created_at), 'YYYY-MM-DD') AS date,
         COUNT(*)::int AS clicks
  FROM click_events
  WHERE link_id = $1
    AND created_at >= NOW() - make_interval(days => $2)
  GROUP BY 1
  ORDER BY 1 DESC
`;

const COUNTRY_QUERY = `
  SELECT country, COUNT(*)::int AS clicks
  FROM click_events
  WHERE link_id = $1
    AND created_at >= NOW() - make_interval(days => $2)
    AND country IS NOT NULL
  GROUP BY country
  ORDER BY clicks DESC, country ASC
  LIMIT 10
`;

const HEALTH_QUERY = "SELECT 1";

const DEFAULT_TIMEOUT_MS = 2000;

// =============================================================================
// Store
// =============================================================================

export class PgSnapshotStore implements SnapshotProvider {
  private readonly timeoutMs: number;
  private readonly logger?: Logger;

  constructor(
    private readonly pool: QueryablePool,
    options: SnapshotStoreOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger;
  }

  /**
   * Aggregate analytics for a short code over the last `windowDays` days.
   * Resolves null for unknown or deleted links.
   */
  async getSnapshot(shortCode: string, windowDays: number): Promise<AnalyticsSnapshot | null> {
    if (!isValidShortCode(shortCode)) {
      throw new AnalyticsError(`Invalid short code: ${shortCode}`, "INVALID_INPUT");
    }
    if (
      !Number.isInteger(windowDays) ||
      windowDays < 1 ||
      windowDays > ANALYTICS_WINDOWS.MAX_DAYS
    ) {
      throw new AnalyticsError(
        `Invalid window: must be 1-${ANALYTICS_WINDOWS.MAX_DAYS} days`,
        "INVALID_INPUT"
      );
    }

    const start = performance.now();

    const [link] = await this.run(LINK_QUERY, [shortCode], linkRow);
    if (!link) return null;

    const linkId = String(link.id);
    const [totalsRows, lastRows, daily, countries] = await Promise.all([
      this.run(TOTALS_QUERY, [linkId, windowDays], totalsRow),
      this.run(LAST_CLICK_QUERY, [linkId], lastClickRow),
      this.run(DAILY_QUERY, [linkId, windowDays], dailyRow),
      this.run(COUNTRY_QUERY, [linkId, windowDays], countryRow),
    ]);

    const totals = totalsRows[0] ?? { total_clicks: 0, unique_visitors: 0, bot_clicks: 0 };
    const lastClickAt = lastRows[0]?.last_click_at ?? null;

    this.logger?.debug(
      { shortCode, windowDays, latencyMs: Math.round(performance.now() - start) },
      "Snapshot aggregated"
    );

    return {
      shortCode,
      originalUrl: link.original_url,
      windowDays,
      totalClicks: totals.total_clicks,
      uniqueVisitors: totals.unique_visitors,
      botClicks: totals.bot_clicks,
      createdAt: link.created_at.toISOString(),
      lastClickAt: lastClickAt ? lastClickAt.toISOString() : null,
      dailyClicks: daily.map((row) => ({ date: row.date, clicks: row.clicks })),
      countryStats: countries.map((row) => ({ countryCode: row.country, clicks: row.clicks })),
    };
  }

  /**
   * Health check - simple query to verify connectivity.
   */
  async ping(): Promise<boolean> {
    try {
      await withTimeout(this.pool.query(HEALTH_QUERY), this.timeoutMs);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Graceful shutdown - drain connection pool.
   */
  async close(): Promise<void> {
    await this.pool.end();
  }

  private async run<T>(
    text: string,
    values: unknown[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T[]> {
    let rows: unknown[];
    try {
      ({ rows } = await withTimeout(this.pool.query(text, values), this.timeoutMs));
    } catch (err) {
      if (err instanceof AnalyticsError) throw err;
      throw new AnalyticsError("Snapshot query failed", "QUERY_ERROR", { cause: err });
    }

    const parsed = z.array(schema).safeParse(rows);
    if (!parsed.success) {
      throw new AnalyticsError("Unexpected snapshot row shape", "QUERY_ERROR", {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}

/**
 * Create a store backed by a pg connection pool.
 * The pool connects lazily on the first query.
 */
export function createPgSnapshotStore(
  databaseUrl: string,
  options: SnapshotStoreOptions = {}
): PgSnapshotStore {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  const pool = new Pool({
    connectionString: databaseUrl,

    // Snapshot reads are short; keep the pool small
    max: 10,
    idleTimeoutMillis: 30000,

    connectionTimeoutMillis: 2000,
    statement_timeout: timeoutMs, // PostgreSQL side
    query_timeout: timeoutMs, // Node.js side
  });

  pool.on("error", (err) => {
    options.logger?.error({ err }, "Idle database client error");
  });

  return new PgSnapshotStore(pool, { ...options, timeoutMs });
}

// =============================================================================
// Utilities
// =============================================================================

/**
 * Wrap a promise with a timeout.
 * Rejects with a QUERY_TIMEOUT AnalyticsError when the timer wins.
 */
async function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(
      () => reject(new AnalyticsError(`Query timed out after ${ms}ms`, "QUERY_TIMEOUT")),
      ms
    );
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}
