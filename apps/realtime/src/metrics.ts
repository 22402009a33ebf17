/**
 * Metrics Module
 *
 * In-memory counters for the realtime hub, rendered in Prometheus text
 * format by GET /metrics. Gauges (connections, topics) are read from the
 * hub at render time.
 */

// =============================================================================
// Configuration
// =============================================================================

/**
 * Histogram buckets for fan-out latency (in milliseconds).
 * The upper buckets cover a dispatch that waited out the send timeout.
 */
const FANOUT_BUCKETS = [1, 2, 5, 10, 20, 50, 100, 200, 500, 1000, 2000];

const PREFIX = "linkcast_realtime";

// =============================================================================
// State
// =============================================================================

const counters = {
  // Connections
  connections_opened: 0,
  connections_closed: 0,
  keepalive_evictions: 0,

  // Client requests
  subscribe_requests: 0,
  unsubscribe_requests: 0,
  client_requests_dropped: 0,
  malformed_messages: 0,

  // Broadcasts
  broadcasts_accepted: 0,
  broadcasts_dropped: 0,
  messages_delivered: 0,
  send_failures: 0,

  // Analytics collaborator
  snapshot_fetch_failures: 0,

  // Queue ingest
  ingest_jobs: 0,
  ingest_rejected: 0,
};

export type CounterName = keyof typeof counters;

const fanoutHistogram = {
  buckets: new Array<number>(FANOUT_BUCKETS.length + 1).fill(0),
  sum: 0,
  count: 0,
};

// =============================================================================
// Public API
// =============================================================================

/**
 * Increment a counter metric.
 */
export function increment(name: CounterName, by = 1): void {
  counters[name] += by;
}

/**
 * Current value of a counter (for tests and /realtime/stats).
 */
export function counter(name: CounterName): number {
  return counters[name];
}

/**
 * Record how long one broadcast took to reach every subscriber.
 */
export function recordFanout(latencyMs: number): void {
  fanoutHistogram.sum += latencyMs;
  fanoutHistogram.count++;

  for (let i = 0; i < FANOUT_BUCKETS.length; i++) {
    if (latencyMs <= FANOUT_BUCKETS[i]) {
      fanoutHistogram.buckets[i]++;
      return;
    }
  }
  // +Inf bucket
  fanoutHistogram.buckets[FANOUT_BUCKETS.length]++;
}

export interface Gauges {
  activeConnections: number;
  activeTopics: number;
}

/**
 * Get current metrics in Prometheus text format.
 */
export function getMetrics(gauges: Gauges): string {
  const lines: string[] = [];

  const addCounter = (name: CounterName, help: string) => {
    lines.push(`# HELP ${PREFIX}_${name}_total ${help}`);
    lines.push(`# TYPE ${PREFIX}_${name}_total counter`);
    lines.push(`${PREFIX}_${name}_total ${counters[name]}`);
  };

  const addGauge = (name: string, value: number, help: string) => {
    lines.push(`# HELP ${PREFIX}_${name} ${help}`);
    lines.push(`# TYPE ${PREFIX}_${name} gauge`);
    lines.push(`${PREFIX}_${name} ${value}`);
  };

  addGauge("active_connections", gauges.activeConnections, "Registered WebSocket connections");
  addGauge("active_topics", gauges.activeTopics, "Short codes with at least one subscriber");

  addCounter("connections_opened", "WebSocket connections accepted");
  addCounter("connections_closed", "WebSocket connections unregistered");
  addCounter("keepalive_evictions", "Connections dropped after a failed ping");
  addCounter("subscribe_requests", "Subscribe messages received");
  addCounter("unsubscribe_requests", "Unsubscribe messages received");
  addCounter("client_requests_dropped", "Subscribe/unsubscribe messages dropped over the per-connection limit");
  addCounter("malformed_messages", "Client messages that failed to decode");
  addCounter("broadcasts_accepted", "Updates queued for fan-out");
  addCounter("broadcasts_dropped", "Updates dropped because the broadcast queue was full");
  addCounter("messages_delivered", "Updates written to a subscriber");
  addCounter("send_failures", "Writes that failed or timed out");
  addCounter("snapshot_fetch_failures", "Analytics snapshot fetches that failed");
  addCounter("ingest_jobs", "Queue jobs broadcast");
  addCounter("ingest_rejected", "Queue jobs with an invalid payload");

  lines.push(`# HELP ${PREFIX}_fanout_latency_ms Time to deliver one update to all subscribers`);
  lines.push(`# TYPE ${PREFIX}_fanout_latency_ms histogram`);

  let cumulative = 0;
  for (let i = 0; i < FANOUT_BUCKETS.length; i++) {
    cumulative += fanoutHistogram.buckets[i];
    lines.push(`${PREFIX}_fanout_latency_ms_bucket{le="${FANOUT_BUCKETS[i]}"} ${cumulative}`);
  }
  cumulative += fanoutHistogram.buckets[FANOUT_BUCKETS.length];
  lines.push(`${PREFIX}_fanout_latency_ms_bucket{le="+Inf"} ${cumulative}`);
  lines.push(`${PREFIX}_fanout_latency_ms_sum ${fanoutHistogram.sum}`);
  lines.push(`${PREFIX}_fanout_latency_ms_count ${fanoutHistogram.count}`);

  return lines.join("\n") + "\n";
}

/**
 * Reset all metrics (for testing).
 */
export function reset(): void {
  for (const name of Object.keys(counters)) {
    if (isCounterName(name)) counters[name] = 0;
  }
  fanoutHistogram.buckets.fill(0);
  fanoutHistogram.sum = 0;
  fanoutHistogram.count = 0;
}

function isCounterName(name: string): name is CounterName {
  return name in counters;
}
