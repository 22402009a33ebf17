import { describe, it, expect, beforeEach } from "@jest/globals";
import * as metrics from "../src/metrics.js";

describe("metrics", () => {
  beforeEach(() => {
    metrics.reset();
  });

  it("should render counters and gauges in Prometheus format", () => {
    metrics.increment("broadcasts_dropped");
    metrics.increment("messages_delivered", 3);

    const output = metrics.getMetrics({ activeConnections: 2, activeTopics: 1 });
    const lines = output.split("\n");

    expect(lines).toContain("linkcast_realtime_active_connections 2");
    expect(lines).toContain("linkcast_realtime_active_topics 1");
    expect(lines).toContain("linkcast_realtime_broadcasts_dropped_total 1");
    expect(lines).toContain("linkcast_realtime_messages_delivered_total 3");
    expect(lines).toContain("# TYPE linkcast_realtime_send_failures_total counter");
  });

  it("should accumulate fan-out latency into cumulative buckets", () => {
    metrics.recordFanout(0.5);
    metrics.recordFanout(7);
    metrics.recordFanout(5000);

    const lines = metrics.getMetrics({ activeConnections: 0, activeTopics: 0 }).split("\n");

    expect(lines).toContain('linkcast_realtime_fanout_latency_ms_bucket{le="1"} 1');
    expect(lines).toContain('linkcast_realtime_fanout_latency_ms_bucket{le="5"} 1');
    expect(lines).toContain('linkcast_realtime_fanout_latency_ms_bucket{le="10"} 2');
    expect(lines).toContain('linkcast_realtime_fanout_latency_ms_bucket{le="2000"} 2');
    expect(lines).toContain('linkcast_realtime_fanout_latency_ms_bucket{le="+Inf"} 3');
    expect(lines).toContain("linkcast_realtime_fanout_latency_ms_sum 5007.5");
    expect(lines).toContain("linkcast_realtime_fanout_latency_ms_count 3");
  });

  it("should reset everything", () => {
    metrics.increment("send_failures");
    metrics.recordFanout(3);

    metrics.reset();

    expect(metrics.counter("send_failures")).toBe(0);
    expect(metrics.getMetrics({ activeConnections: 0, activeTopics: 0 })).toContain(
      "linkcast_realtime_fanout_latency_ms_count 0"
    );
  });
});
