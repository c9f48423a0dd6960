/**
 * Performance Metrics
 * Lightweight in-memory request metrics, exposed as a pull snapshot
 */

export type RequestOutcome =
  | 'delivered'
  | 'validation_error'
  | 'quota_exhausted'
  | 'collaborator_failure'
  | 'cancelled'
  | 'error';

export interface LatencySummary {
  p50: number;
  p95: number;
  p99: number;
  avg: number;
  max: number;
  min: number;
}

export interface MetricsSnapshot {
  requests: {
    total: number;
    byOutcome: Record<RequestOutcome, number>;
    errorRate: number;
  };
  latency: LatencySummary;
  timestamp: string;
}

function emptyOutcomes(): Record<RequestOutcome, number> {
  return {
    delivered: 0,
    validation_error: 0,
    quota_exhausted: 0,
    collaborator_failure: 0,
    cancelled: 0,
    error: 0
  };
}

export function summarizeLatencies(values: readonly number[]): LatencySummary {
  const sorted = [...values].sort((a, b) => a - b);
  const len = sorted.length;
  if (len === 0) {
    return { p50: 0, p95: 0, p99: 0, avg: 0, max: 0, min: 0 };
  }
  const at = (q: number) => sorted[Math.min(len - 1, Math.floor(len * q))] ?? 0;
  return {
    p50: at(0.5),
    p95: at(0.95),
    p99: at(0.99),
    avg: sorted.reduce((a, b) => a + b, 0) / len,
    max: sorted[len - 1] ?? 0,
    min: sorted[0] ?? 0
  };
}

export class PerformanceMetrics {
  private total = 0;
  private outcomes = emptyOutcomes();
  private latencies: number[] = [];

  constructor(private readonly maxLatencyHistory = 1000) {}

  recordRequest(outcome: RequestOutcome, latencyMs: number): void {
    this.total++;
    this.outcomes[outcome]++;

    this.latencies.push(latencyMs);
    if (this.latencies.length > this.maxLatencyHistory) {
      this.latencies.shift();
    }
  }

  getSnapshot(): MetricsSnapshot {
    const failures = this.outcomes.collaborator_failure + this.outcomes.error;
    return {
      requests: {
        total: this.total,
        byOutcome: { ...this.outcomes },
        errorRate: this.total > 0 ? failures / this.total : 0
      },
      latency: summarizeLatencies(this.latencies),
      timestamp: new Date().toISOString()
    };
  }

  reset(): void {
    this.total = 0;
    this.outcomes = emptyOutcomes();
    this.latencies = [];
  }
}
