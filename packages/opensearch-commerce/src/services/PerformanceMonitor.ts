import {
  MAX_CLUSTER_HISTORY,
  MAX_TIMING_SAMPLES,
  SLOW_QUERY_THRESHOLD_MS,
  STATS_RETENTION_HOURS,
} from '../constants';
import type { OperationType } from './Observability';

type OperationCounts = Record<OperationType, number>;

type IndexMetrics = {
  counts: OperationCounts;
  errors: OperationCounts;
  totalTimeMs: OperationCounts;
  samples: Record<OperationType, number[]>;
  documentsIndexed: number;
  lastExecuted: Partial<Record<OperationType, number>>;
  lastSeen: number;
};

export type OperationStats = {
  count: number;
  errors: number;
  totalTimeMs: number;
  avgTimeMs: number;
  p95TimeMs: number;
  successRate: number;
  lastExecuted?: string;
};

export type IndexPerformanceStats = {
  index: string;
  operations: Record<OperationType, OperationStats>;
  documentsIndexed: number;
};

export type ClusterStatusEntry = {
  timestamp: string;
  status: string;
  nodes?: number;
  activeShards?: number;
  unassignedShards?: number;
};

export type SlowQuery = {
  index: string;
  operation: OperationType;
  durationMs: number;
};

export type PerformanceSummary = {
  totalIndices: number;
  totalOperations: number;
  totalErrors: number;
  overallSuccessRate: number;
  avgSearchTimeMs: number;
  documentsIndexed: number;
  clusterStatus?: string;
};

const OPERATION_TYPES: OperationType[] = ['search', 'index', 'update', 'delete', 'bulk', 'admin'];
const HOUR_MS = 60 * 60 * 1000;

function zeroCounts(): OperationCounts {
  return { search: 0, index: 0, update: 0, delete: 0, bulk: 0, admin: 0 };
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Nearest-rank percentile. */
export function percentile(samples: readonly number[], p: number): number {
  if (!samples.length) return 0;
  const sorted = [...samples].sort((a, b) => a - b);
  const rank = Math.ceil((p / 100) * sorted.length);
  return sorted[Math.min(Math.max(rank, 1), sorted.length) - 1];
}

export type PerformanceMonitorOptions = {
  retentionHours?: number;
  slowQueryThresholdMs?: number;
  now?: () => number;
};

/**
 * In-memory per-index timings, kept alongside the Prometheus metrics so
 * callers can read summaries without a scrape.
 */
export class PerformanceMonitor {
  private indices = new Map<string, IndexMetrics>();
  private clusterHistory: ClusterStatusEntry[] = [];
  private slowQueries: SlowQuery[] = [];
  private lastCleanup: number;
  private readonly retentionMs: number;
  private readonly slowQueryThresholdMs: number;
  private readonly now: () => number;

  constructor(options: PerformanceMonitorOptions = {}) {
    this.retentionMs = (options.retentionHours ?? STATS_RETENTION_HOURS) * HOUR_MS;
    this.slowQueryThresholdMs = options.slowQueryThresholdMs ?? SLOW_QUERY_THRESHOLD_MS;
    this.now = options.now ?? Date.now;
    this.lastCleanup = this.now();
  }

  recordOperation(
    index: string,
    type: OperationType,
    durationMs: number,
    success = true,
    documentCount = 0,
  ): void {
    const now = this.now();
    const metrics = this.metricsFor(index, now);

    metrics.counts[type] += 1;
    metrics.totalTimeMs[type] += durationMs;
    metrics.samples[type].push(durationMs);
    if (metrics.samples[type].length > MAX_TIMING_SAMPLES) {
      metrics.samples[type].shift();
    }
    if (!success) metrics.errors[type] += 1;
    if (type === 'bulk' || type === 'index') metrics.documentsIndexed += documentCount;
    metrics.lastExecuted[type] = now;
    metrics.lastSeen = now;

    if (type === 'search' && durationMs >= this.slowQueryThresholdMs) {
      this.slowQueries.push({ index, operation: type, durationMs });
      if (this.slowQueries.length > MAX_TIMING_SAMPLES) this.slowQueries.shift();
    }

    this.cleanupIfDue(now);
  }

  recordClusterHealth(health: { status: string; number_of_nodes?: number; active_shards?: number; unassigned_shards?: number }): void {
    this.clusterHistory.push({
      timestamp: new Date(this.now()).toISOString(),
      status: health.status,
      nodes: health.number_of_nodes,
      activeShards: health.active_shards,
      unassignedShards: health.unassigned_shards,
    });
    if (this.clusterHistory.length > MAX_CLUSTER_HISTORY) {
      this.clusterHistory.splice(0, this.clusterHistory.length - MAX_CLUSTER_HISTORY);
    }
  }

  getIndexStats(index: string): IndexPerformanceStats | undefined {
    const metrics = this.indices.get(index);
    if (!metrics) return undefined;

    const statsFor = (type: OperationType): OperationStats => {
      const count = metrics.counts[type];
      const errors = metrics.errors[type];
      const last = metrics.lastExecuted[type];
      return {
        count,
        errors,
        totalTimeMs: round(metrics.totalTimeMs[type]),
        avgTimeMs: count ? round(metrics.totalTimeMs[type] / count) : 0,
        p95TimeMs: round(percentile(metrics.samples[type], 95)),
        successRate: count ? round(((count - errors) / count) * 100) : 100,
        lastExecuted: last === undefined ? undefined : new Date(last).toISOString(),
      };
    };
    const operations: Record<OperationType, OperationStats> = {
      search: statsFor('search'),
      index: statsFor('index'),
      update: statsFor('update'),
      delete: statsFor('delete'),
      bulk: statsFor('bulk'),
      admin: statsFor('admin'),
    };
    return { index, operations, documentsIndexed: metrics.documentsIndexed };
  }

  getAllStats(): IndexPerformanceStats[] {
    const stats: IndexPerformanceStats[] = [];
    for (const index of this.indices.keys()) {
      const entry = this.getIndexStats(index);
      if (entry) stats.push(entry);
    }
    return stats;
  }

  getPerformanceSummary(): PerformanceSummary {
    let totalOperations = 0;
    let totalErrors = 0;
    let searchCount = 0;
    let searchTime = 0;
    let documentsIndexed = 0;

    for (const metrics of this.indices.values()) {
      for (const type of OPERATION_TYPES) {
        totalOperations += metrics.counts[type];
        totalErrors += metrics.errors[type];
      }
      searchCount += metrics.counts.search;
      searchTime += metrics.totalTimeMs.search;
      documentsIndexed += metrics.documentsIndexed;
    }

    return {
      totalIndices: this.indices.size,
      totalOperations,
      totalErrors,
      overallSuccessRate: totalOperations ? round(((totalOperations - totalErrors) / totalOperations) * 100) : 100,
      avgSearchTimeMs: searchCount ? round(searchTime / searchCount) : 0,
      documentsIndexed,
      clusterStatus: this.clusterHistory.at(-1)?.status,
    };
  }

  /** Slowest searches first. */
  getSlowQueries(limit = 10): SlowQuery[] {
    return [...this.slowQueries].sort((a, b) => b.durationMs - a.durationMs).slice(0, limit);
  }

  /** Most recent entries, oldest first. */
  getClusterStatusHistory(limit = 20): ClusterStatusEntry[] {
    return this.clusterHistory.slice(-limit);
  }

  reset(): void {
    this.indices.clear();
    this.clusterHistory = [];
    this.slowQueries = [];
    this.lastCleanup = this.now();
  }

  private metricsFor(index: string, now: number): IndexMetrics {
    let metrics = this.indices.get(index);
    if (!metrics) {
      metrics = {
        counts: zeroCounts(),
        errors: zeroCounts(),
        totalTimeMs: zeroCounts(),
        samples: { search: [], index: [], update: [], delete: [], bulk: [], admin: [] },
        documentsIndexed: 0,
        lastExecuted: {},
        lastSeen: now,
      };
      this.indices.set(index, metrics);
    }
    return metrics;
  }

  private cleanupIfDue(now: number): void {
    if (now - this.lastCleanup < HOUR_MS) return;
    this.lastCleanup = now;
    const cutoff = now - this.retentionMs;
    for (const [index, metrics] of this.indices) {
      if (metrics.lastSeen < cutoff) this.indices.delete(index);
    }
  }
}
