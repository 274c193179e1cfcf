/**
 * Metrics — in-process counters and gauges with pluggable export.
 */

// ── Types ──

export type Tags = Record<string, string>;

export interface MetricsSnapshot {
  counters: Record<string, { value: number; tags?: Tags }[]>;
  gauges: Record<string, { value: number; tags?: Tags }[]>;
  collectedAt: string;
}

/** Adapter interface for external metrics systems (Prometheus, StatsD, etc.) */
export interface MetricsAdapter {
  onCounter(name: string, value: number, tags?: Tags): void;
  onGauge(name: string, value: number, tags?: Tags): void;
}

interface MetricEntry {
  value: number;
  tags?: Tags;
}

function tagsKey(tags?: Tags): string {
  if (!tags || Object.keys(tags).length === 0) return '';
  return Object.entries(tags).sort(([a], [b]) => a.localeCompare(b)).map(([k, v]) => `${k}=${v}`).join(',');
}

function series(store: Map<string, Map<string, MetricEntry>>, name: string): Map<string, MetricEntry> {
  let byTags = store.get(name);
  if (!byTags) {
    byTags = new Map();
    store.set(name, byTags);
  }
  return byTags;
}

// ── Metrics Collector ──

export class MetricsCollector {
  private counters = new Map<string, Map<string, MetricEntry>>();
  private gauges = new Map<string, Map<string, MetricEntry>>();
  private adapters: MetricsAdapter[] = [];

  registerAdapter(adapter: MetricsAdapter): void {
    this.adapters.push(adapter);
  }

  /** Increment a counter by 1 (or by `amount`). */
  counter(name: string, tags?: Tags, amount = 1): void {
    const byTags = series(this.counters, name);
    const key = tagsKey(tags);
    const existing = byTags.get(key);
    if (existing) {
      existing.value += amount;
    } else {
      byTags.set(key, { value: amount, tags });
    }
    for (const a of this.adapters) a.onCounter(name, amount, tags);
  }

  gauge(name: string, value: number, tags?: Tags): void {
    series(this.gauges, name).set(tagsKey(tags), { value, tags });
    for (const a of this.adapters) a.onGauge(name, value, tags);
  }

  getSnapshot(): MetricsSnapshot {
    const counters: MetricsSnapshot['counters'] = {};
    for (const [name, byTags] of this.counters) {
      counters[name] = Array.from(byTags.values(), e => ({ ...e }));
    }

    const gauges: MetricsSnapshot['gauges'] = {};
    for (const [name, byTags] of this.gauges) {
      gauges[name] = Array.from(byTags.values(), e => ({ ...e }));
    }

    return { counters, gauges, collectedAt: new Date().toISOString() };
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
  }

  /** Counter value for specific tags, or the sum across all tag sets. */
  getCounter(name: string, tags?: Tags): number {
    const byTags = this.counters.get(name);
    if (!byTags) return 0;
    if (tags) {
      return byTags.get(tagsKey(tags))?.value ?? 0;
    }
    let total = 0;
    for (const entry of byTags.values()) total += entry.value;
    return total;
  }

  getGauge(name: string, tags?: Tags): number | undefined {
    return this.gauges.get(name)?.get(tagsKey(tags))?.value;
  }
}

export const globalMetrics = new MetricsCollector();
