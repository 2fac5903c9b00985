import { performance } from "perf_hooks";
import { config } from "../config/env";

interface Stat {
  count: number;
  total: number;
  min: number;
  max: number;
}

export class PerformanceMonitor {
  private static instance: PerformanceMonitor;
  private enabled: boolean = config.perfEnabled;
  private stats: Map<string, Stat> = new Map();

  private constructor() {}

  static getInstance(): PerformanceMonitor {
    if (!PerformanceMonitor.instance) {
      PerformanceMonitor.instance = new PerformanceMonitor();
    }
    return PerformanceMonitor.instance;
  }

  setEnabled(enabled: boolean) {
    this.enabled = enabled;
  }

  start(): number {
    if (!this.enabled) return 0;
    return performance.now();
  }

  end(label: string, startTime: number) {
    if (!this.enabled) return;
    this.recordMetric(label, performance.now() - startTime);
  }

  recordMetric(label: string, value: number) {
    if (!this.enabled) return;
    const stat = this.stats.get(label) || { count: 0, total: 0, min: Infinity, max: -Infinity };
    stat.count++;
    stat.total += value;
    stat.min = Math.min(stat.min, value);
    stat.max = Math.max(stat.max, value);
    this.stats.set(label, stat);
  }

  getStat(label: string): Stat | undefined {
    const stat = this.stats.get(label);
    return stat ? { ...stat } : undefined;
  }

  report() {
    console.log("\n=== Performance Report ===");
    console.table(
      Array.from(this.stats.entries()).map(([label, stat]) => ({
        Label: label,
        Count: stat.count,
        "Avg (ms)": (stat.total / stat.count).toFixed(3),
        "Min (ms)": stat.min.toFixed(3),
        "Max (ms)": stat.max.toFixed(3),
        "Total (ms)": stat.total.toFixed(3)
      }))
    );
    console.log("==========================\n");
  }

  reset() {
    this.stats.clear();
  }

  // Device updates are synchronous, so unlike a request timer this never awaits
  measure<T>(label: string, fn: () => T): T {
    const start = this.start();
    try {
      return fn();
    } finally {
      this.end(label, start);
    }
  }
}

export const perf = PerformanceMonitor.getInstance();
