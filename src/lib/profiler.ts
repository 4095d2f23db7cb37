/**
 * Lightweight profiling for spec sheet runs.
 * Records phase name + elapsed ms, then prints a summary table.
 * Labels are "<group>:<phase>"; "pipeline:" entries are printed first,
 * followed by the slowest "product:" entries.
 */

interface TimerEntry {
  label: string;
  startMs: number;
  endMs?: number;
  meta?: Record<string, number | string>;
}

interface CompletedEntry {
  label: string;
  durationMs: number;
  meta?: Record<string, number | string>;
}

const MAX_PRODUCT_ENTRIES = 10;

export class PipelineProfiler {
  private readonly timers: TimerEntry[] = [];
  private readonly active = new Map<string, TimerEntry>();

  start(label: string): void {
    const entry: TimerEntry = { label, startMs: Date.now() };
    this.active.set(label, entry);
    this.timers.push(entry);
  }

  stop(label: string, meta?: Record<string, number | string>): number {
    const entry = this.active.get(label);
    if (!entry) {
      console.warn(`[profiler] No active timer for "${label}"`);
      return 0;
    }
    entry.endMs = Date.now();
    if (meta) entry.meta = { ...entry.meta, ...meta };
    this.active.delete(label);
    return entry.endMs - entry.startMs;
  }

  /** Wrap an async operation with timing */
  async time<T>(label: string, fn: () => Promise<T>, meta?: Record<string, number | string>): Promise<T> {
    this.start(label);
    try {
      const result = await fn();
      this.stop(label, meta);
      return result;
    } catch (err) {
      this.stop(label, { error: "failed" });
      throw err;
    }
  }

  /** Wrap a sync operation with timing */
  timeSync<T>(label: string, fn: () => T, meta?: Record<string, number | string>): T {
    this.start(label);
    try {
      const result = fn();
      this.stop(label, meta);
      return result;
    } catch (err) {
      this.stop(label, { error: "failed" });
      throw err;
    }
  }

  completed(): CompletedEntry[] {
    const entries: CompletedEntry[] = [];
    for (const t of this.timers) {
      if (t.endMs === undefined) continue;
      entries.push({ label: t.label, durationMs: t.endMs - t.startMs, meta: t.meta });
    }
    return entries;
  }

  /** Print pipeline phases in run order, then the slowest products */
  printSummary(): void {
    const completed = this.completed();
    if (completed.length === 0) return;

    console.log("\n=== Spec Sheet Run Profile ===");

    for (const entry of completed.filter((t) => t.label.startsWith("pipeline:"))) {
      printEntry(entry, 0);
    }

    const productEntries = completed
      .filter((t) => t.label.startsWith("product:"))
      .sort((a, b) => b.durationMs - a.durationMs);
    for (const entry of productEntries.slice(0, MAX_PRODUCT_ENTRIES)) {
      printEntry(entry, 1);
    }
    const remaining = productEntries.length - MAX_PRODUCT_ENTRIES;
    if (remaining > 0) {
      console.log(`    ... and ${remaining} more`);
    }

    console.log("");
  }
}

function printEntry(entry: CompletedEntry, indent: number): void {
  const pad = "  ".repeat(indent);
  const label = entry.label.padEnd(45 - indent * 2);
  const duration = `${entry.durationMs}ms`.padStart(8);
  const metaStr = entry.meta
    ? "  " + Object.entries(entry.meta).map(([k, v]) => `${k}=${v}`).join(", ")
    : "";
  console.log(`${pad}${label} ${duration}${metaStr}`);
}

// Singleton profiler instance
export const profiler = new PipelineProfiler();
