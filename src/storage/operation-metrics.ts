import type { OperationKind, OperationStats } from "../types/store.js";

interface Counters {
  count: number;
  totalTime: number;
  errors: number;
}

/** 操作種別ごとの累積カウンタ。平均と失敗率は snapshot 時に算出する。 */
export class OperationMetrics {
  private readonly byKind = new Map<OperationKind, Counters>();

  record(kind: OperationKind, durationSeconds: number, success: boolean): void {
    let counters = this.byKind.get(kind);
    if (!counters) {
      counters = { count: 0, totalTime: 0, errors: 0 };
      this.byKind.set(kind, counters);
    }
    counters.count++;
    counters.totalTime += durationSeconds;
    if (!success) counters.errors++;
  }

  snapshot(): Partial<Record<OperationKind, OperationStats>> {
    const result: Partial<Record<OperationKind, OperationStats>> = {};
    for (const [kind, c] of this.byKind) {
      result[kind] = {
        count: c.count,
        totalTime: c.totalTime,
        errors: c.errors,
        averageTime: c.count === 0 ? 0 : c.totalTime / c.count,
        errorRate: c.count === 0 ? 0 : c.errors / c.count,
      };
    }
    return result;
  }

  reset(): void {
    this.byKind.clear();
  }
}
