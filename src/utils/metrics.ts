/**
 * Per-run outcome counters, used for the bulk summary
 */

import { OutcomeReason, ValidationOutcome, ValidationStage } from '../types/email';

export interface RunMetricsSnapshot {
  total: number;
  accepted: number;
  rejected: number;
  byReason: Partial<Record<OutcomeReason, number>>;
  byStage: Partial<Record<ValidationStage, number>>;
}

function emptyMetrics(): RunMetricsSnapshot {
  return { total: 0, accepted: 0, rejected: 0, byReason: {}, byStage: {} };
}

export class RunMetrics {
  private metrics: RunMetricsSnapshot = emptyMetrics();

  record(outcome: ValidationOutcome): void {
    this.metrics.total++;

    if (outcome.accepted) {
      this.metrics.accepted++;
    } else {
      this.metrics.rejected++;
    }

    // Accepted-on-inconclusive is counted too, it is worth seeing in the summary
    if (outcome.reason) {
      this.metrics.byReason[outcome.reason] = (this.metrics.byReason[outcome.reason] ?? 0) + 1;
    }
    this.metrics.byStage[outcome.stage] = (this.metrics.byStage[outcome.stage] ?? 0) + 1;
  }

  getMetrics(): RunMetricsSnapshot {
    return {
      ...this.metrics,
      byReason: { ...this.metrics.byReason },
      byStage: { ...this.metrics.byStage },
    };
  }
}
