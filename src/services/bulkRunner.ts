/**
 * Bulk runner: fans the validation pipeline out over many records with a
 * bounded number of concurrent workers and routes each outcome to a sink.
 *
 * Workers pull from one shared iterator, so every record is processed
 * exactly once whatever the input size. A record that blows up inside the
 * pipeline is reported as an internal error and the batch carries on.
 */

import { ValidationOutcome, ValidationRecord } from '../types/email';
import { getErrorMessage } from '../types/errors';
import { Logger, logger as rootLogger } from '../utils/logger';
import { RunMetrics, RunMetricsSnapshot } from '../utils/metrics';
import { ValidationPipeline } from './validationPipeline';
import { ValidationContextOptions, createValidationContext } from './validationContext';

export const DEFAULT_CONCURRENCY = 10;

/**
 * Receives every outcome. Calls may interleave across workers.
 */
export interface OutcomeSink {
  accept(record: ValidationRecord, outcome: ValidationOutcome): void | Promise<void>;
  reject(record: ValidationRecord, outcome: ValidationOutcome): void | Promise<void>;
}

export interface RecordValidator {
  validate(email: string, website?: string): Promise<ValidationOutcome>;
}

export interface BulkRunnerOptions {
  concurrency?: number;
  /** Aborting has the same effect as stop() */
  signal?: AbortSignal;
  /** Progress hook, called after the sink */
  onOutcome?: (record: ValidationRecord, outcome: ValidationOutcome, completed: number) => void;
  logger?: Logger;
}

export interface BulkRunSummary extends RunMetricsSnapshot {
  /** True when the run was stopped before the input was exhausted */
  cancelled: boolean;
  durationMs: number;
}

const INTERNAL_ERROR = (detail: string): ValidationOutcome =>
  Object.freeze({ accepted: false, reason: 'internal-error', stage: 'internal', detail });

export type RecordSource = Iterable<ValidationRecord> | AsyncIterable<ValidationRecord>;

async function* iterate(records: RecordSource): AsyncGenerator<ValidationRecord, void, undefined> {
  yield* records;
}

export class BulkRunner {
  private readonly concurrency: number;
  private readonly logger: Logger;
  private stopped = false;

  constructor(
    private readonly pipeline: RecordValidator,
    private readonly options: BulkRunnerOptions = {}
  ) {
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be an integer >= 1 (got: ${concurrency})`);
    }
    this.concurrency = concurrency;
    this.logger = options.logger ?? rootLogger.child('bulk');
  }

  /**
   * Stop pulling new records. Records already in flight still complete
   * and reach the sink.
   */
  stop(): void {
    if (!this.stopped) {
      this.logger.info('Stop requested, draining in-flight records');
    }
    this.stopped = true;
  }

  isStopped(): boolean {
    return this.stopped || this.options.signal?.aborted === true;
  }

  async run(records: RecordSource, sink: OutcomeSink): Promise<BulkRunSummary> {
    const startTime = Date.now();
    const metrics = new RunMetrics();
    const iterator = iterate(records);
    let exhausted = false;
    let completed = 0;

    const onAbort = () => this.stop();
    this.options.signal?.addEventListener('abort', onAbort, { once: true });

    // Iterator calls are serialized so concurrent workers never race on next()
    let pulling: Promise<unknown> = Promise.resolve();
    const pull = (): Promise<ValidationRecord | null> => {
      const next = pulling.then(async () => {
        if (exhausted || this.isStopped()) return null;
        const result = await iterator.next();
        if (result.done) {
          exhausted = true;
          return null;
        }
        return result.value;
      });
      pulling = next.catch(() => undefined);
      return next;
    };

    const worker = async (id: number): Promise<void> => {
      for (let record = await pull(); record !== null; record = await pull()) {
        let result: ValidationOutcome;
        try {
          result = await this.pipeline.validate(record.email, record.website);
        } catch (error) {
          this.logger.error(`Worker ${id}: unexpected error validating record`, error);
          result = INTERNAL_ERROR(getErrorMessage(error));
        }

        metrics.record(result);
        completed++;

        if (result.accepted) {
          await sink.accept(record, result);
        } else {
          await sink.reject(record, result);
        }
        this.options.onOutcome?.(record, result, completed);
      }
    };

    // A failing worker stops the run; the others still finish their records
    const failures: unknown[] = [];
    const guarded = async (id: number): Promise<void> => {
      try {
        await worker(id);
      } catch (error) {
        if (failures.length === 0) {
          this.logger.error(`Worker ${id} failed, stopping the run`, error);
          this.stop();
        }
        failures.push(error);
      }
    };

    this.logger.info(`Starting bulk run with ${this.concurrency} workers`);

    try {
      await Promise.all(Array.from({ length: this.concurrency }, (_, i) => guarded(i + 1)));

      // A stop that lands after the last record is not a cancellation
      if (failures.length === 0 && !exhausted) {
        const rest = await iterator.next();
        exhausted = rest.done === true;
      }
    } finally {
      this.options.signal?.removeEventListener('abort', onAbort);
      if (!exhausted) {
        // Let a file-backed source close its stream
        await iterator.return(undefined);
      }
    }

    if (failures.length > 0) {
      throw failures[0];
    }

    const summary: BulkRunSummary = {
      ...metrics.getMetrics(),
      cancelled: !exhausted,
      durationMs: Date.now() - startTime,
    };

    this.logger.info('Bulk run complete', {
      total: summary.total,
      accepted: summary.accepted,
      rejected: summary.rejected,
      cancelled: summary.cancelled,
      durationMs: summary.durationMs,
    });

    return summary;
  }
}

export type BulkValidationOptions = ValidationContextOptions & Omit<BulkRunnerOptions, 'logger'>;

/**
 * Validate a batch with a validation context created for this run and
 * disposed when it ends
 * @throws ConfigError when options.config is invalid
 */
export async function runBulkValidation(
  records: RecordSource,
  sink: OutcomeSink,
  options: BulkValidationOptions = {}
): Promise<BulkRunSummary> {
  const ctx = createValidationContext(options);
  const log = ctx.logger.child(ctx.runId);

  try {
    const runner = new BulkRunner(new ValidationPipeline(ctx), {
      concurrency: options.concurrency,
      signal: options.signal,
      onOutcome: options.onOutcome,
      logger: log,
    });
    return await runner.run(records, sink);
  } finally {
    await ctx.dispose();
  }
}

export interface MemorySink extends OutcomeSink {
  readonly accepted: Array<{ record: ValidationRecord; outcome: ValidationOutcome }>;
  readonly rejected: Array<{ record: ValidationRecord; outcome: ValidationOutcome }>;
}

/**
 * Collects outcomes in arrays (HTTP batch endpoint, tests)
 */
export function createMemorySink(): MemorySink {
  const accepted: MemorySink['accepted'] = [];
  const rejected: MemorySink['rejected'] = [];
  return {
    accepted,
    rejected,
    accept(record, outcome) {
      accepted.push({ record, outcome });
    },
    reject(record, outcome) {
      rejected.push({ record, outcome });
    },
  };
}
