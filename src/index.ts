/**
 * Public API
 */

export { ValidationPipeline, validateEmailPipeline } from './services/validationPipeline';
export type { SingleValidationResult } from './services/validationPipeline';
export { BulkRunner, runBulkValidation, createMemorySink, DEFAULT_CONCURRENCY } from './services/bulkRunner';
export type {
  BulkRunSummary,
  BulkRunnerOptions,
  BulkValidationOptions,
  MemorySink,
  OutcomeSink,
  RecordSource,
  RecordValidator,
} from './services/bulkRunner';
export { createValidationContext } from './services/validationContext';
export type {
  DisposableValidationContext,
  ValidationContext,
  ValidationContextOptions,
  ValidationDependencies,
} from './services/validationContext';

export { validateSyntax } from './validators/syntaxValidator';
export { validateMx } from './validators/dnsValidator';
export { validateWebsite, normalizeWebsiteUrl } from './validators/websiteValidator';
export { validateSmtp } from './validators/smtpValidator';

export { openRecordFile, readRecordsFromBuffer } from './io/recordReader';
export { CsvResultSink, buildCsv } from './io/resultWriter';

export { loadConfig, defaultPipelineConfig, validateConfig, validatePipelineConfig } from './config/env';
export type { AppConfig, PipelineConfig, SmtpConfig, CacheConfig, InconclusivePolicy } from './config/env';

export * from './types/email';
export * from './types/errors';
export * from './types/capabilities';
export { Logger, LogLevel } from './utils/logger';
