/**
 * HTTP API routes for the validation pipeline.
 * Every request gets its own validation context, so caches and throttles
 * never outlive the request that created them.
 */

import { Router, Request, Response } from 'express';
import multer from 'multer';
import { AppConfig } from '../config/env';
import { FAIL_HEADERS, PASS_HEADERS, buildCsv, failRow, passRow } from '../io/resultWriter';
import { readRecordsFromBuffer } from '../io/recordReader';
import { createMemorySink, runBulkValidation } from '../services/bulkRunner';
import { ValidationDependencies, createValidationContext } from '../services/validationContext';
import { ValidationPipeline } from '../services/validationPipeline';
import { ValidationOutcome, ValidationRecord } from '../types/email';
import { InputFormatError } from '../types/errors';
import { Logger, hashEmailForLogging, logger as rootLogger } from '../utils/logger';

/**
 * Maximum number of records allowed per batch or upload
 */
export const MAX_BATCH_SIZE = 1000;

const ALLOWED_EXTENSIONS = ['.csv', '.xls', '.xlsx'];

export interface RouterOptions {
  config: AppConfig;
  /** Replaces the network capabilities (tests) */
  dependencies?: Partial<ValidationDependencies>;
  logger?: Logger;
}

type ParsedRecords = { ok: true; records: ValidationRecord[] } | { ok: false; message: string };

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check one `{ email, website? }` item from a request body
 */
function parseRecord(value: unknown): ValidationRecord | string {
  if (!isObject(value)) {
    return 'must be an object';
  }
  if (typeof value.email !== 'string') {
    return 'field "email" is required and must be a string';
  }
  if (value.website !== undefined && value.website !== null && typeof value.website !== 'string') {
    return 'field "website" must be a string';
  }
  return typeof value.website === 'string'
    ? { email: value.email, website: value.website }
    : { email: value.email };
}

function parseBatch(body: unknown): ParsedRecords {
  if (!isObject(body) || !Array.isArray(body.records)) {
    return { ok: false, message: 'Field "records" is required and must be an array' };
  }
  if (body.records.length === 0) {
    return { ok: false, message: 'Field "records" cannot be empty' };
  }
  if (body.records.length > MAX_BATCH_SIZE) {
    return {
      ok: false,
      message: `Maximum ${MAX_BATCH_SIZE} records allowed per batch. Received ${body.records.length}.`,
    };
  }

  const records: ValidationRecord[] = [];
  for (const [index, item] of body.records.entries()) {
    const parsed = parseRecord(item);
    if (typeof parsed === 'string') {
      return { ok: false, message: `records[${index}]: ${parsed}` };
    }
    records.push(parsed);
  }
  return { ok: true, records };
}

function extensionOf(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  return dot === -1 ? '' : fileName.slice(dot).toLowerCase();
}

export function createRouter(options: RouterOptions): Router {
  const router = Router();
  const { config, dependencies } = options;
  const logger = options.logger ?? rootLogger.child('http');

  // Configure multer for file uploads (CSV and Excel)
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: 10 * 1024 * 1024 }, // 10MB limit
    fileFilter: (_req, file, cb) => {
      if (ALLOWED_EXTENSIONS.includes(extensionOf(file.originalname))) {
        cb(null, true);
      } else {
        cb(new InputFormatError('Only CSV and Excel files (.csv, .xls, .xlsx) are allowed'));
      }
    },
  });

  /**
   * Run a batch and hand back outcomes in input order
   */
  async function validateRecords(records: ValidationRecord[]) {
    const outcomes = new Map<ValidationRecord, ValidationOutcome>();
    const summary = await runBulkValidation(records, createMemorySink(), {
      config: config.pipeline,
      dependencies,
      logger,
      concurrency: config.bulkConcurrency,
      onOutcome: (record, outcome) => outcomes.set(record, outcome),
    });
    return { summary, outcomes };
  }

  /**
   * Health check endpoint
   * GET /health
   */
  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      service: 'Email Pipeline Validator',
      timestamp: new Date().toISOString(),
      cache: config.pipeline.cache.redis.enabled ? 'redis' : 'memory',
      smtp: config.pipeline.skipSmtp ? 'disabled' : 'enabled',
    });
  });

  /**
   * Validate a single record
   * POST /validate
   *
   * Request body: { "email": "user@example.com", "website": "example.com" }
   * Response: { "success": true, "result": { accepted, reason, stage, detail } }
   */
  router.post('/validate', async (req: Request, res: Response) => {
    const startTime = Date.now();
    const parsed = parseRecord(req.body);

    if (typeof parsed === 'string') {
      logger.warn(`POST /validate - Invalid request: ${parsed}`);
      res.status(400).json({
        success: false,
        error: 'Invalid request',
        message: `Request body ${parsed}`,
      });
      return;
    }

    const emailHash = hashEmailForLogging(parsed.email);
    const ctx = createValidationContext({ config: config.pipeline, dependencies, logger });

    try {
      const result = await new ValidationPipeline(ctx).validate(parsed.email, parsed.website);

      logger.info(`POST /validate - Completed in ${Date.now() - startTime}ms`, {
        emailHash,
        accepted: result.accepted,
        reason: result.reason,
      });

      res.json({ success: true, result });

    } catch (error) {
      logger.error(`POST /validate - Error after ${Date.now() - startTime}ms:`, error);
      res.status(500).json({
        success: false,
        error: 'Internal server error',
        message: 'An error occurred while validating the email address',
      });
    } finally {
      await ctx.dispose();
    }
  });

  /**
   * Validate many records
   * POST /validate-batch
   *
   * Request body: { "records": [{ "email": "...", "website": "..." }, ...] }
   * Response: { "success": true, "summary": {...}, "results": [{ email, website, accepted, reason, stage }, ...] }
   */
  router.post('/validate-batch', async (req: Request, res: Response) => {
    const startTime = Date.now();
    const parsed = parseBatch(req.body);

    if (!parsed.ok) {
      logger.warn(`POST /validate-batch - Invalid request: ${parsed.message}`);
      res.status(400).json({
        success: false,
        error: 'Invalid request',
        message: parsed.message,
      });
      return;
    }

    try {
      const { summary, outcomes } = await validateRecords(parsed.records);

      const results = parsed.records.map(record => ({
        email: record.email,
        website: record.website ?? null,
        ...outcomes.get(record),
      }));

      logger.info(`POST /validate-batch - Completed ${results.length} records in ${Date.now() - startTime}ms`, {
        accepted: summary.accepted,
        rejected: summary.rejected,
      });

      res.json({ success: true, summary, results });

    } catch (error) {
      logger.error(`POST /validate-batch - Error after ${Date.now() - startTime}ms:`, error);
      res.status(500).json({
        success: false,
        error: 'Internal server error',
        message: 'An error occurred while validating the records',
      });
    }
  });

  /**
   * Upload and validate a CSV or Excel file
   * POST /upload-csv (multipart field "csv")
   *
   * Response: { "success": true, "summary": {...}, "passCsv": "...", "failCsv": "..." }
   */
  router.post('/upload-csv', upload.single('csv'), async (req: Request, res: Response) => {
    const startTime = Date.now();

    if (!req.file) {
      res.status(400).json({
        success: false,
        error: 'No file uploaded',
        message: 'Please upload a CSV or Excel file in the "csv" field',
      });
      return;
    }

    logger.info(`POST /upload-csv - Processing file: ${req.file.originalname}`);

    try {
      const records = await readRecordsFromBuffer(req.file.buffer, req.file.originalname);

      if (records.length === 0) {
        res.status(400).json({
          success: false,
          error: 'No records found',
          message: 'The file has a header row but no records',
        });
        return;
      }

      if (records.length > MAX_BATCH_SIZE) {
        logger.warn(`POST /upload-csv - Batch too large: ${records.length} records (max ${MAX_BATCH_SIZE})`);
        res.status(400).json({
          success: false,
          error: 'batch_too_large',
          message: `Maximum ${MAX_BATCH_SIZE} records allowed per upload. Received ${records.length}. Please split into smaller files.`,
        });
        return;
      }

      const { summary, outcomes } = await validateRecords(records);

      // Keep input order in both outputs
      const passRows: string[][] = [];
      const failRows: string[][] = [];
      for (const record of records) {
        const outcome = outcomes.get(record);
        if (outcome?.accepted) {
          passRows.push(passRow(record));
        } else if (outcome) {
          failRows.push(failRow(record, outcome));
        }
      }

      logger.info(`POST /upload-csv - Completed in ${Date.now() - startTime}ms`, {
        records: summary.total,
        accepted: summary.accepted,
        rejected: summary.rejected,
      });

      res.json({
        success: true,
        summary,
        passCsv: buildCsv(PASS_HEADERS, passRows),
        failCsv: buildCsv(FAIL_HEADERS, failRows),
      });

    } catch (error) {
      if (error instanceof InputFormatError) {
        res.status(400).json({
          success: false,
          error: 'Invalid file',
          message: error.message,
        });
        return;
      }
      logger.error(`POST /upload-csv - Error after ${Date.now() - startTime}ms:`, error);
      res.status(500).json({
        success: false,
        error: 'Internal server error',
        message: 'An error occurred while processing the file',
      });
    }
  });

  return router;
}
