/**
 * The bulk validation command: argument handling, file I/O, progress and
 * the run summary. Exits 0 once the run completes, whatever the individual
 * records' outcome, and 1 when the input cannot be read or the
 * configuration is invalid.
 */

import { createInterface } from 'readline/promises';
import { AppConfig, loadConfig, validateConfig } from '../config/env';
import { openRecordFile } from '../io/recordReader';
import { CsvResultSink } from '../io/resultWriter';
import { BulkRunSummary, RecordSource, runBulkValidation } from '../services/bulkRunner';
import { ConfigError, InputFormatError, getErrorCode, getErrorMessage } from '../types/errors';
import { CliOptions, parseArgs } from './args';

/**
 * Display help message
 */
function showHelp(): void {
  console.log(`
Email Pipeline Validator
━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━

USAGE
  email-pipeline [file] [options]
  npm run validate-file -- [file] [options]

ARGUMENTS
  [file]                CSV or Excel file with an "Email" column and an
                        optional "Web Address" column. Prompted for when
                        omitted.

OPTIONS
  --concurrency <n>     Parallel validations (default: 10)
  --pass <file>         Output for accepted records (default: pass.csv)
  --fail <file>         Output for rejected records (default: fail.csv)
  --skip-smtp           Skip the SMTP mailbox check
  --help, -h            Show this help message

OUTPUT
  pass.csv  Email,Web Address
  fail.csv  Email,Web Address,Reason

  Press Ctrl+C once to stop after the records in flight; results so far
  are still written.
`);
}

async function promptForFile(): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question('Enter CSV filename: ')).trim();
  } finally {
    rl.close();
  }
}

function printSummary(summary: BulkRunSummary, options: CliOptions): void {
  console.log('\n' + '━'.repeat(50));
  if (summary.cancelled) {
    console.log('Run stopped before the end of the input');
  }
  console.log(`Passed: ${summary.accepted}`);
  console.log(`Failed: ${summary.rejected}`);

  const reasons = Object.entries(summary.byReason);
  if (reasons.length > 0) {
    console.log('\nBy reason:');
    for (const [reason, count] of reasons) {
      console.log(`  ${reason.padEnd(22)} ${count}`);
    }
  }

  console.log(`\n⏱  ${summary.total} record(s) in ${(summary.durationMs / 1000).toFixed(2)}s`);
  console.log(`Accepted written to: ${options.passFile}`);
  console.log(`Rejected written to: ${options.failFile}`);
}

/**
 * Main CLI function
 * @returns process exit code
 */
export async function main(args: string[] = process.argv.slice(2)): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (error) {
    console.error(`❌ Error: ${getErrorMessage(error)}`);
    console.error('Run with --help for usage information');
    return 1;
  }

  if (options.showHelp) {
    showHelp();
    return 0;
  }

  let config: AppConfig;
  try {
    config = loadConfig();
    validateConfig(config);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`❌ ${error.message}`);
      return 1;
    }
    throw error;
  }

  const inputFile = options.inputFile || await promptForFile();
  if (!inputFile) {
    console.error('❌ Error: No input file given');
    return 1;
  }

  let records: RecordSource;
  try {
    records = await openRecordFile(inputFile);
  } catch (error) {
    const reason = getErrorCode(error) === 'ENOENT' ? 'File not found' : getErrorMessage(error);
    console.error(`❌ Error: ${reason}: ${inputFile}`);
    return 1;
  }

  const skipSmtp = options.skipSmtp || config.pipeline.skipSmtp;
  console.log('Email Pipeline Validator');
  console.log('━'.repeat(50));
  console.log(`Input file:   ${inputFile}`);
  console.log(`Concurrency:  ${options.concurrency ?? config.bulkConcurrency}`);
  console.log(`SMTP check:   ${skipSmtp ? 'Disabled' : 'Enabled'}`);
  console.log('━'.repeat(50));

  const sink = await CsvResultSink.open(options.passFile, options.failFile);

  // First Ctrl+C drains in-flight records; the default handler is back for a second one
  const controller = new AbortController();
  const onSigint = () => {
    console.log('\nStopping after in-flight records...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  let summary: BulkRunSummary;
  try {
    summary = await runBulkValidation(records, sink, {
      config: { ...config.pipeline, skipSmtp },
      concurrency: options.concurrency ?? config.bulkConcurrency,
      signal: controller.signal,
      onOutcome: (_record, _outcome, completed) => {
        process.stdout.write(`\rValidating: ${completed} record(s) done`);
      },
    });
  } catch (error) {
    if (error instanceof InputFormatError) {
      console.error(`\n❌ Error: ${error.message}`);
      return 1;
    }
    throw error;
  } finally {
    process.removeListener('SIGINT', onSigint);
    await sink.close();
  }

  printSummary(summary, options);
  return 0;
}
