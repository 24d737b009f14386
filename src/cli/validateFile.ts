#!/usr/bin/env node
/**
 * Bulk email validation from a CSV or Excel file.
 *
 * Usage:
 *   npm run validate-file -- <file> [options]
 *   email-pipeline <file> [options]
 *
 * Options:
 *   --concurrency <n>    Parallel validations (default: BULK_CONCURRENCY or 10)
 *   --pass <file>        Output for accepted records (default: pass.csv)
 *   --fail <file>        Output for rejected records (default: fail.csv)
 *   --skip-smtp          Stop after DNS and website checks
 *   --help, -h           Show help
 */

import { getErrorMessage } from '../types/errors';
import { logger } from '../utils/logger';
import { main } from './bulkCommand';

// Run CLI
if (require.main === module) {
  main()
    .then(code => process.exit(code))
    .catch(error => {
      console.error('❌ Fatal error:', getErrorMessage(error));
      logger.error('CLI fatal error:', error);
      process.exit(1);
    });
}
