/**
 * Argument parsing for the bulk validation CLI
 */

/**
 * CLI configuration parsed from arguments
 */
export interface CliOptions {
  inputFile: string;
  concurrency?: number;
  passFile: string;
  failFile: string;
  skipSmtp: boolean;
  showHelp: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Parse command line arguments
 * @throws CliUsageError on unknown flags or bad values
 */
export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    inputFile: '',
    passFile: 'pass.csv',
    failFile: 'fail.csv',
    skipSmtp: false,
    showHelp: false,
  };

  const takeValue = (flag: string, index: number): string => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new CliUsageError(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--help':
      case '-h':
        options.showHelp = true;
        break;
      case '--skip-smtp':
        options.skipSmtp = true;
        break;
      case '--concurrency': {
        const value = takeValue(arg, i++);
        const parsed = Number(value);
        if (!Number.isInteger(parsed) || parsed < 1) {
          throw new CliUsageError(`--concurrency must be an integer >= 1 (got: ${value})`);
        }
        options.concurrency = parsed;
        break;
      }
      case '--pass':
        options.passFile = takeValue(arg, i++);
        break;
      case '--fail':
        options.failFile = takeValue(arg, i++);
        break;
      default:
        if (arg.startsWith('-')) {
          throw new CliUsageError(`Unknown option: ${arg}`);
        }
        if (options.inputFile) {
          throw new CliUsageError(`Unexpected argument: ${arg}`);
        }
        options.inputFile = arg;
    }
  }

  return options;
}
