import type { SeederOptions } from './types/schema';
import {
  parseDefaults,
  parseIntegerOption,
  parsePairs,
  parseTimestampPolicy,
  splitList,
} from './config/seederConfig';
import { closeDb } from './db/postgres';
import { createDefaultDependencies, runSeeder, SeederConfigError } from './seeder';
import { errorMessage } from './seeder/errors';

export const USAGE = `Usage: npm run seed -- <file> [options]

Options:
  --table <name>          Destination table (default: file name without extension)
  --delimiter <char>      Field delimiter, "tab" for TAB (default: ;)
  --no-truncate           Keep the rows already in the table
  --no-header             The file has no header row
  --mapping <a,b,...>     Column names used instead of the header
  --alias <from=to,...>   Rename header columns
  --hash <a,b,...>        Columns to hash (default: password; empty for none)
  --default <k=v,...>     Values for columns the file leaves empty
  --skip-prefix <prefix>  Skip header columns starting with prefix (default: %)
  --timestamps <value>    true, false or a literal timestamp (default: true)
  --offset <n>            Data rows to skip after the header (default: 0)
  --chunk <n>             Rows per insert (default: 50)
  --base-path <dir>       Directory the file path is resolved against`;

/**
 * Parse command line arguments into seeder options.
 * Accepts both `--opt value` and `--opt=value`.
 */
export function parseCliArgs(argv: readonly string[]): SeederOptions {
  const options: SeederOptions = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (!arg.startsWith('--')) {
      if (options.source !== undefined) {
        throw new SeederConfigError('invalid-option', `Unexpected argument "${arg}"`);
      }
      options.source = arg;
      continue;
    }

    if (arg === '--no-truncate') {
      options.truncate = false;
      continue;
    }
    if (arg === '--no-header') {
      options.hasHeader = false;
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg : arg.slice(0, eq);
    let value: string | undefined = eq === -1 ? undefined : arg.slice(eq + 1);
    if (value === undefined) {
      value = argv[++i];
      if (value === undefined) {
        throw new SeederConfigError('invalid-option', `Option ${name} expects a value`);
      }
    }

    switch (name) {
      case '--table': options.tableName = value; break;
      case '--delimiter': options.delimiter = value === 'tab' ? '\t' : value; break;
      case '--mapping': options.columnMapping = splitList(value); break;
      case '--alias': options.aliasMap = parsePairs(value); break;
      case '--hash': options.hashFields = splitList(value); break;
      case '--default': options.defaults = parseDefaults(value); break;
      case '--skip-prefix': options.skipPrefix = value; break;
      case '--timestamps': options.timestampPolicy = parseTimestampPolicy(value); break;
      case '--offset': options.rowOffset = parseIntegerOption(value, name); break;
      case '--chunk': options.chunkSize = parseIntegerOption(value, name); break;
      case '--base-path': options.basePath = value; break;
      default:
        throw new SeederConfigError('invalid-option', `Unknown option ${name}`);
    }
  }

  return options;
}

/**
 * Seed one table and return the process exit code.
 */
export async function main(argv: readonly string[]): Promise<number> {
  let options: SeederOptions;

  try {
    options = parseCliArgs(argv);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    console.error(USAGE);
    return 1;
  }

  try {
    const result = await runSeeder(options, createDefaultDependencies());
    return result.status === 'completed' ? 0 : 1;
  } finally {
    await closeDb();
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error('Error seeding CSV file:', error);
      process.exit(1);
    });
}
