import { ConfigError } from '../errors';
import type { FailureMode } from './dataset-builder';

export interface CliArgs {
  output?: string;
  queries: string[];
  failureMode: FailureMode;
  list: boolean;
  dryRun: boolean;
  help: boolean;
}

export const USAGE = `Usage: generate-dashboard-data [options]

Options:
  --output <path>    Output JSON file (default: $DASHBOARD_OUTPUT_PATH or dashboard-data.json)
  --query <name>     Run only the named query; repeatable or comma-separated
  --keep-failed      Write failed queries as [] instead of leaving them out
  --list             Print the query names and exit
  --dry-run          Run the queries but do not write the file
  --help             Show this message
`;

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    queries: [],
    failureMode: 'omit',
    list: false,
    dryRun: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--output': {
        const value = argv[++i];
        if (!value) throw new ConfigError(['--output requires a path']);
        args.output = value;
        break;
      }
      case '--query': {
        const value = argv[++i];
        const names = (value ?? '').split(',').map(name => name.trim()).filter(Boolean);
        if (names.length === 0) throw new ConfigError(['--query requires a name']);
        args.queries.push(...names);
        break;
      }
      case '--keep-failed':
        args.failureMode = 'empty';
        break;
      case '--list':
        args.list = true;
        break;
      case '--dry-run':
        args.dryRun = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        throw new ConfigError([`Unknown argument: ${arg}`]);
    }
  }

  return args;
}
