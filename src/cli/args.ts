/**
 * Commands understood by the feed analyzer CLI
 */
export type CliCommand =
  | { kind: 'team'; team: string }
  | { kind: 'job'; team: string; job: string }
  | { kind: 'summary' }
  | { kind: 'all' }
  | { kind: 'help' }
  | { kind: 'invalid'; reason: string };

export interface CliOptions {
  command: CliCommand;
  /** Overrides the configured feeds directory */
  feedsDir?: string;
  json: boolean;
}

/**
 * Parse command line arguments (without the node and script entries)
 */
export function parseArgs(argv: readonly string[]): CliOptions {
  const positional: string[] = [];
  let feedsDir: string | undefined;
  let json = false;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '--dir':
      case '-d': {
        const value = argv[++i];
        if (value === undefined) {
          return { command: { kind: 'invalid', reason: `${arg} requires a directory` }, json };
        }
        feedsDir = value;
        break;
      }
      case '--json':
        json = true;
        break;
      case '--help':
      case '-h':
        help = true;
        break;
      default:
        positional.push(arg);
    }
  }

  return { command: help ? { kind: 'help' } : toCommand(positional), feedsDir, json };
}

function toCommand(positional: readonly string[]): CliCommand {
  const [name, ...rest] = positional;

  if (name === undefined) {
    return { kind: 'help' };
  }

  switch (name.toLowerCase()) {
    case 'team':
      return rest.length >= 1
        ? { kind: 'team', team: rest[0] }
        : { kind: 'invalid', reason: 'team requires <team_identifier>' };
    case 'job':
      return rest.length >= 2
        ? { kind: 'job', team: rest[0], job: rest[1] }
        : { kind: 'invalid', reason: 'job requires <team_identifier> <job_identifier>' };
    case 'summary':
      return { kind: 'summary' };
    case 'all':
      return { kind: 'all' };
    default:
      return { kind: 'invalid', reason: `Unrecognized command: ${name}` };
  }
}
