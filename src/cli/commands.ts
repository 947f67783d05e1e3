import type { FeedCatalog } from '../catalog/FeedCatalog';
import { toDisplayRecord, type JobRecord } from '../types/JobRecord';
import type { CliCommand } from './args';
import { formatJobsTable, formatSummary, sortSummary } from './JobPrinter';

export const USAGE = `XML Feed Analyzer

Usage: feed-analyzer <command> [options]

Commands:
  team <team_identifier>                   List all jobs from a team
  job <team_identifier> <job_identifier>   Find a specific job from a team
  summary                                  Count jobs per team
  all                                      List every job

Options:
  -d, --dir <path>   Feeds directory (default: FEEDS_DIR or ./XMLFEEDS)
  --json             Print JSON instead of tables
  -h, --help         Show this help message

Examples:
  feed-analyzer team 'Acme Corp'
  feed-analyzer job 'Acme Corp' 'Senior Developer'
  feed-analyzer summary --json`;

export type Write = (line: string) => void;

function writeJobs(jobs: readonly JobRecord[], json: boolean, write: Write): void {
  if (json) {
    write(JSON.stringify(jobs.map(toDisplayRecord), null, 2));
    return;
  }
  formatJobsTable(jobs).forEach((line) => write(line));
}

/**
 * Runs a parsed command against the catalog
 * @returns Process exit code
 */
export function runCommand(
  command: CliCommand,
  catalog: FeedCatalog,
  write: Write,
  json = false
): number {
  switch (command.kind) {
    case 'help':
      write(USAGE);
      return 0;
    case 'invalid':
      write(`${command.reason}. Use: team, job, summary, or all`);
      return 1;
    case 'team': {
      const jobs = catalog.findByTeam(command.team);
      if (!json) {
        write(`Search: Jobs from team '${command.team}'`);
        write(`Results: ${jobs.length} job(s) found`);
        write('');
      }
      writeJobs(jobs, json, write);
      return 0;
    }
    case 'job': {
      const jobs = catalog.findByTeamAndJob(command.team, command.job);
      if (!json) {
        write(`Search: Job '${command.job}' from team '${command.team}'`);
        write(`Results: ${jobs.length} job(s) found`);
        write('');
      }
      writeJobs(jobs, json, write);
      return 0;
    }
    case 'summary': {
      const summary = catalog.summarizeByTeam();
      if (json) {
        const entries = sortSummary(summary).map(([team, count]) => ({ team, count }));
        write(JSON.stringify(entries, null, 2));
      } else {
        formatSummary(summary).forEach((line) => write(line));
      }
      return 0;
    }
    case 'all':
      writeJobs(catalog.listAll(), json, write);
      return 0;
  }
}
