import { NOT_AVAILABLE, type JobRecord } from '../types/JobRecord';

const RULE = '='.repeat(100);

/**
 * Formats jobs as console blocks, one per job
 */
export function formatJobsTable(jobs: readonly JobRecord[]): string[] {
  if (jobs.length === 0) {
    return ['No jobs found.'];
  }

  const lines = [RULE];

  jobs.forEach((job, index) => {
    lines.push(
      '',
      `Job #${index + 1}`,
      `   File:           ${job.sourceFile}`,
      `   Job ID:         ${job.jobId || NOT_AVAILABLE}`,
      `   Partner Job ID: ${job.partnerJobId || NOT_AVAILABLE}`,
      `   Reference ID:   ${job.referenceId || NOT_AVAILABLE}`,
      `   Job Name:       ${job.jobName || NOT_AVAILABLE}`,
      `   Company Name:   ${job.companyName || NOT_AVAILABLE}`,
      `   Company ID:     ${job.companyId || NOT_AVAILABLE}`
    );
    if (job.teamIdentifier) {
      lines.push(`   Team:           ${job.teamIdentifier}`);
    }
  });

  lines.push('', RULE);
  return lines;
}

/**
 * Sorts team counts, largest first; ties keep first-seen order
 */
export function sortSummary(summary: ReadonlyMap<string, number>): Array<[string, number]> {
  return [...summary.entries()].sort((a, b) => b[1] - a[1]);
}

export function formatSummary(summary: ReadonlyMap<string, number>): string[] {
  return [
    'Job Summary by Team:',
    '',
    ...sortSummary(summary).map(([team, count]) => `   ${team}: ${count} job(s)`),
  ];
}
