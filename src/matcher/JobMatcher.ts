import type { JobRecord } from '../types/JobRecord';

/**
 * Fields a team query is matched against
 */
export const TEAM_FIELDS = ['companyId', 'companyName', 'teamIdentifier'] as const;

/**
 * Fields a job query is matched against before the partner id rule
 */
export const JOB_FIELDS = ['jobId', 'referenceId', 'jobName'] as const;

function containsIgnoreCase(values: ReadonlyArray<string | undefined>, query: string): boolean {
  const needle = query.toLowerCase();
  return values.some((value) => (value ? value.toLowerCase().includes(needle) : false));
}

/**
 * Checks whether the job belongs to the searched team (case-insensitive substring)
 */
export function matchesTeam(job: JobRecord, teamQuery: string): boolean {
  return containsIgnoreCase(TEAM_FIELDS.map((field) => job[field]), teamQuery);
}

/**
 * Partner ids may embed other identifiers, so spaces are ignored and the query only
 * has to appear somewhere inside the id. Searching "1199359" finds "170001199359".
 */
export function matchesPartnerJobId(partnerJobId: string, jobQuery: string): boolean {
  const partnerClean = partnerJobId.replaceAll(' ', '').toLowerCase();
  const queryClean = jobQuery.replaceAll(' ', '').toLowerCase();

  return partnerClean === queryClean || partnerClean.includes(queryClean);
}

/**
 * Checks whether the job is the searched one: by id, reference or name, or by partner id
 */
export function matchesJob(job: JobRecord, jobQuery: string): boolean {
  if (containsIgnoreCase(JOB_FIELDS.map((field) => job[field]), jobQuery)) {
    return true;
  }

  return job.partnerJobId ? matchesPartnerJobId(job.partnerJobId, jobQuery) : false;
}

export function matchesTeamAndJob(job: JobRecord, teamQuery: string, jobQuery: string): boolean {
  return matchesTeam(job, teamQuery) && matchesJob(job, jobQuery);
}
