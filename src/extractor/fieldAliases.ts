import type { JobField } from '../types/JobRecord';

/**
 * Candidate tag names per field, in priority order. The first alias whose
 * element carries non-empty text wins; later aliases are not consulted.
 */
export const FIELD_ALIASES = {
  jobId: ['jobId', 'job-id', 'id', 'JobID', 'ID', 'requisitionId'],
  referenceId: [
    'referenceId', 'reference-id', 'refId', 'ref-id',
    'ReferenceID', 'refNumber', 'requisitionNumber',
  ],
  partnerJobId: ['partnerJobId', 'partner-job-id', 'PartnerJobId', 'partnerjobid'],
  jobName: [
    'title', 'jobTitle', 'job-title', 'name', 'jobName',
    'position', 'positionTitle', 'Title',
  ],
  companyId: [
    'companyId', 'company-id', 'clientId', 'client-id',
    'CompanyID', 'teamId', 'team-id',
  ],
  companyName: [
    'company', 'companyName', 'company-name', 'client', 'clientName',
    'Company', 'employer', 'organization', 'teamName',
  ],
  teamIdentifier: ['team', 'department', 'division', 'businessUnit', 'Team', 'Department'],
} as const satisfies Record<JobField, readonly string[]>;

/**
 * Tag names believed to wrap a single job posting
 */
export const JOB_CONTAINER_ALIASES = [
  'job', 'Job', 'position', 'Position', 'vacancy',
  'Vacancy', 'requisition', 'Requisition', 'posting',
] as const;

/**
 * A record built from the whole document is kept only if one of these is present
 */
export const FALLBACK_REQUIRED_FIELDS = ['jobId', 'referenceId', 'jobName'] as const satisfies readonly JobField[];
