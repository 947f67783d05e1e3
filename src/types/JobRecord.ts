import { z } from 'zod';

/**
 * Schema for a job posting extracted from a single XML feed element.
 * Only the source file is required: feeds of unknown schema rarely carry every field.
 */
export const JobRecordSchema = z.object({
  sourceFile: z.string().min(1, 'Source file is required'),
  jobId: z.string().optional(),
  referenceId: z.string().optional(),
  partnerJobId: z.string().optional(), // may arrive wrapped in CDATA
  jobName: z.string().optional(),
  companyId: z.string().optional(),
  companyName: z.string().optional(),
  teamIdentifier: z.string().optional(),
});

/**
 * TypeScript type for an extracted job record
 */
export type JobRecord = Readonly<z.infer<typeof JobRecordSchema>>;

/**
 * Semantic fields resolved through tag aliases
 */
export type JobField = Exclude<keyof JobRecord, 'sourceFile'>;

/**
 * Labelled view of a job record for display and JSON output
 */
export interface DisplayRecord {
  'File': string;
  'Job ID': string;
  'Reference ID': string;
  'Partner Job ID': string;
  'Job Name': string;
  'Company ID': string;
  'Company Name': string;
  'Team Identifier': string;
}

export const NOT_AVAILABLE = 'N/A';

/**
 * Validates a freshly extracted record and freezes it
 * @throws ZodError if the record does not match the schema
 */
export function createJobRecord(data: z.input<typeof JobRecordSchema>): JobRecord {
  return Object.freeze(JobRecordSchema.parse(data));
}

export function toDisplayRecord(job: JobRecord): DisplayRecord {
  return {
    'File': job.sourceFile,
    'Job ID': job.jobId || NOT_AVAILABLE,
    'Reference ID': job.referenceId || NOT_AVAILABLE,
    'Partner Job ID': job.partnerJobId || NOT_AVAILABLE,
    'Job Name': job.jobName || NOT_AVAILABLE,
    'Company ID': job.companyId || NOT_AVAILABLE,
    'Company Name': job.companyName || NOT_AVAILABLE,
    'Team Identifier': job.teamIdentifier || NOT_AVAILABLE,
  };
}
