import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from '../utils/logger';
import type { JobRecord } from '../types/JobRecord';
import { XmlFeedParser } from '../extractor/XmlFeedParser';
import { FeedParseError } from '../extractor/FeedParseError';
import { matchesTeam, matchesTeamAndJob } from '../matcher/JobMatcher';

export const UNKNOWN_TEAM = 'Unknown Team';

/**
 * A feed file that contributed no records because it could not be processed
 */
export interface FeedFailure {
  file: string;
  kind: 'malformed' | 'processing';
  message: string;
}

/**
 * Progress reported after each feed file
 */
export interface ScanProgress {
  completed: number;
  total: number;
  file: string;
  jobsFound: number;
}

export interface FeedCatalogOptions {
  /** Directory scanned for feed files */
  feedsDir: string;
  /** Extension of feed files, compared case-sensitively (default ".xml") */
  feedExtension?: string;
  /** Parser to use; one is created with the catalog's logger when omitted */
  parser?: XmlFeedParser;
  onProgress?: (progress: ScanProgress) => void;
}

/**
 * Owns the feed directory: extracts every feed once, then answers team and job queries
 * from the cached records. Files are assumed not to change during the process lifetime.
 */
export class FeedCatalog {
  private readonly feedsDir: string;
  private readonly feedExtension: string;
  private readonly parser: XmlFeedParser;
  private readonly logger: Logger;
  private readonly onProgress?: (progress: ScanProgress) => void;
  private readonly failures: FeedFailure[] = [];
  private cachedJobs: readonly JobRecord[] | null = null;

  /**
   * Creates a new FeedCatalog instance
   * @param options - Directory, extension, parser and progress callback
   * @param logger - Logger instance
   */
  constructor(options: FeedCatalogOptions, logger: Logger) {
    this.feedsDir = options.feedsDir;
    this.feedExtension = options.feedExtension ?? '.xml';
    this.parser = options.parser ?? new XmlFeedParser(logger);
    this.onProgress = options.onProgress;
    this.logger = logger;

    if (!fs.existsSync(this.feedsDir)) {
      fs.mkdirSync(this.feedsDir, { recursive: true });
      this.logger.info('Created feeds directory', { feedsDir: this.feedsDir });
    }
  }

  /**
   * Extracts job records from every feed file, in file name order.
   * The first call does the work; later calls return the same list.
   */
  scanAndExtract(): readonly JobRecord[] {
    if (this.cachedJobs) {
      return this.cachedJobs;
    }

    const files = this.listFeedFiles();

    if (files.length === 0) {
      this.logger.warn('No feed files found', {
        feedsDir: this.feedsDir,
        feedExtension: this.feedExtension,
      });
      this.cachedJobs = [];
      return this.cachedJobs;
    }

    this.logger.info('Analyzing feed files', { totalFiles: files.length });

    const allJobs: JobRecord[] = [];

    files.forEach((file, index) => {
      const jobs = this.processFile(file);
      allJobs.push(...jobs);

      const completed = index + 1;
      this.logger.info('Processed feed file', {
        file,
        jobsFound: jobs.length,
        progress: `${((completed / files.length) * 100).toFixed(1)}%`,
        remaining: files.length - completed,
      });
      this.onProgress?.({ completed, total: files.length, file, jobsFound: jobs.length });
    });

    this.logger.info('Feed analysis complete', {
      totalJobs: allJobs.length,
      totalFiles: files.length,
      failedFiles: this.failures.length,
    });

    this.cachedJobs = Object.freeze(allJobs);
    return this.cachedJobs;
  }

  listAll(): readonly JobRecord[] {
    return this.scanAndExtract();
  }

  /**
   * Searches for all jobs from a team (company id, company name or team field)
   */
  findByTeam(teamQuery: string): JobRecord[] {
    const matching = this.scanAndExtract().filter((job) => matchesTeam(job, teamQuery));

    this.logger.info('Searched jobs by team', { teamQuery, results: matching.length });

    return matching;
  }

  /**
   * Searches for a specific job within a team; both queries must match
   */
  findByTeamAndJob(teamQuery: string, jobQuery: string): JobRecord[] {
    const matching = this.scanAndExtract().filter((job) =>
      matchesTeamAndJob(job, teamQuery, jobQuery)
    );

    this.logger.info('Searched job within team', { teamQuery, jobQuery, results: matching.length });

    return matching;
  }

  /**
   * Counts jobs per team, keyed by company name, else company id, else team field
   */
  summarizeByTeam(): Map<string, number> {
    const summary = new Map<string, number>();

    for (const job of this.scanAndExtract()) {
      const teamKey = job.companyName || job.companyId || job.teamIdentifier || UNKNOWN_TEAM;
      summary.set(teamKey, (summary.get(teamKey) ?? 0) + 1);
    }

    return summary;
  }

  /**
   * Feed files skipped during the scan
   */
  getFailures(): readonly FeedFailure[] {
    return this.failures;
  }

  private listFeedFiles(): string[] {
    return fs
      .readdirSync(this.feedsDir, { withFileTypes: true })
      // Symlinks are kept unresolved; a dangling one fails when read and is recorded
      .filter(
        (entry) =>
          (entry.isFile() || entry.isSymbolicLink()) &&
          path.extname(entry.name) === this.feedExtension
      )
      .map((entry) => entry.name)
      .sort();
  }

  /**
   * Parses one feed file. Any failure is logged and yields no records.
   */
  private processFile(file: string): JobRecord[] {
    try {
      const bytes = fs.readFileSync(path.join(this.feedsDir, file));
      return this.parser.parseBuffer(bytes, file);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      if (error instanceof FeedParseError) {
        this.logger.warn('Skipping malformed feed file', {
          file,
          line: error.line,
          column: error.column,
          error: message,
        });
        this.failures.push({ file, kind: 'malformed', message });
      } else {
        this.logger.warn('Failed to process feed file', { file, error: message });
        this.failures.push({ file, kind: 'processing', message });
      }

      return [];
    }
  }
}
