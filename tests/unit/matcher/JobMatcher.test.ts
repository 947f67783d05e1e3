import { describe, it, expect } from 'vitest';
import {
  matchesTeam,
  matchesJob,
  matchesPartnerJobId,
  matchesTeamAndJob,
} from '../../../src/matcher/JobMatcher';
import { createJobRecord } from '../../../src/types/JobRecord';

describe('JobMatcher', () => {
  const job = createJobRecord({
    sourceFile: 'feed.xml',
    jobId: 'J-100',
    referenceId: 'REF-42',
    jobName: 'Senior Backend Engineer',
    companyId: 'ACME-01',
    companyName: 'Acme Corp',
  });

  describe('matchesTeam', () => {
    it('should match a substring of the company name ignoring case', () => {
      expect(matchesTeam(job, 'acme c')).toBe(true);
    });

    it('should match the company id', () => {
      expect(matchesTeam(job, '-01')).toBe(true);
    });

    it('should match the team identifier', () => {
      const teamJob = createJobRecord({ sourceFile: 'feed.xml', teamIdentifier: 'Platform' });
      expect(matchesTeam(teamJob, 'PLATFORM')).toBe(true);
    });

    it('should not match text that appears in no team field', () => {
      expect(matchesTeam(job, 'globex')).toBe(false);
    });

    it('should not match job fields', () => {
      expect(matchesTeam(job, 'backend')).toBe(false);
    });

    it('should match an empty query only when a team field is present', () => {
      expect(matchesTeam(job, '')).toBe(true);
      expect(matchesTeam(createJobRecord({ sourceFile: 'feed.xml', jobId: '1' }), '')).toBe(false);
    });
  });

  describe('matchesJob', () => {
    it('should match the job id, reference or name', () => {
      expect(matchesJob(job, 'j-100')).toBe(true);
      expect(matchesJob(job, 'ref-4')).toBe(true);
      expect(matchesJob(job, 'backend engineer')).toBe(true);
    });

    it('should not match team fields', () => {
      expect(matchesJob(job, 'acme')).toBe(false);
    });

    it('should find a partner id that contains the query', () => {
      const partnerJob = createJobRecord({ sourceFile: 'feed.xml', partnerJobId: '170001199359' });
      expect(matchesJob(partnerJob, '1199359')).toBe(true);
      expect(matchesJob(partnerJob, '999')).toBe(false);
    });

    it('should skip the partner rule when the record has no partner id', () => {
      expect(matchesJob(createJobRecord({ sourceFile: 'feed.xml' }), '1')).toBe(false);
    });
  });

  describe('matchesPartnerJobId', () => {
    it('should match on equality', () => {
      expect(matchesPartnerJobId('ABC123', 'abc123')).toBe(true);
    });

    it('should ignore spaces on both sides', () => {
      expect(matchesPartnerJobId('1700 0119 9359', '119 9359')).toBe(true);
    });

    it('should match a suffix', () => {
      expect(matchesPartnerJobId('170001199359', '9359')).toBe(true);
    });

    it('should reject a query longer than the partner id', () => {
      expect(matchesPartnerJobId('9359', '170001199359')).toBe(false);
    });
  });

  describe('matchesTeamAndJob', () => {
    it('should require both the team and the job to match', () => {
      expect(matchesTeamAndJob(job, 'acme', 'backend')).toBe(true);
      expect(matchesTeamAndJob(job, 'globex', 'backend')).toBe(false);
      expect(matchesTeamAndJob(job, 'acme', 'frontend')).toBe(false);
    });
  });
});
