import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FeedCatalog } from '../../../src/catalog/FeedCatalog';
import { runCommand, USAGE } from '../../../src/cli/commands';
import { createLogger } from '../../../src/utils/logger';
import { loadXmlFixture } from '../../fixtures/xmlFixtures';

describe('runCommand', () => {
  const logger = createLogger('test', { silent: true });
  let feedsDir: string;
  let catalog: FeedCatalog;
  let output: string[];
  const write = (line: string) => {
    output.push(line);
  };

  beforeEach(() => {
    feedsDir = fs.mkdtempSync(path.join(os.tmpdir(), 'feed-cli-'));
    fs.writeFileSync(path.join(feedsDir, 'standard-feed.xml'), loadXmlFixture('standard-feed.xml'));
    catalog = new FeedCatalog({ feedsDir }, logger);
    output = [];
  });

  afterEach(() => {
    fs.rmSync(feedsDir, { recursive: true, force: true });
  });

  it('should print usage for help', () => {
    expect(runCommand({ kind: 'help' }, catalog, write)).toBe(0);
    expect(output).toEqual([USAGE]);
  });

  it('should fail on an invalid command', () => {
    expect(runCommand({ kind: 'invalid', reason: 'Unrecognized command: x' }, catalog, write)).toBe(1);
    expect(output).toEqual(['Unrecognized command: x. Use: team, job, summary, or all']);
  });

  it('should print a team search header followed by the table', () => {
    expect(runCommand({ kind: 'team', team: 'globex' }, catalog, write)).toBe(0);

    expect(output.slice(0, 3)).toEqual([
      "Search: Jobs from team 'globex'",
      'Results: 1 job(s) found',
      '',
    ]);
    expect(output).toContain('   Partner Job ID: 170001199359');
  });

  it('should print a job search header', () => {
    runCommand({ kind: 'job', team: 'acme', job: 'J-100' }, catalog, write);

    expect(output.slice(0, 2)).toEqual([
      "Search: Job 'J-100' from team 'acme'",
      'Results: 1 job(s) found',
    ]);
    expect(output).toContain('   Team:           Platform');
  });

  it('should print the summary', () => {
    runCommand({ kind: 'summary' }, catalog, write);

    expect(output).toEqual([
      'Job Summary by Team:',
      '',
      '   Acme Corp: 1 job(s)',
      '   Globex: 1 job(s)',
    ]);
  });

  it('should print jobs as JSON', () => {
    runCommand({ kind: 'all' }, catalog, write, true);

    expect(output).toHaveLength(1);
    const parsed: unknown = JSON.parse(output[0]);
    expect(parsed).toEqual([
      {
        'File': 'standard-feed.xml',
        'Job ID': 'J-100',
        'Reference ID': 'REF-1',
        'Partner Job ID': 'N/A',
        'Job Name': 'Backend Engineer',
        'Company ID': 'C-1',
        'Company Name': 'Acme Corp',
        'Team Identifier': 'Platform',
      },
      {
        'File': 'standard-feed.xml',
        'Job ID': 'J-200',
        'Reference ID': 'N/A',
        'Partner Job ID': '170001199359',
        'Job Name': 'Data Analyst',
        'Company ID': 'N/A',
        'Company Name': 'Globex',
        'Team Identifier': 'N/A',
      },
    ]);
  });

  it('should print the summary as JSON', () => {
    runCommand({ kind: 'summary' }, catalog, write, true);
    expect(JSON.parse(output[0])).toEqual([
      { team: 'Acme Corp', count: 1 },
      { team: 'Globex', count: 1 },
    ]);
  });

  it('should keep numeric team names in count order in the JSON summary', () => {
    fs.writeFileSync(
      path.join(feedsDir, 'teams.xml'),
      `<jobs>
        <job><jobId>1</jobId><company>Zeta</company></job>
        <job><jobId>2</jobId><company>7</company></job>
        <job><jobId>3</jobId><company>Zeta</company></job>
      </jobs>`
    );

    runCommand({ kind: 'summary' }, catalog, write, true);

    expect(JSON.parse(output[0])).toEqual([
      { team: 'Zeta', count: 2 },
      { team: 'Acme Corp', count: 1 },
      { team: 'Globex', count: 1 },
      { team: '7', count: 1 },
    ]);
  });
});
