import * as cheerio from 'cheerio';
import { XMLValidator } from 'fast-xml-parser';
import { isCDATA, isTag, isText, type Element } from 'domhandler';
import type { Logger } from '../utils/logger';
import { createJobRecord, type JobField, type JobRecord } from '../types/JobRecord';
import { FALLBACK_REQUIRED_FIELDS, FIELD_ALIASES, JOB_CONTAINER_ALIASES } from './fieldAliases';
import { FeedParseError } from './FeedParseError';
import { decodeFeed } from './feedEncoding';
import { expandEntities } from './xmlEntities';

/**
 * Strips a namespace prefix from a qualified tag name ("ns:title" -> "title")
 */
export function localName(tagName: string): string {
  return tagName.slice(tagName.indexOf(':') + 1);
}

/**
 * Returns the trimmed text an element carries before its first child element.
 * CDATA sections count as plain text; comments are skipped.
 */
export function ownText(element: Element): string {
  let text = '';

  for (const child of element.children) {
    if (isTag(child)) {
      break;
    }
    if (isText(child)) {
      text += child.data;
    } else if (isCDATA(child)) {
      text += child.children.filter(isText).map((node) => node.data).join('');
    }
  }

  return text.trim();
}

/**
 * Both lookups tried for every alias: the bare tag name first, then the same
 * local name under any namespace prefix.
 */
const TAG_MATCHERS: ReadonlyArray<(element: Element, alias: string) => boolean> = [
  (element, alias) => element.name === alias,
  (element, alias) => localName(element.name) === alias,
];

/**
 * Resolves the first non-empty value among candidate elements for an ordered alias list.
 * For each alias and lookup variant only the first matching element (document order)
 * is considered; an empty one lets the search move on.
 * @param candidates - Descendants of the job element, in document order
 */
export function resolveAlias(
  candidates: readonly Element[],
  aliases: readonly string[]
): string | undefined {
  for (const alias of aliases) {
    for (const matches of TAG_MATCHERS) {
      const found = candidates.find((element) => matches(element, alias));
      const text = found ? ownText(found) : '';
      if (text) {
        return text;
      }
    }
  }
  return undefined;
}

export function extractField(candidates: readonly Element[], field: JobField): string | undefined {
  return resolveAlias(candidates, FIELD_ALIASES[field]);
}

/**
 * Partner job ids get the same two-pass lookup and never borrow another field's value
 */
export function extractPartnerJobId(candidates: readonly Element[]): string | undefined {
  return resolveAlias(candidates, FIELD_ALIASES.partnerJobId);
}

/**
 * Finds every job container below the given candidates, each element at most once.
 * Aliases are tried in table order, and matches within an alias keep document order.
 */
export function findJobElements(candidates: readonly Element[]): Element[] {
  const visited = new Set<Element>();
  const jobs: Element[] = [];

  for (const alias of JOB_CONTAINER_ALIASES) {
    for (const matches of TAG_MATCHERS) {
      for (const element of candidates) {
        if (!visited.has(element) && matches(element, alias)) {
          visited.add(element);
          jobs.push(element);
        }
      }
    }
  }

  return jobs;
}

function assertWellFormed(content: string, sourceFile: string): void {
  const validation = XMLValidator.validate(content);
  if (validation !== true) {
    throw new FeedParseError(sourceFile, validation.err.msg, validation.err.line, validation.err.col);
  }
}

/**
 * Parser extracting job records from XML feeds whose schema is not known in advance
 */
export class XmlFeedParser {
  private readonly logger: Logger;

  /**
   * Creates a new XmlFeedParser instance
   * @param logger - Logger instance
   */
  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Parses one XML document into job records.
   * Falls back to treating the root as a single job when no container tags exist.
   * @param xml - Raw document content
   * @param sourceFile - Name of the originating file, stored on every record
   * @throws FeedParseError if the document is not well-formed
   */
  parseDocument(xml: string, sourceFile: string): JobRecord[] {
    const source = xml.replace(/^\uFEFF/, '');
    assertWellFormed(source, sourceFile);

    const { content, expanded } = expandEntities(source, sourceFile);
    if (expanded > 0) {
      assertWellFormed(content, sourceFile);
    }

    const $ = cheerio.load(content, { xml: true });
    const root = $.root().children().get(0);
    if (!root) {
      throw new FeedParseError(sourceFile, 'document has no root element');
    }

    const descendantsOf = (element: Element): Element[] => $(element).find('*').toArray();

    const jobElements = findJobElements(descendantsOf(root));
    if (jobElements.length > 0) {
      const jobs = jobElements.map((element) =>
        this.buildRecord(descendantsOf(element), sourceFile)
      );

      this.logger.debug('Parsed feed document', {
        sourceFile,
        root: root.name,
        containers: jobElements.length,
        jobs: jobs.length,
      });

      return jobs;
    }

    const fallback = this.buildRecord(descendantsOf(root), sourceFile);
    const keep = FALLBACK_REQUIRED_FIELDS.some((field) => Boolean(fallback[field]));

    this.logger.debug('No job containers found, used document root', {
      sourceFile,
      root: root.name,
      kept: keep,
    });

    return keep ? [fallback] : [];
  }

  /**
   * Decodes raw feed bytes (BOM, then XML declaration, then UTF-8) and parses them
   * @throws FeedParseError if the bytes do not decode or the document is not well-formed
   */
  parseBuffer(bytes: Uint8Array, sourceFile: string): JobRecord[] {
    return this.parseDocument(decodeFeed(bytes, sourceFile), sourceFile);
  }

  private buildRecord(candidates: readonly Element[], sourceFile: string): JobRecord {
    return createJobRecord({
      sourceFile,
      jobId: extractField(candidates, 'jobId'),
      referenceId: extractField(candidates, 'referenceId'),
      partnerJobId: extractPartnerJobId(candidates),
      jobName: extractField(candidates, 'jobName'),
      companyId: extractField(candidates, 'companyId'),
      companyName: extractField(candidates, 'companyName'),
      teamIdentifier: extractField(candidates, 'teamIdentifier'),
    });
  }
}
