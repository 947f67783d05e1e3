import { FeedParseError } from './FeedParseError';

const PREDEFINED_ENTITIES: ReadonlySet<string> = new Set(['amp', 'lt', 'gt', 'quot', 'apos']);

const MAX_EXPANSION_DEPTH = 8;
const MAX_EXPANDED_LENGTH = 1_000_000;

const INTERNAL_ENTITY = /<!ENTITY\s+([A-Za-z_:][\w.:-]*)\s+(?:"([^"]*)"|'([^']*)')\s*>/g;
const EXTERNAL_ENTITY = /<!ENTITY\s+([A-Za-z_:][\w.:-]*)\s+(?:SYSTEM|PUBLIC)\b/g;
const ENTITY_REFERENCE = /&(#?[\w.:-]+);/g;
// CDATA, comments and processing instructions are matched whole so references inside are skipped
const MARKUP_OR_REFERENCE = /<!\[CDATA\[[\s\S]*?\]\]>|<!--[\s\S]*?-->|<\?[\s\S]*?\?>|&(#?[\w.:-]+);/g;

interface DoctypeSpan {
  start: number;
  end: number;
  internalSubset: string;
}

interface EntityTable {
  internal: Map<string, string>;
  external: Set<string>;
}

export interface ExpandedDocument {
  /** Document with the DOCTYPE removed and declared entities replaced */
  content: string;
  /** Number of references replaced */
  expanded: number;
}

function findDoctype(content: string): DoctypeSpan | undefined {
  const start = content.search(/<!DOCTYPE\b/);
  if (start === -1) {
    return undefined;
  }

  let depth = 0;
  for (let i = start; i < content.length; i++) {
    if (content[i] === '<') {
      depth++;
    } else if (content[i] === '>') {
      depth--;
      if (depth === 0) {
        const declaration = content.slice(start, i + 1);
        const open = declaration.indexOf('[');
        const close = declaration.lastIndexOf(']');
        return {
          start,
          end: i + 1,
          internalSubset: open !== -1 && close > open ? declaration.slice(open + 1, close) : '',
        };
      }
    }
  }

  return undefined;
}

function readEntityTable(internalSubset: string): EntityTable {
  const internal = new Map<string, string>();
  const external = new Set<string>();

  for (const match of internalSubset.matchAll(INTERNAL_ENTITY)) {
    // The first declaration of a name is binding
    if (!internal.has(match[1])) {
      internal.set(match[1], match[2] ?? match[3] ?? '');
    }
  }
  for (const match of internalSubset.matchAll(EXTERNAL_ENTITY)) {
    external.add(match[1]);
  }

  return { internal, external };
}

function positionOf(content: string, index: number): { line: number; column: number } {
  const before = content.slice(0, index);
  const line = before.split('\n').length;
  return { line, column: index - before.lastIndexOf('\n') };
}

/**
 * Replaces references to entities declared in the document's internal DTD subset
 * and removes the DOCTYPE. Predefined and numeric references are left in place.
 * @throws FeedParseError on a reference to an undeclared or external entity
 */
export function expandEntities(content: string, sourceFile: string): ExpandedDocument {
  const doctype = findDoctype(content);
  const entities = readEntityTable(doctype?.internalSubset ?? '');
  let expanded = 0;

  const fail = (reason: string, index: number): never => {
    const { line, column } = positionOf(content, index);
    throw new FeedParseError(sourceFile, reason, line, column);
  };

  const resolve = (name: string, index: number, stack: readonly string[]): string => {
    if (stack.includes(name)) {
      return fail(`entity &${name}; refers to itself`, index);
    }
    if (stack.length >= MAX_EXPANSION_DEPTH) {
      return fail(`entity &${name}; is nested too deeply`, index);
    }

    const value = entities.internal.get(name);
    if (value === undefined) {
      return fail(
        entities.external.has(name)
          ? `external entity &${name}; is not supported`
          : `undefined entity &${name};`,
        index
      );
    }

    return value.replace(ENTITY_REFERENCE, (reference: string, inner: string) =>
      inner.startsWith('#') || PREDEFINED_ENTITIES.has(inner)
        ? reference
        : resolve(inner, index, [...stack, name])
    );
  };

  let output = '';
  let cursor = 0;

  for (const match of content.matchAll(MARKUP_OR_REFERENCE)) {
    const index = match.index ?? 0;
    const name = match[1];

    if (doctype && index >= doctype.start && index < doctype.end) {
      continue;
    }
    if (name === undefined || name.startsWith('#') || PREDEFINED_ENTITIES.has(name)) {
      continue;
    }

    output += content.slice(cursor, index) + resolve(name, index, []);
    cursor = index + match[0].length;
    expanded++;

    if (output.length > MAX_EXPANDED_LENGTH) {
      fail('entity expansion exceeds the size limit', index);
    }
  }
  output += content.slice(cursor);

  if (doctype) {
    // Only the prolog precedes the DOCTYPE, so its offsets are unchanged in the output
    output = output.slice(0, doctype.start) + output.slice(doctype.end);
  }

  return { content: output, expanded };
}
