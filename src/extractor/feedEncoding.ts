import { TextDecoder } from 'util';
import { FeedParseError } from './FeedParseError';

const DECLARED_ENCODING = /^<\?xml[^>]*?\sencoding\s*=\s*["']([A-Za-z][A-Za-z0-9._-]*)["']/;

/**
 * Picks the encoding of a raw XML document: byte order mark first, then the
 * XML declaration, then UTF-8.
 */
export function detectEncoding(bytes: Uint8Array): string {
  if (bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) {
    return 'utf-8';
  }
  if (bytes[0] === 0xff && bytes[1] === 0xfe) {
    return 'utf-16le';
  }
  if (bytes[0] === 0xfe && bytes[1] === 0xff) {
    return 'utf-16be';
  }
  // "<?" without a BOM
  if (bytes[0] === 0x3c && bytes[1] === 0x00 && bytes[2] === 0x3f && bytes[3] === 0x00) {
    return 'utf-16le';
  }
  if (bytes[0] === 0x00 && bytes[1] === 0x3c && bytes[2] === 0x00 && bytes[3] === 0x3f) {
    return 'utf-16be';
  }

  // The declaration is ASCII in every encoding this branch can see
  const head = Buffer.from(bytes.subarray(0, 256)).toString('latin1');
  const declared = DECLARED_ENCODING.exec(head);
  return declared ? declared[1].toLowerCase() : 'utf-8';
}

/**
 * Decodes a feed file, rejecting byte sequences invalid in its encoding
 * @throws FeedParseError if the encoding is unknown or the bytes do not decode
 */
export function decodeFeed(bytes: Uint8Array, sourceFile: string): string {
  const encoding = detectEncoding(bytes);

  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(encoding, { fatal: true });
  } catch {
    throw new FeedParseError(sourceFile, `unsupported encoding "${encoding}"`);
  }

  try {
    return decoder.decode(bytes);
  } catch {
    throw new FeedParseError(sourceFile, `invalid ${encoding} byte sequence`);
  }
}
