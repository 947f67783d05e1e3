import { describe, it, expect } from 'vitest';
import { decodeFeed, detectEncoding } from '../../../src/extractor/feedEncoding';
import { FeedParseError } from '../../../src/extractor/FeedParseError';

describe('detectEncoding', () => {
  it('should default to UTF-8', () => {
    expect(detectEncoding(Buffer.from('<feed/>'))).toBe('utf-8');
  });

  it('should read the encoding from the XML declaration', () => {
    const bytes = Buffer.from("<?xml version='1.0' encoding='Windows-1252'?><feed/>");
    expect(detectEncoding(bytes)).toBe('windows-1252');
  });

  it('should let a byte order mark win over the declaration', () => {
    const bytes = Buffer.concat([
      Buffer.from([0xff, 0xfe]),
      Buffer.from('<?xml version="1.0" encoding="ISO-8859-1"?><feed/>', 'utf16le'),
    ]);
    expect(detectEncoding(bytes)).toBe('utf-16le');
  });

  it('should recognise UTF-16 without a byte order mark', () => {
    expect(detectEncoding(Buffer.from('<?xml version="1.0"?><feed/>', 'utf16le'))).toBe(
      'utf-16le'
    );
  });
});

describe('decodeFeed', () => {
  it('should decode UTF-8 and strip its byte order mark', () => {
    const bytes = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('<a>é</a>')]);
    expect(decodeFeed(bytes, 'a.xml')).toBe('<a>é</a>');
  });

  it('should reject invalid UTF-8', () => {
    const bytes = Buffer.concat([Buffer.from('<a>'), Buffer.from([0xc3, 0x28]), Buffer.from('</a>')]);
    expect(() => decodeFeed(bytes, 'bad.xml')).toThrow(FeedParseError);
    expect(() => decodeFeed(bytes, 'bad.xml')).toThrow(
      'Malformed XML in bad.xml: invalid utf-8 byte sequence'
    );
  });

  it('should reject an unknown declared encoding', () => {
    const bytes = Buffer.from('<?xml version="1.0" encoding="x-no-such"?><a/>');
    expect(() => decodeFeed(bytes, 'odd.xml')).toThrow('unsupported encoding "x-no-such"');
  });
});
