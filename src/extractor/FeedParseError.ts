/**
 * Raised when a feed document is not well-formed XML
 */
export class FeedParseError extends Error {
  readonly sourceFile: string;
  readonly line?: number;
  readonly column?: number;

  constructor(sourceFile: string, reason: string, line?: number, column?: number) {
    const position = line !== undefined ? ` (line ${line}, column ${column ?? 0})` : '';
    super(`Malformed XML in ${sourceFile}: ${reason}${position}`);
    this.name = 'FeedParseError';
    this.sourceFile = sourceFile;
    this.line = line;
    this.column = column;
  }
}
