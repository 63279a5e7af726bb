/**
 * Lexer Helper Functions
 * Character classification
 */

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isHexDigit(ch: string): boolean {
  return (
    isDigit(ch) || (ch >= 'a' && ch <= 'f') || (ch >= 'A' && ch <= 'F')
  );
}

function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

export function isIdentifierStart(ch: string): boolean {
  return isLetter(ch) || ch === '_';
}

export function isIdentifierChar(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

/** Intra-line gap characters */
export function isSpace(ch: string): boolean {
  return ch === ' ' || ch === '\t';
}

export function isLineEnd(ch: string): boolean {
  return ch === '\n' || ch === '\r';
}

/** Short description of a character for error messages */
export function describeChar(ch: string): string {
  if (ch === '') return 'end of input';
  if (ch === '\n' || ch === '\r') return 'newline';
  if (ch === '\t') return 'tab';
  return `'${ch}'`;
}
