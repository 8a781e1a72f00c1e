/**
 * Prints a string as a GraphQL StringValue literal. Replaces control characters
 * and excluded characters (" U+0022 and \\ U+005C) with escape sequences.
 */
export function printString(str: string): string {
  return `"${str.replace(escapedRegExp, escapedReplacer)}"`;
}

const escapedRegExp = /[\x00-\x1f\x22\x5c\x7f-\x9f]/g;

const namedEscapes: { [char: string]: string } = {
  '\b': '\\b',
  '\t': '\\t',
  '\n': '\\n',
  '\f': '\\f',
  '\r': '\\r',
  '"': '\\"',
  '\\': '\\\\',
};

function escapedReplacer(char: string): string {
  const named = namedEscapes[char];
  if (named !== undefined) {
    return named;
  }
  const hex = char.charCodeAt(0).toString(16).toUpperCase();
  return '\\u' + hex.padStart(4, '0');
}
