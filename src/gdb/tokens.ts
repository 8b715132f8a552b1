/**
 * Nearby Expression Extraction
 *
 * Finds the variable-like tokens and array subscripts in a source window so
 * their values can be printed next to the crash site.
 */

import { sourceText } from './parse.js';

const NOT_TOKEN_CHARS = /[^A-Za-z0-9_[\]]+/g;
const IDENTIFIER_START = /^[A-Za-z_]/;
const NUMERIC_LITERAL = /^(?:0[xX][0-9a-fA-F]+|\d+)$/;
// Increments, assignments and calls would change the debuggee when printed
const SIDE_EFFECTS = /\+\+|--|\(|(?:^|[^=!<>])=(?!=)/;

/**
 * Split code on everything but identifier characters, digits and brackets.
 * `a[i] = b + 1;` gives ["a[i]", "b", "1"].
 */
export function extractIdentifierTokens(code: string): string[] {
  return code
    .replace(NOT_TOKEN_CHARS, ' ')
    .split(' ')
    .filter((token) => token.length > 0);
}

/**
 * Every bracketed subscript, nested ones included, found with a stack of
 * open-bracket positions. `a[b[i]-c]` gives ["i", "b[i]-c"].
 */
export function extractIndexExpressions(code: string): string[] {
  const found: string[] = [];
  const open: number[] = [];

  for (let i = 0; i < code.length; i++) {
    const ch = code[i];
    if (ch === '[') {
      open.push(i);
    } else if (ch === ']') {
      const start = open.pop();
      if (start === undefined) continue;
      const expression = code.slice(start + 1, i).trim();
      if (expression.length > 0) {
        found.push(expression);
      }
    }
  }

  return found;
}

export function isNumericLiteral(token: string): boolean {
  return NUMERIC_LITERAL.test(token);
}

function hasBalancedBrackets(token: string): boolean {
  let depth = 0;
  for (const ch of token) {
    if (ch === '[') depth++;
    else if (ch === ']' && --depth < 0) return false;
  }
  return depth === 0;
}

/**
 * Distinct, sorted expressions worth evaluating for a listed source window
 */
export function collectNearbyExpressions(listing: string[]): string[] {
  const expressions = new Set<string>();

  for (const listed of listing) {
    const code = sourceText(listed);

    for (const token of extractIdentifierTokens(code)) {
      if (IDENTIFIER_START.test(token) && hasBalancedBrackets(token)) {
        expressions.add(token);
      }
    }

    for (const expression of extractIndexExpressions(code)) {
      if (!SIDE_EFFECTS.test(expression)) {
        expressions.add(expression);
      }
    }
  }

  return [...expressions].filter((expression) => !isNumericLiteral(expression)).sort();
}
