/**
 * Predicate tokenizer
 *
 * Turns a filter expression into tokens, each carrying the offset it starts at
 * so that syntax errors can point at the offending character.
 */

import { InvalidExpressionError, type Scalar } from '@tabflow/core';

export type ComparisonOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';
export type ArithmeticOperator = '+' | '-' | '*' | '/';
export type LogicalOperator = 'and' | 'or' | 'not';

export type Token =
  | { type: 'paren'; value: '(' | ')'; position: number }
  | { type: 'comma'; position: number }
  | { type: 'operator'; value: ComparisonOperator | ArithmeticOperator | LogicalOperator; position: number }
  | { type: 'keyword'; value: 'is' | 'in'; position: number }
  | { type: 'literal'; value: Scalar; position: number }
  | { type: 'identifier'; value: string; position: number };

const NUMBER_PATTERN = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*/;

const TWO_CHAR_OPERATORS: Record<string, ComparisonOperator | LogicalOperator> = {
  '==': '==',
  '!=': '!=',
  '<=': '<=',
  '>=': '>=',
  '&&': 'and',
  '||': 'or',
};

const ONE_CHAR_OPERATORS: Record<string, ComparisonOperator | ArithmeticOperator | LogicalOperator> = {
  '=': '==',
  '<': '<',
  '>': '>',
  '+': '+',
  '-': '-',
  '*': '*',
  '/': '/',
  '!': 'not',
};

const ESCAPES: Record<string, string> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  n: '\n',
  r: '\r',
  t: '\t',
};

function readString(source: string, start: number): { value: string; end: number } {
  const quote = source[start];
  let cursor = start + 1;
  let value = '';
  while (cursor < source.length) {
    const ch = source[cursor] ?? '';
    if (ch === '\\') {
      const escaped = ESCAPES[source[cursor + 1] ?? ''];
      if (escaped === undefined) {
        throw new InvalidExpressionError(source, 'invalid escape sequence', cursor);
      }
      value += escaped;
      cursor += 2;
      continue;
    }
    if (ch === quote) {
      return { value, end: cursor + 1 };
    }
    value += ch;
    cursor += 1;
  }
  throw new InvalidExpressionError(source, 'unterminated string literal', start);
}

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  while (index < source.length) {
    const ch = source[index] ?? '';

    if (/\s/.test(ch)) {
      index += 1;
      continue;
    }

    if (ch === '(' || ch === ')') {
      tokens.push({ type: 'paren', value: ch, position: index });
      index += 1;
      continue;
    }

    if (ch === ',') {
      tokens.push({ type: 'comma', position: index });
      index += 1;
      continue;
    }

    const pair = TWO_CHAR_OPERATORS[source.slice(index, index + 2)];
    if (pair) {
      tokens.push({ type: 'operator', value: pair, position: index });
      index += 2;
      continue;
    }

    const single = ONE_CHAR_OPERATORS[ch];
    if (single) {
      tokens.push({ type: 'operator', value: single, position: index });
      index += 1;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const { value, end } = readString(source, index);
      tokens.push({ type: 'literal', value, position: index });
      index = end;
      continue;
    }

    if (ch === '`') {
      const end = source.indexOf('`', index + 1);
      if (end < 0) {
        throw new InvalidExpressionError(source, 'unterminated quoted column name', index);
      }
      const name = source.slice(index + 1, end);
      if (name.length === 0) {
        throw new InvalidExpressionError(source, 'empty quoted column name', index);
      }
      tokens.push({ type: 'identifier', value: name, position: index });
      index = end + 1;
      continue;
    }

    const number = NUMBER_PATTERN.exec(source.slice(index));
    if (number) {
      const value = Number(number[0]);
      if (!Number.isFinite(value)) {
        throw new InvalidExpressionError(source, 'number out of range', index);
      }
      tokens.push({ type: 'literal', value, position: index });
      index += number[0].length;
      continue;
    }

    const word = IDENTIFIER_PATTERN.exec(source.slice(index));
    if (word) {
      const raw = word[0];
      const lower = raw.toLowerCase();
      if (lower === 'and' || lower === 'or' || lower === 'not') {
        tokens.push({ type: 'operator', value: lower, position: index });
      } else if (lower === 'is' || lower === 'in') {
        tokens.push({ type: 'keyword', value: lower, position: index });
      } else if (lower === 'true' || lower === 'false') {
        tokens.push({ type: 'literal', value: lower === 'true', position: index });
      } else if (lower === 'null') {
        tokens.push({ type: 'literal', value: null, position: index });
      } else {
        tokens.push({ type: 'identifier', value: raw, position: index });
      }
      index += raw.length;
      continue;
    }

    throw new InvalidExpressionError(source, `unexpected character '${ch}'`, index);
  }

  return tokens;
}
