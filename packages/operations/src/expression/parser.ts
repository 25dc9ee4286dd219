/**
 * Predicate parser
 *
 * Recursive descent over the token stream. Precedence, loosest first:
 *   or  ->  and  ->  not  ->  comparison / is null / in  ->  + -  ->  * /  ->  unary -  ->  primary
 */

import { InvalidExpressionError, type Scalar } from '@tabflow/core';
import {
  tokenize,
  type ArithmeticOperator,
  type ComparisonOperator,
  type Token,
} from './tokenizer.js';

export type Expr =
  | { type: 'literal'; value: Scalar }
  | { type: 'column'; name: string; position: number }
  | { type: 'unary'; op: 'not' | 'negate'; expr: Expr }
  | { type: 'binary'; op: ComparisonOperator | ArithmeticOperator | 'and' | 'or'; left: Expr; right: Expr }
  | { type: 'isNull'; expr: Expr; negated: boolean }
  | { type: 'in'; expr: Expr; values: Expr[]; negated: boolean };

const COMPARATORS: readonly string[] = ['==', '!=', '<', '<=', '>', '>='];

function isComparator(value: string): value is ComparisonOperator {
  return COMPARATORS.includes(value);
}

function describeToken(token: Token): string {
  switch (token.type) {
    case 'paren':
      return `'${token.value}'`;
    case 'comma':
      return "','";
    case 'literal':
      return typeof token.value === 'string' ? `string '${token.value}'` : `'${String(token.value)}'`;
    default:
      return `'${token.value}'`;
  }
}

export function parseExpression(source: string): Expr {
  const tokens = tokenize(source);
  let cursor = 0;

  const peek = (offset = 0): Token | undefined => tokens[cursor + offset];

  const fail = (reason: string, token?: Token): never => {
    throw new InvalidExpressionError(source, reason, token ? token.position : source.length);
  };

  const unexpected = (token: Token | undefined): never =>
    token ? fail(`unexpected ${describeToken(token)}`, token) : fail('unexpected end of expression');

  const matchOperator = (value: string): boolean => {
    const token = peek();
    if (token && token.type === 'operator' && token.value === value) {
      cursor += 1;
      return true;
    }
    return false;
  };

  const matchKeyword = (value: 'is' | 'in'): boolean => {
    const token = peek();
    if (token && token.type === 'keyword' && token.value === value) {
      cursor += 1;
      return true;
    }
    return false;
  };

  const expectParen = (value: '(' | ')'): void => {
    const token = peek();
    if (token && token.type === 'paren' && token.value === value) {
      cursor += 1;
      return;
    }
    if (token) fail(`expected '${value}' but found ${describeToken(token)}`, token);
    fail(`expected '${value}'`);
  };

  const parsePrimary = (): Expr => {
    const token = peek();
    if (!token) return unexpected(token);
    if (token.type === 'paren' && token.value === '(') {
      cursor += 1;
      const expr = parseOr();
      expectParen(')');
      return expr;
    }
    if (token.type === 'literal') {
      cursor += 1;
      return { type: 'literal', value: token.value };
    }
    if (token.type === 'identifier') {
      cursor += 1;
      return { type: 'column', name: token.value, position: token.position };
    }
    return unexpected(token);
  };

  const parseUnary = (): Expr => {
    if (matchOperator('-')) {
      const expr = parseUnary();
      if (expr.type === 'literal' && typeof expr.value === 'number') {
        return { type: 'literal', value: -expr.value };
      }
      return { type: 'unary', op: 'negate', expr };
    }
    return parsePrimary();
  };

  const parseMultiplicative = (): Expr => {
    let left = parseUnary();
    for (;;) {
      const token = peek();
      if (token?.type === 'operator' && (token.value === '*' || token.value === '/')) {
        cursor += 1;
        left = { type: 'binary', op: token.value, left, right: parseUnary() };
      } else {
        return left;
      }
    }
  };

  const parseAdditive = (): Expr => {
    let left = parseMultiplicative();
    for (;;) {
      const token = peek();
      if (token?.type === 'operator' && (token.value === '+' || token.value === '-')) {
        cursor += 1;
        left = { type: 'binary', op: token.value, left, right: parseMultiplicative() };
      } else {
        return left;
      }
    }
  };

  const parseList = (): Expr[] => {
    expectParen('(');
    const values: Expr[] = [parseAdditive()];
    while (peek()?.type === 'comma') {
      cursor += 1;
      values.push(parseAdditive());
    }
    expectParen(')');
    return values;
  };

  const parseComparison = (): Expr => {
    const left = parseAdditive();
    const token = peek();
    if (!token) return left;

    if (token.type === 'operator' && isComparator(token.value)) {
      cursor += 1;
      return { type: 'binary', op: token.value, left, right: parseAdditive() };
    }

    if (matchKeyword('is')) {
      const negated = matchOperator('not');
      const next = peek();
      if (next?.type === 'literal' && next.value === null) {
        cursor += 1;
        return { type: 'isNull', expr: left, negated };
      }
      return next ? fail(`expected 'null' after 'is' but found ${describeToken(next)}`, next) : fail("expected 'null' after 'is'");
    }

    if (matchKeyword('in')) {
      return { type: 'in', expr: left, values: parseList(), negated: false };
    }

    const following = peek(1);
    if (token.type === 'operator' && token.value === 'not' && following?.type === 'keyword' && following.value === 'in') {
      cursor += 2;
      return { type: 'in', expr: left, values: parseList(), negated: true };
    }

    return left;
  };

  const parseNot = (): Expr => {
    if (matchOperator('not')) {
      return { type: 'unary', op: 'not', expr: parseNot() };
    }
    return parseComparison();
  };

  const parseAnd = (): Expr => {
    let left = parseNot();
    while (matchOperator('and')) {
      left = { type: 'binary', op: 'and', left, right: parseNot() };
    }
    return left;
  };

  const parseOr = (): Expr => {
    let left = parseAnd();
    while (matchOperator('or')) {
      left = { type: 'binary', op: 'or', left, right: parseAnd() };
    }
    return left;
  };

  if (tokens.length === 0) {
    fail('empty expression');
  }

  const expr = parseOr();
  if (cursor !== tokens.length) {
    unexpected(peek());
  }
  return expr;
}
