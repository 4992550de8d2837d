/**
 * Filter expressions for the row pipeline.
 *
 *   expr    := or
 *   or      := and (("||" | "or") and)*
 *   and     := unary (("&&" | "and") unary)*
 *   unary   := ("!" | "not") unary | compare
 *   compare := operand (op operand)?      op: == != < <= > >= =~ in
 *   operand := number | string | true | false | null | field | [list] | (expr)
 *
 * Fields are bare paths (`size`, `meta.owner`, `tags.0`) or backquoted
 * names (`` `file-name` ``). Missing fields evaluate to null.
 */

import { FilterSyntaxError } from '../errors.js';
import type { Row } from './row.js';
import {
  NULL_VALUE,
  booleanValue,
  compareValues,
  formatValue,
  isTruthy,
  listValue,
  numberValue,
  stringValue,
  valuesEqual,
  type RowValue,
} from './value.js';

export type RowPredicate = (row: Row) => boolean;

type CompareOp = '==' | '!=' | '<' | '<=' | '>' | '>=' | '=~' | 'in';

type Expr =
  | { type: 'literal'; value: RowValue }
  | { type: 'field'; path: string }
  | { type: 'list'; items: Expr[] }
  | { type: 'not'; expr: Expr }
  | { type: 'and' | 'or'; left: Expr; right: Expr }
  | { type: 'compare'; op: CompareOp; left: Expr; right: Expr; regex?: RegExp };

type Token =
  | { kind: 'number'; value: number; pos: number }
  | { kind: 'string'; value: string; pos: number }
  | { kind: 'ident'; value: string; pos: number }
  | { kind: 'field'; value: string; pos: number }
  | { kind: 'op'; value: string; pos: number }
  | { kind: 'end'; pos: number };

const OPERATORS = ['==', '!=', '<=', '>=', '=~', '&&', '||', '<', '>', '!', '(', ')', '[', ']', ',', '='];
const NUMBER_RE = /^-?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?/;
const IDENT_RE = /^[A-Za-z_@][A-Za-z0-9_.@]*/;

// ---------------------------------------------------------------------------
// Tokenizer
// ---------------------------------------------------------------------------

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < source.length) {
    const ch = source.charAt(pos);
    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    if (ch === '"' || ch === "'" || ch === '`') {
      const start = pos;
      let value = '';
      pos++;
      while (pos < source.length && source.charAt(pos) !== ch) {
        if (source.charAt(pos) === '\\' && pos + 1 < source.length) {
          const next = source.charAt(pos + 1);
          value += next === 'n' ? '\n' : next === 't' ? '\t' : next;
          pos += 2;
        } else {
          value += source.charAt(pos);
          pos++;
        }
      }
      if (pos >= source.length) {
        throw new FilterSyntaxError(source, start, 'unterminated quote');
      }
      pos++;
      tokens.push({ kind: ch === '`' ? 'field' : 'string', value, pos: start });
      continue;
    }

    const rest = source.slice(pos);
    const previous = tokens[tokens.length - 1];
    const negativeAllowed = !previous || previous.kind === 'op' && previous.value !== ')' && previous.value !== ']';
    const num = NUMBER_RE.exec(rest);
    if (num && (ch !== '-' || negativeAllowed)) {
      tokens.push({ kind: 'number', value: Number(num[0]), pos });
      pos += num[0].length;
      continue;
    }

    const ident = IDENT_RE.exec(rest);
    if (ident) {
      tokens.push({ kind: 'ident', value: ident[0], pos });
      pos += ident[0].length;
      continue;
    }

    const op = OPERATORS.find(o => rest.startsWith(o));
    if (op) {
      tokens.push({ kind: 'op', value: op === '=' ? '==' : op, pos });
      pos += op.length;
      continue;
    }

    throw new FilterSyntaxError(source, pos, `unexpected character "${ch}"`);
  }

  tokens.push({ kind: 'end', pos: source.length });
  return tokens;
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

const COMPARE_OPS = new Set<string>(['==', '!=', '<', '<=', '>', '>=', '=~']);

function isCompareOp(value: string): value is CompareOp {
  return COMPARE_OPS.has(value) || value === 'in';
}

class Parser {
  private pos = 0;

  constructor(private readonly source: string, private readonly tokens: Token[]) {}

  parse(): Expr {
    const expr = this.parseOr();
    const token = this.peek();
    if (token.kind !== 'end') {
      throw this.error(token, 'unexpected trailing input');
    }
    return expr;
  }

  private peek(): Token {
    return this.tokens[this.pos] ?? { kind: 'end', pos: this.source.length };
  }

  private advance(): Token {
    const token = this.peek();
    this.pos++;
    return token;
  }

  private error(token: Token, message: string): FilterSyntaxError {
    return new FilterSyntaxError(this.source, token.pos, message);
  }

  /** Consume an operator or keyword if it is next. */
  private accept(...words: string[]): boolean {
    const token = this.peek();
    if ((token.kind === 'op' || token.kind === 'ident') && words.includes(token.value)) {
      this.pos++;
      return true;
    }
    return false;
  }

  private expect(op: string): void {
    const token = this.peek();
    if (!this.accept(op)) {
      throw this.error(token, `expected "${op}"`);
    }
  }

  private parseOr(): Expr {
    let left = this.parseAnd();
    while (this.accept('||', 'or')) {
      left = { type: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): Expr {
    let left = this.parseUnary();
    while (this.accept('&&', 'and')) {
      left = { type: 'and', left, right: this.parseUnary() };
    }
    return left;
  }

  private parseUnary(): Expr {
    if (this.accept('!', 'not')) {
      return { type: 'not', expr: this.parseUnary() };
    }
    return this.parseCompare();
  }

  private parseCompare(): Expr {
    const left = this.parseOperand();
    const token = this.peek();
    if ((token.kind === 'op' || token.kind === 'ident') && isCompareOp(token.value)) {
      this.pos++;
      const op = token.value;
      const right = this.parseOperand();
      if (op === '=~') {
        if (right.type !== 'literal' || right.value.kind !== 'string') {
          throw this.error(token, '=~ needs a string pattern on the right');
        }
        try {
          return { type: 'compare', op, left, right, regex: new RegExp(right.value.value) };
        } catch (err) {
          throw this.error(token, `invalid pattern: ${err instanceof Error ? err.message : String(err)}`);
        }
      }
      return { type: 'compare', op, left, right };
    }
    return left;
  }

  private parseOperand(): Expr {
    const token = this.advance();
    switch (token.kind) {
      case 'number':
        return { type: 'literal', value: numberValue(token.value) };
      case 'string':
        return { type: 'literal', value: stringValue(token.value) };
      case 'field':
        return { type: 'field', path: token.value };
      case 'ident':
        switch (token.value) {
          case 'true': return { type: 'literal', value: booleanValue(true) };
          case 'false': return { type: 'literal', value: booleanValue(false) };
          case 'null': return { type: 'literal', value: NULL_VALUE };
          case 'and':
          case 'or':
          case 'not':
          case 'in':
            throw this.error(token, `unexpected keyword "${token.value}"`);
          default:
            return { type: 'field', path: token.value };
        }
      case 'op':
        if (token.value === '(') {
          const inner = this.parseOr();
          this.expect(')');
          return inner;
        }
        if (token.value === '[') {
          const items: Expr[] = [];
          if (!this.accept(']')) {
            do {
              items.push(this.parseOperand());
            } while (this.accept(','));
            this.expect(']');
          }
          return { type: 'list', items };
        }
        throw this.error(token, `unexpected "${token.value}"`);
      case 'end':
        throw this.error(token, 'unexpected end of expression');
    }
  }
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

/** Coerce a string to a date when compared against a date. */
function alignDates(a: RowValue, b: RowValue): [RowValue, RowValue] {
  const asDate = (v: RowValue): RowValue => {
    if (v.kind !== 'string') return v;
    const d = new Date(v.value);
    return Number.isNaN(d.getTime()) ? v : { kind: 'date', value: d };
  };
  if (a.kind === 'date' && b.kind === 'string') return [a, asDate(b)];
  if (b.kind === 'date' && a.kind === 'string') return [asDate(a), b];
  return [a, b];
}

function compare(op: CompareOp, left: RowValue, right: RowValue, regex?: RegExp): boolean {
  switch (op) {
    case '==': {
      const [a, b] = alignDates(left, right);
      return valuesEqual(a, b);
    }
    case '!=': {
      const [a, b] = alignDates(left, right);
      return !valuesEqual(a, b);
    }
    case '=~':
      return left.kind !== 'null' && regex !== undefined && regex.test(formatValue(left));
    case 'in':
      if (right.kind === 'list') return right.items.some(item => valuesEqual(left, item));
      if (right.kind === 'string' && left.kind === 'string') return right.value.includes(left.value);
      return false;
    default: {
      const [a, b] = alignDates(left, right);
      const comparable = a.kind === b.kind && (a.kind === 'number' || a.kind === 'string' || a.kind === 'date');
      if (!comparable) return false;
      const diff = compareValues(a, b);
      if (op === '<') return diff < 0;
      if (op === '<=') return diff <= 0;
      if (op === '>') return diff > 0;
      return diff >= 0;
    }
  }
}

function evaluate(expr: Expr, row: Row): RowValue {
  switch (expr.type) {
    case 'literal': return expr.value;
    case 'field': return row.lookup(expr.path);
    case 'list': return listValue(expr.items.map(item => evaluate(item, row)));
    case 'not': return booleanValue(!isTruthy(evaluate(expr.expr, row)));
    case 'and': return booleanValue(isTruthy(evaluate(expr.left, row)) && isTruthy(evaluate(expr.right, row)));
    case 'or': return booleanValue(isTruthy(evaluate(expr.left, row)) || isTruthy(evaluate(expr.right, row)));
    case 'compare':
      return booleanValue(compare(expr.op, evaluate(expr.left, row), evaluate(expr.right, row), expr.regex));
  }
}

/**
 * Compile a filter expression into a row predicate.
 * Throws FilterSyntaxError with the offending position.
 */
export function compileFilter(expression: string): RowPredicate {
  if (expression.trim() === '') {
    throw new FilterSyntaxError(expression, 0, 'empty expression');
  }
  const ast = new Parser(expression, tokenize(expression)).parse();
  return (row: Row) => isTruthy(evaluate(ast, row));
}

/** Syntax check for parameter validation; returns the error message or undefined. */
export function checkFilterSyntax(expression: string): string | undefined {
  try {
    compileFilter(expression);
    return undefined;
  } catch (err) {
    if (err instanceof FilterSyntaxError) return err.message;
    throw err;
  }
}
