import { Expression, NodeKind } from './ast';
import { debugLogger, LogComponent } from './debug-logger';

/**
 * Represents malformed input to the parser. `pos` is the offset into `input`
 * at which parsing failed.
 */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly input: string,
    public readonly pos: number
  ) {
    super(`${message} at position ${pos} in '${input}'`);
    this.name = 'ParseError';
  }
}

const NEGATION_PREFIX = '(1-';

/**
 * Recursive descent parser for elective functions:
 *
 *   expr     := term expr?
 *   term     := atom | negation
 *   atom     := [a-z] | 0 | 1
 *   negation := "(1-" expr ")"
 *
 * Juxtaposed terms become products nested to the right, i.e. `xyz` parses
 * as x(yz).
 */
export class Parser {
  constructor(private readonly input: string) {}

  public parseExpression(): Expression {
    return this.parseRange(0, this.input.length);
  }

  /**
   * Parses `input[start, end)` as a complete expression.
   */
  private parseRange(start: number, end: number): Expression {
    if (start >= end) {
      throw new ParseError('Expected expression', this.input, start);
    }

    const [first, next] = this.parseTerm(start, end);
    if (next >= end) return first;
    return {
      kind: NodeKind.Product,
      left: first,
      right: this.parseRange(next, end),
    };
  }

  /**
   * Parses a single term starting at `start` and returns it together with
   * the offset just past it.
   */
  private parseTerm(start: number, end: number): [Expression, number] {
    const ch = this.input.charAt(start);

    if (ch === '(') {
      if (!this.input.startsWith(NEGATION_PREFIX, start)) {
        throw new ParseError(
          `Expected '${NEGATION_PREFIX}'`,
          this.input,
          start
        );
      }
      const close = this.matchParen(start, end);
      const arg = this.parseRange(start + NEGATION_PREFIX.length, close);
      return [{ kind: NodeKind.Not, arg }, close + 1];
    }

    if (/^[a-z]$/.test(ch)) {
      return [{ kind: NodeKind.Sym, name: ch }, start + 1];
    }

    if (ch === '0' || ch === '1') {
      return [{ kind: NodeKind.Const, value: ch === '0' ? 0 : 1 }, start + 1];
    }

    throw new ParseError(`Unexpected character '${ch}'`, this.input, start);
  }

  /**
   * Returns the index of the parenthesis closing the one at `open`.
   */
  private matchParen(open: number, end: number): number {
    let depth = 0;
    for (let i = open; i < end; i++) {
      const ch = this.input.charAt(i);
      if (ch === '(') depth++;
      else if (ch === ')') depth--;
      if (depth === 0) return i;
    }
    throw new ParseError('Unbalanced parentheses', this.input, open);
  }
}

/**
 * Parses an elective function from its textual form.
 */
export function parseExpression(input: string): Expression {
  const e = new Parser(input).parseExpression();
  debugLogger.trace(LogComponent.PARSER, `Parsed '${input}'`);
  return e;
}

/** Both sides of a parsed equation. */
export type ParsedEquation = { lhs: Expression; rhs: Expression };

/**
 * Splits an equation of the form `lhs = rhs` into its two sides. Spaces
 * around either side are dropped; spaces inside an expression are kept, and
 * rejected later by the parser.
 */
export function splitEquation(input: string): [string, string] {
  const eq = input.indexOf('=');
  if (eq < 0) {
    throw new ParseError(`Expected '='`, input, input.length);
  }
  const again = input.indexOf('=', eq + 1);
  if (again >= 0) {
    throw new ParseError(`Unexpected '='`, input, again);
  }
  return [input.slice(0, eq).trim(), input.slice(eq + 1).trim()];
}

/**
 * Parses an equation of the form `lhs = rhs`.
 */
export function parseEquation(input: string): ParsedEquation {
  const [lhs, rhs] = splitEquation(input);
  return { lhs: parseExpression(lhs), rhs: parseExpression(rhs) };
}

/**
 * Renders an expression in the notation accepted by `parseExpression`. The
 * output is unique for a given tree.
 */
export function renderExpression(e: Expression): string {
  switch (e.kind) {
    case NodeKind.Sym:
      return e.name;
    case NodeKind.Const:
      return `${e.value}`;
    case NodeKind.Not:
      return `(1-${renderExpression(e.arg)})`;
    case NodeKind.Product:
      return `${renderExpression(e.left)}${renderExpression(e.right)}`;
    default:
      const _exhaustive: never = e;
      throw new Error(`Unknown expression kind ${_exhaustive}`);
  }
}
