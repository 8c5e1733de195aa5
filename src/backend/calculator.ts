export class CalcError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CalcError';
  }
}

type Token =
  | { kind: 'num'; value: number; pos: number }
  | { kind: 'ident'; name: string; pos: number }
  | { kind: 'op'; op: string; pos: number }
  | { kind: 'end'; pos: number };

const OPERATORS = ['**', '+', '-', '*', '/', '%', '(', ')', ','];

function tokenize(src: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < src.length) {
    const ch = src[i];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    const num = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/.exec(src.slice(i));
    if (num) {
      tokens.push({ kind: 'num', value: Number(num[0]), pos: i });
      i += num[0].length;
      continue;
    }
    const ident = /^[A-Za-z_][A-Za-z0-9_]*/.exec(src.slice(i));
    if (ident) {
      tokens.push({ kind: 'ident', name: ident[0], pos: i });
      i += ident[0].length;
      continue;
    }
    const op = OPERATORS.find((o) => src.startsWith(o, i));
    if (!op) throw new CalcError(`unexpected character '${ch}' at position ${i}`);
    tokens.push({ kind: 'op', op, pos: i });
    i += op.length;
  }
  tokens.push({ kind: 'end', pos: src.length });
  return tokens;
}

type MathFn = (...args: number[]) => number;
type FnSpec = { fn: MathFn; arity: [number, number] };

function roundTo(x: number, digits = 0): number {
  const f = 10 ** digits;
  return Math.round(x * f) / f;
}

const FUNCTIONS: ReadonlyMap<string, FnSpec> = new Map<string, FnSpec>([
  ['abs', { fn: Math.abs, arity: [1, 1] }],
  ['round', { fn: roundTo, arity: [1, 2] }],
  ['min', { fn: Math.min, arity: [1, Infinity] }],
  ['max', { fn: Math.max, arity: [1, Infinity] }],
  ['sum', { fn: (...xs: number[]) => xs.reduce((a, b) => a + b, 0), arity: [1, Infinity] }],
  ['pow', { fn: Math.pow, arity: [2, 2] }],
  ['sqrt', { fn: Math.sqrt, arity: [1, 1] }],
  ['sin', { fn: Math.sin, arity: [1, 1] }],
  ['cos', { fn: Math.cos, arity: [1, 1] }],
  ['tan', { fn: Math.tan, arity: [1, 1] }],
  ['log', { fn: (x: number, base?: number) => (base === undefined ? Math.log(x) : Math.log(x) / Math.log(base)), arity: [1, 2] }],
  ['log10', { fn: Math.log10, arity: [1, 1] }],
  ['exp', { fn: Math.exp, arity: [1, 1] }]
]);

const CONSTANTS: ReadonlyMap<string, number> = new Map<string, number>([
  ['pi', Math.PI],
  ['e', Math.E]
]);

export type CalcOptions = {
  // enables FUNCTIONS and CONSTANTS
  advanced?: boolean;
};

class Parser {
  private i = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly advanced: boolean
  ) {}

  parse(): number {
    const value = this.expr();
    const t = this.peek();
    if (t.kind !== 'end') throw new CalcError(`unexpected token at position ${t.pos}`);
    return value;
  }

  private peek(): Token {
    return this.tokens[this.i];
  }

  private isOp(op: string): boolean {
    const t = this.peek();
    return t.kind === 'op' && t.op === op;
  }

  private expect(op: string) {
    if (!this.isOp(op)) {
      const t = this.peek();
      throw new CalcError(t.kind === 'end' ? 'unexpected end of expression' : `expected '${op}' at position ${t.pos}`);
    }
    this.i++;
  }

  // expr := term (('+' | '-') term)*
  private expr(): number {
    let value = this.term();
    while (this.isOp('+') || this.isOp('-')) {
      const plus = this.isOp('+');
      this.i++;
      const rhs = this.term();
      value = plus ? value + rhs : value - rhs;
    }
    return value;
  }

  // term := unary (('*' | '/' | '%') unary)*
  private term(): number {
    let value = this.unary();
    while (this.isOp('*') || this.isOp('/') || this.isOp('%')) {
      const t = this.peek();
      const op = t.kind === 'op' ? t.op : '';
      this.i++;
      const rhs = this.unary();
      if ((op === '/' || op === '%') && rhs === 0) throw new CalcError('division by zero');
      if (op === '*') value *= rhs;
      else if (op === '/') value /= rhs;
      // modulo takes the sign of the divisor
      else value = ((value % rhs) + rhs) % rhs;
    }
    return value;
  }

  // unary := '-' unary | power
  private unary(): number {
    if (this.isOp('-')) {
      this.i++;
      return -this.unary();
    }
    return this.power();
  }

  // power := primary ('**' unary)?   (right-associative, binds tighter than a leading minus)
  private power(): number {
    const base = this.primary();
    if (this.isOp('**')) {
      this.i++;
      return base ** this.unary();
    }
    return base;
  }

  private primary(): number {
    const t = this.peek();
    if (t.kind === 'num') {
      this.i++;
      return t.value;
    }
    if (t.kind === 'op' && t.op === '(') {
      this.i++;
      const value = this.expr();
      this.expect(')');
      return value;
    }
    if (t.kind === 'ident') {
      this.i++;
      if (!this.advanced) throw new CalcError(`names are not allowed: '${t.name}'`);
      if (this.isOp('(')) return this.call(t.name);
      const constant = CONSTANTS.get(t.name);
      if (constant === undefined) throw new CalcError(`unknown name '${t.name}'`);
      return constant;
    }
    if (t.kind === 'end') throw new CalcError('unexpected end of expression');
    throw new CalcError(`unexpected token at position ${t.pos}`);
  }

  private call(name: string): number {
    const entry = FUNCTIONS.get(name);
    if (!entry) throw new CalcError(`unknown function '${name}'`);
    this.expect('(');
    const args: number[] = [];
    if (!this.isOp(')')) {
      args.push(this.expr());
      while (this.isOp(',')) {
        this.i++;
        args.push(this.expr());
      }
    }
    this.expect(')');
    const [min, max] = entry.arity;
    if (args.length < min || args.length > max) {
      throw new CalcError(`${name}() got ${args.length} argument(s)`);
    }
    return entry.fn(...args);
  }
}

/**
 * Evaluates an arithmetic expression without touching the JS evaluator.
 * Basic mode: numbers, + - * / % **, unary minus and parentheses.
 * Advanced mode adds the math functions and the constants pi and e.
 */
export function evaluate(expression: string, opts: CalcOptions = {}): number {
  const value = new Parser(tokenize(expression), opts.advanced ?? false).parse();
  if (!Number.isFinite(value)) throw new CalcError('result is not a finite number');
  return value;
}
