// Breakpoint conditions are a small closed predicate language evaluated
// against the interception context. Nothing in a condition is executed.
//
//   expr       := andExpr ( '||' andExpr )*
//   andExpr    := unary ( '&&' unary )*
//   unary      := '!' unary | '(' expr ')' | comparison
//   comparison := path ( op literal )?
//   op         := '==' | '!=' | '>' | '>=' | '<' | '<=' | 'contains'
//   path       := ident ( '.' ident | '.' integer )*
//   literal    := string | number | true | false | null

export class ConditionSyntaxError extends Error {
  constructor(message: string, readonly source: string) {
    super(`${message} in condition "${source}"`);
    this.name = 'ConditionSyntaxError';
  }
}

type Literal = string | number | boolean | null;

type Operator = '==' | '!=' | '>' | '>=' | '<' | '<=' | 'contains';

export type ConditionNode =
  | { kind: 'or'; left: ConditionNode; right: ConditionNode }
  | { kind: 'and'; left: ConditionNode; right: ConditionNode }
  | { kind: 'not'; operand: ConditionNode }
  | { kind: 'truthy'; path: string[] }
  | { kind: 'compare'; path: string[]; op: Operator; value: Literal };

type Token =
  | { type: 'ident'; value: string }
  | { type: 'number'; value: number }
  | { type: 'string'; value: string }
  | { type: 'op'; value: Operator }
  | { type: 'punct'; value: '&&' | '||' | '!' | '(' | ')' | '.' };

// ---------------------------------------------------------------------------
// Tokenizer
// ---------------------------------------------------------------------------

const SYMBOLS: Array<[string, Token]> = [
  ['&&', { type: 'punct', value: '&&' }],
  ['||', { type: 'punct', value: '||' }],
  ['==', { type: 'op', value: '==' }],
  ['!=', { type: 'op', value: '!=' }],
  ['>=', { type: 'op', value: '>=' }],
  ['<=', { type: 'op', value: '<=' }],
  ['>', { type: 'op', value: '>' }],
  ['<', { type: 'op', value: '<' }],
  ['!', { type: 'punct', value: '!' }],
  ['(', { type: 'punct', value: '(' }],
  [')', { type: 'punct', value: ')' }],
  ['.', { type: 'punct', value: '.' }],
];

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source.charAt(i);

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      let value = '';
      i++;
      while (i < source.length && source.charAt(i) !== ch) {
        if (source.charAt(i) === '\\' && i + 1 < source.length) i++;
        value += source.charAt(i);
        i++;
      }
      if (i >= source.length) throw new ConditionSyntaxError('Unterminated string', source);
      i++;
      tokens.push({ type: 'string', value });
      continue;
    }

    const previous = tokens.at(-1);
    // Digits after a path dot are an index, never a decimal or negative number.
    const afterDot = previous?.type === 'punct' && previous.value === '.';
    const number = (afterDot ? /^\d+/ : /^-?\d+(\.\d+)?/).exec(source.slice(i));
    if (number) {
      tokens.push({ type: 'number', value: Number(number[0]) });
      i += number[0].length;
      continue;
    }

    const ident = /^[A-Za-z_$][\w$]*/.exec(source.slice(i));
    if (ident) {
      tokens.push(
        ident[0] === 'contains'
          ? { type: 'op', value: 'contains' }
          : { type: 'ident', value: ident[0] },
      );
      i += ident[0].length;
      continue;
    }

    const symbol = SYMBOLS.find(([text]) => source.startsWith(text, i));
    if (symbol) {
      tokens.push(symbol[1]);
      i += symbol[0].length;
      continue;
    }

    throw new ConditionSyntaxError(`Unexpected character "${ch}"`, source);
  }

  return tokens;
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

class Parser {
  private pos = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly source: string,
  ) {}

  parse(): ConditionNode {
    if (this.tokens.length === 0) throw this.error('Empty condition');
    const node = this.parseOr();
    if (this.pos < this.tokens.length) throw this.error('Unexpected trailing input');
    return node;
  }

  private parseOr(): ConditionNode {
    let left = this.parseAnd();
    while (this.matchPunct('||')) {
      left = { kind: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ConditionNode {
    let left = this.parseUnary();
    while (this.matchPunct('&&')) {
      left = { kind: 'and', left, right: this.parseUnary() };
    }
    return left;
  }

  private parseUnary(): ConditionNode {
    if (this.matchPunct('!')) {
      return { kind: 'not', operand: this.parseUnary() };
    }
    if (this.matchPunct('(')) {
      const inner = this.parseOr();
      if (!this.matchPunct(')')) throw this.error('Expected ")"');
      return inner;
    }
    return this.parseComparison();
  }

  private parseComparison(): ConditionNode {
    const path = this.parsePath();
    const next = this.tokens[this.pos];
    if (next?.type !== 'op') return { kind: 'truthy', path };
    this.pos++;
    return { kind: 'compare', path, op: next.value, value: this.parseLiteral() };
  }

  private parsePath(): string[] {
    const first = this.tokens[this.pos];
    if (first?.type !== 'ident') throw this.error('Expected a field name');
    this.pos++;
    const path = [first.value];
    while (this.matchPunct('.')) {
      const segment = this.tokens[this.pos];
      if (segment?.type === 'ident') {
        path.push(segment.value);
      } else if (segment?.type === 'number' && Number.isInteger(segment.value) && segment.value >= 0) {
        path.push(String(segment.value));
      } else {
        throw this.error('Expected a field name or index after "."');
      }
      this.pos++;
    }
    return path;
  }

  private parseLiteral(): Literal {
    const token = this.tokens[this.pos];
    this.pos++;
    if (token?.type === 'string' || token?.type === 'number') return token.value;
    if (token?.type === 'ident') {
      if (token.value === 'true') return true;
      if (token.value === 'false') return false;
      if (token.value === 'null') return null;
    }
    throw this.error('Expected a string, number, true, false or null');
  }

  private matchPunct(value: string): boolean {
    const token = this.tokens[this.pos];
    if (token?.type === 'punct' && token.value === value) {
      this.pos++;
      return true;
    }
    return false;
  }

  private error(message: string): ConditionSyntaxError {
    return new ConditionSyntaxError(message, this.source);
  }
}

export function parseCondition(source: string): ConditionNode {
  return new Parser(tokenize(source), source).parse();
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

function resolvePath(root: unknown, path: string[]): unknown {
  let current = root;
  for (const segment of path) {
    if (current === null || current === undefined) return undefined;
    if (segment === 'length' && (typeof current === 'string' || Array.isArray(current))) {
      current = current.length;
    } else if (Array.isArray(current)) {
      current = current[Number(segment)];
    } else if (typeof current === 'object' && Object.hasOwn(current, segment)) {
      current = Reflect.get(current, segment);
    } else {
      return undefined;
    }
  }
  return current;
}

function compare(left: unknown, op: Operator, right: Literal): boolean {
  switch (op) {
    case '==':
      return left === right;
    case '!=':
      return left !== right;
    case 'contains':
      if (typeof left === 'string') return typeof right === 'string' && left.includes(right);
      if (Array.isArray(left)) return left.includes(right);
      return false;
    default: {
      let diff: number;
      if (typeof left === 'number' && typeof right === 'number') {
        diff = left - right;
      } else if (typeof left === 'string' && typeof right === 'string') {
        diff = left < right ? -1 : left > right ? 1 : 0;
      } else {
        return false;
      }
      if (op === '>') return diff > 0;
      if (op === '>=') return diff >= 0;
      if (op === '<') return diff < 0;
      return diff <= 0;
    }
  }
}

export function evaluateCondition(node: ConditionNode, context: Record<string, unknown>): boolean {
  switch (node.kind) {
    case 'or':
      return evaluateCondition(node.left, context) || evaluateCondition(node.right, context);
    case 'and':
      return evaluateCondition(node.left, context) && evaluateCondition(node.right, context);
    case 'not':
      return !evaluateCondition(node.operand, context);
    case 'truthy':
      return Boolean(resolvePath(context, node.path));
    case 'compare':
      return compare(resolvePath(context, node.path), node.op, node.value);
  }
}

/** Parse and evaluate in one step. Throws ConditionSyntaxError on malformed input. */
export function matchesCondition(source: string, context: Record<string, unknown>): boolean {
  return evaluateCondition(parseCondition(source), context);
}
