import { SimpleError } from '../util/flow';
import { Specifier } from './version';
import { normalizeName } from './names';

export const MARKER_VARIABLES = [
  'python_version',
  'python_full_version',
  'os_name',
  'sys_platform',
  'platform_release',
  'platform_system',
  'platform_version',
  'platform_machine',
  'platform_python_implementation',
  'implementation_name',
  'implementation_version',
  'extra',
] as const;

export type MarkerVariable = typeof MARKER_VARIABLES[number];

/**
 * Values of the marker variables for one interpreter
 *
 * 'extra' is supplied per evaluation.
 */
export type MarkerEnvironment = Record<Exclude<MarkerVariable, 'extra'>, string>;

export type MarkerOperator = '<=' | '<' | '!=' | '==' | '>=' | '>' | '~=' | '===' | 'in' | 'not in';

type MarkerValue = { readonly variable: MarkerVariable } | { readonly literal: string };

type MarkerNode =
  | { readonly type: 'compare'; readonly left: MarkerValue; readonly op: MarkerOperator; readonly right: MarkerValue }
  | { readonly type: 'and' | 'or'; readonly left: MarkerNode; readonly right: MarkerNode };

export class InvalidMarker extends SimpleError {
}

/**
 * An environment marker, like "python_version < '3.11' and sys_platform == 'linux'"
 */
export class Marker {
  public static parse(s: string): Marker {
    const parser = new MarkerParser(tokenize(s), s);
    return new Marker(s.trim(), parser.parse());
  }

  private constructor(private readonly source: string, private readonly root: MarkerNode) {
  }

  public evaluate(env: MarkerEnvironment, extra: string = ''): boolean {
    return evaluateNode(this.root, { ...env, extra });
  }

  public toString() {
    return this.source;
  }
}

type Token =
  | { readonly kind: 'paren'; readonly value: '(' | ')' }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'op'; readonly value: MarkerOperator }
  | { readonly kind: 'word'; readonly value: string };

const TOKEN_PATTERN = /\s*(?:(\()|(\))|'([^']*)'|"([^"]*)"|(===|==|!=|<=|>=|~=|<|>)|(not\s+in\b)|([A-Za-z_][A-Za-z0-9_.]*))/y;

function tokenize(s: string): Token[] {
  const ret = new Array<Token>();
  TOKEN_PATTERN.lastIndex = 0;
  while (s.slice(TOKEN_PATTERN.lastIndex).trim() !== '') {
    const start = TOKEN_PATTERN.lastIndex;
    const m = TOKEN_PATTERN.exec(s);
    if (!m) {
      throw new InvalidMarker(`Invalid marker: unexpected input at position ${start} in '${s}'`);
    }
    const [, open, close, single, double, op, notIn, word] = m;
    if (open !== undefined) { ret.push({ kind: 'paren', value: '(' }); }
    else if (close !== undefined) { ret.push({ kind: 'paren', value: ')' }); }
    else if (single !== undefined) { ret.push({ kind: 'string', value: single }); }
    else if (double !== undefined) { ret.push({ kind: 'string', value: double }); }
    else if (op !== undefined && isComparison(op)) { ret.push({ kind: 'op', value: op }); }
    else if (notIn !== undefined) { ret.push({ kind: 'op', value: 'not in' }); }
    else if (word === 'in') { ret.push({ kind: 'op', value: 'in' }); }
    else { ret.push({ kind: 'word', value: word }); }
  }
  return ret;
}

function isComparison(x: string): x is MarkerOperator {
  return ['<=', '<', '!=', '==', '>=', '>', '~=', '==='].includes(x);
}

function isVariable(x: string): x is MarkerVariable {
  return MARKER_VARIABLES.some(v => v === x);
}

class MarkerParser {
  private pos = 0;

  constructor(private readonly tokens: Token[], private readonly source: string) {
  }

  public parse(): MarkerNode {
    const node = this.parseOr();
    if (this.pos < this.tokens.length) {
      throw this.error('unexpected trailing input');
    }
    return node;
  }

  private parseOr(): MarkerNode {
    let left = this.parseAnd();
    while (this.peekWord('or')) {
      this.pos++;
      left = { type: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): MarkerNode {
    let left = this.parseExpression();
    while (this.peekWord('and')) {
      this.pos++;
      left = { type: 'and', left, right: this.parseExpression() };
    }
    return left;
  }

  private parseExpression(): MarkerNode {
    const token = this.tokens[this.pos];
    if (token?.kind === 'paren' && token.value === '(') {
      this.pos++;
      const inner = this.parseOr();
      const close = this.tokens[this.pos];
      if (close?.kind !== 'paren' || close.value !== ')') {
        throw this.error("expected ')'");
      }
      this.pos++;
      return inner;
    }

    const left = this.parseValue();
    const op = this.tokens[this.pos];
    if (op?.kind !== 'op') {
      throw this.error('expected a comparison operator');
    }
    this.pos++;
    const right = this.parseValue();
    return { type: 'compare', left, op: op.value, right };
  }

  private parseValue(): MarkerValue {
    const token = this.tokens[this.pos];
    if (token?.kind === 'string') {
      this.pos++;
      return { literal: token.value };
    }
    if (token?.kind === 'word' && isVariable(token.value)) {
      this.pos++;
      return { variable: token.value };
    }
    throw this.error(token ? `unexpected '${token.value}'` : 'unexpected end of marker');
  }

  private peekWord(word: string) {
    const token = this.tokens[this.pos];
    return token?.kind === 'word' && token.value === word;
  }

  private error(message: string) {
    return new InvalidMarker(`Invalid marker '${this.source}': ${message}`);
  }
}

type FullEnvironment = MarkerEnvironment & { readonly extra: string };

function evaluateNode(node: MarkerNode, env: FullEnvironment): boolean {
  switch (node.type) {
    case 'and': return evaluateNode(node.left, env) && evaluateNode(node.right, env);
    case 'or': return evaluateNode(node.left, env) || evaluateNode(node.right, env);
    case 'compare': {
      let left = resolveValue(node.left, env);
      let right = resolveValue(node.right, env);
      if (isExtra(node.left) || isExtra(node.right)) {
        left = normalizeName(left);
        right = normalizeName(right);
      }
      return compare(left, node.op, right);
    }
  }
}

function isExtra(v: MarkerValue) {
  return 'variable' in v && v.variable === 'extra';
}

function resolveValue(v: MarkerValue, env: FullEnvironment): string {
  return 'literal' in v ? v.literal : env[v.variable];
}

function compare(left: string, op: MarkerOperator, right: string): boolean {
  if (op === 'in') { return right.includes(left); }
  if (op === 'not in') { return !right.includes(left); }

  // Version comparison where the right side is a version, plain string comparison otherwise
  const specifier = Specifier.tryParse(`${op}${right}`);
  if (specifier) {
    return specifier.contains(left);
  }

  switch (op) {
    case '==':
    case '===':
      return left === right;
    case '!=': return left !== right;
    case '<': return left < right;
    case '<=': return left <= right;
    case '>': return left > right;
    case '>=': return left >= right;
    case '~=':
      throw new InvalidMarker(`Cannot compare '${left}' ~= '${right}'`);
  }
}
