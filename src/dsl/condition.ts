/**
 * Condition expressions for run-level and step-level `if` fields.
 *
 * Grammar:
 *   expr    := or
 *   or      := and ('||' and)*
 *   and     := unary ('&&' unary)*
 *   unary   := '!' unary | primary
 *   primary := '(' expr ')' | 'true' | 'false' | ident ('==' | '!=') string
 *
 * Strings are single- or double-quoted. Identifiers are drawn from a fixed
 * set of run variables.
 */

/** Variables a condition can reference. */
export type ConditionVariables = {
  event: string;
  branch: string;
  ref: string;
  workflow: string;
};

/** Identifier spellings accepted in conditions, mapped to their variable. */
export const CONDITION_IDENTIFIERS: Record<string, keyof ConditionVariables> = {
  event: 'event',
  branch: 'branch',
  ref: 'ref',
  workflow: 'workflow',
  'github.event_name': 'event',
  'github.ref': 'ref',
  'github.ref_name': 'branch',
  'github.workflow': 'workflow',
};

/** Parsed condition tree. */
export type ConditionNode =
  | { kind: 'literal'; value: boolean }
  | { kind: 'compare'; variable: keyof ConditionVariables; operator: '==' | '!='; value: string }
  | { kind: 'not'; operand: ConditionNode }
  | { kind: 'and'; left: ConditionNode; right: ConditionNode }
  | { kind: 'or'; left: ConditionNode; right: ConditionNode };

/** Raised for malformed condition text. */
export class ConditionSyntaxError extends Error {
  constructor(message: string, public readonly position: number) {
    super(message);
    this.name = 'ConditionSyntaxError';
  }
}

type Token =
  | { type: 'ident'; text: string; pos: number }
  | { type: 'string'; text: string; pos: number }
  | { type: 'op'; text: '==' | '!=' | '&&' | '||' | '!' | '(' | ')'; pos: number }
  | { type: 'end'; pos: number };

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < source.length) {
    const ch = source[i];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    const two = source.slice(i, i + 2);
    if (two === '==' || two === '!=' || two === '&&' || two === '||') {
      tokens.push({ type: 'op', text: two, pos: i });
      i += 2;
      continue;
    }
    if (ch === '!' || ch === '(' || ch === ')') {
      tokens.push({ type: 'op', text: ch, pos: i });
      i++;
      continue;
    }
    if (ch === "'" || ch === '"') {
      const close = source.indexOf(ch, i + 1);
      if (close === -1) {
        throw new ConditionSyntaxError(`Unterminated string starting at ${i}`, i);
      }
      tokens.push({ type: 'string', text: source.slice(i + 1, close), pos: i });
      i = close + 1;
      continue;
    }
    const ident = /^[A-Za-z_][A-Za-z0-9_.]*/.exec(source.slice(i));
    if (ident) {
      tokens.push({ type: 'ident', text: ident[0], pos: i });
      i += ident[0].length;
      continue;
    }
    throw new ConditionSyntaxError(`Unexpected character "${ch}" at ${i}`, i);
  }
  tokens.push({ type: 'end', pos: source.length });
  return tokens;
}

class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): ConditionNode {
    const node = this.parseOr();
    const next = this.peek();
    if (next.type !== 'end') {
      throw new ConditionSyntaxError(`Unexpected token at ${next.pos}`, next.pos);
    }
    return node;
  }

  private peek(): Token {
    return this.tokens[this.index];
  }

  private next(): Token {
    const token = this.tokens[this.index];
    if (token.type !== 'end') this.index++;
    return token;
  }

  private isOp(text: string): boolean {
    const token = this.peek();
    return token.type === 'op' && token.text === text;
  }

  private parseOr(): ConditionNode {
    let left = this.parseAnd();
    while (this.isOp('||')) {
      this.next();
      left = { kind: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ConditionNode {
    let left = this.parseUnary();
    while (this.isOp('&&')) {
      this.next();
      left = { kind: 'and', left, right: this.parseUnary() };
    }
    return left;
  }

  private parseUnary(): ConditionNode {
    if (this.isOp('!')) {
      this.next();
      return { kind: 'not', operand: this.parseUnary() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): ConditionNode {
    const token = this.next();

    if (token.type === 'op' && token.text === '(') {
      const inner = this.parseOr();
      const close = this.next();
      if (close.type !== 'op' || close.text !== ')') {
        throw new ConditionSyntaxError(`Expected ")" at ${close.pos}`, close.pos);
      }
      return inner;
    }

    if (token.type !== 'ident') {
      throw new ConditionSyntaxError(`Expected identifier at ${token.pos}`, token.pos);
    }

    if (token.text === 'true' || token.text === 'false') {
      return { kind: 'literal', value: token.text === 'true' };
    }

    const variable = CONDITION_IDENTIFIERS[token.text];
    if (!variable) {
      throw new ConditionSyntaxError(
        `Unknown identifier "${token.text}". Known: ${Object.keys(CONDITION_IDENTIFIERS).join(', ')}`,
        token.pos,
      );
    }

    const operator = this.next();
    if (operator.type !== 'op' || (operator.text !== '==' && operator.text !== '!=')) {
      throw new ConditionSyntaxError(`Expected "==" or "!=" at ${operator.pos}`, operator.pos);
    }

    const value = this.next();
    if (value.type !== 'string') {
      throw new ConditionSyntaxError(`Expected quoted string at ${value.pos}`, value.pos);
    }

    return { kind: 'compare', variable, operator: operator.text, value: value.text };
  }
}

/** Parse a condition. An empty or blank condition is always true. */
export function parseCondition(source: string): ConditionNode {
  if (source.trim() === '') return { kind: 'literal', value: true };
  return new Parser(tokenize(source)).parse();
}

/** Evaluate a parsed condition against run variables. */
export function evaluateCondition(node: ConditionNode, vars: ConditionVariables): boolean {
  switch (node.kind) {
    case 'literal':
      return node.value;
    case 'compare': {
      const equal = vars[node.variable] === node.value;
      return node.operator === '==' ? equal : !equal;
    }
    case 'not':
      return !evaluateCondition(node.operand, vars);
    case 'and':
      return evaluateCondition(node.left, vars) && evaluateCondition(node.right, vars);
    case 'or':
      return evaluateCondition(node.left, vars) || evaluateCondition(node.right, vars);
  }
}
