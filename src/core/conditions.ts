/**
 * Condition expressions over instance variables.
 *
 *   review.decision == 'approve'
 *   amount > 10000 && !(region in ['eu', 'uk'])
 *   legal.signed
 *
 * Supported: string/number/boolean/null literals, dotted variable paths,
 * `== != > >= < <=`, `in [...]`, `&& || !` and parentheses. A bare path is
 * tested for truthiness.
 *
 * A comparison that touches an unset variable is false rather than an
 * error, so decisions skip branches whose inputs have not been provided yet.
 */

type Literal = string | number | boolean | null;

export type ConditionExpr =
  | { type: "literal"; value: Literal }
  | { type: "path"; path: string }
  | { type: "not"; operand: ConditionExpr }
  | { type: "and" | "or"; left: ConditionExpr; right: ConditionExpr }
  | {
      type: "compare";
      op: "==" | "!=" | ">" | ">=" | "<" | "<=";
      left: ConditionExpr;
      right: ConditionExpr;
    }
  | { type: "in"; left: ConditionExpr; items: Literal[] };

export class ConditionSyntaxError extends Error {
  constructor(
    public readonly expression: string,
    public readonly position: number,
    detail: string,
  ) {
    super(`${detail} at position ${position} in "${expression}"`);
    this.name = "ConditionSyntaxError";
  }
}

type Token =
  | { kind: "string"; value: string; pos: number }
  | { kind: "number"; value: number; pos: number }
  | { kind: "ident"; value: string; pos: number }
  | { kind: "op"; value: string; pos: number }
  | { kind: "eof"; pos: number };

const OPERATORS = ["==", "!=", ">=", "<=", "&&", "||", ">", "<", "!", "(", ")", "[", "]", ","];

const tokenize = (source: string): Token[] => {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source.charAt(i);

    if (/\s/.test(ch)) {
      i += 1;
      continue;
    }

    if (ch === "'" || ch === '"') {
      const start = i;
      let value = "";
      i += 1;
      while (i < source.length && source.charAt(i) !== ch) {
        if (source.charAt(i) === "\\" && i + 1 < source.length) {
          i += 1;
        }
        value += source.charAt(i);
        i += 1;
      }
      if (i >= source.length) {
        throw new ConditionSyntaxError(source, start, "Unterminated string");
      }
      i += 1;
      tokens.push({ kind: "string", value, pos: start });
      continue;
    }

    const number = /^-?\d+(\.\d+)?/.exec(source.slice(i));
    if (number) {
      tokens.push({ kind: "number", value: Number(number[0]), pos: i });
      i += number[0].length;
      continue;
    }

    const ident = /^[A-Za-z_$][\w$]*(\.[A-Za-z_$][\w$]*)*/.exec(source.slice(i));
    if (ident) {
      tokens.push({ kind: "ident", value: ident[0], pos: i });
      i += ident[0].length;
      continue;
    }

    const op = OPERATORS.find((candidate) => source.startsWith(candidate, i));
    if (op) {
      tokens.push({ kind: "op", value: op, pos: i });
      i += op.length;
      continue;
    }

    throw new ConditionSyntaxError(source, i, `Unexpected character '${ch}'`);
  }

  tokens.push({ kind: "eof", pos: source.length });
  return tokens;
};

class Parser {
  private index = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: Token[],
  ) {}

  parse(): ConditionExpr {
    const expr = this.parseOr();
    const next = this.peek();
    if (next.kind !== "eof") {
      throw new ConditionSyntaxError(this.source, next.pos, "Unexpected token");
    }
    return expr;
  }

  private peek(): Token {
    return this.tokens[this.index] ?? { kind: "eof", pos: this.source.length };
  }

  private next(): Token {
    const token = this.peek();
    this.index += 1;
    return token;
  }

  private isOp(value: string): boolean {
    const token = this.peek();
    return token.kind === "op" && token.value === value;
  }

  private expectOp(value: string): void {
    const token = this.next();
    if (token.kind !== "op" || token.value !== value) {
      throw new ConditionSyntaxError(this.source, token.pos, `Expected '${value}'`);
    }
  }

  private parseOr(): ConditionExpr {
    let left = this.parseAnd();
    while (this.isOp("||")) {
      this.next();
      left = { type: "or", left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ConditionExpr {
    let left = this.parseUnary();
    while (this.isOp("&&")) {
      this.next();
      left = { type: "and", left, right: this.parseUnary() };
    }
    return left;
  }

  private parseUnary(): ConditionExpr {
    if (this.isOp("!")) {
      this.next();
      return { type: "not", operand: this.parseUnary() };
    }
    return this.parseComparison();
  }

  private parseComparison(): ConditionExpr {
    const left = this.parsePrimary();
    const token = this.peek();

    if (token.kind === "ident" && token.value === "in") {
      this.next();
      return { type: "in", left, items: this.parseList() };
    }

    if (
      token.kind === "op" &&
      (token.value === "==" ||
        token.value === "!=" ||
        token.value === ">" ||
        token.value === ">=" ||
        token.value === "<" ||
        token.value === "<=")
    ) {
      this.next();
      return { type: "compare", op: token.value, left, right: this.parsePrimary() };
    }

    return left;
  }

  private parseList(): Literal[] {
    this.expectOp("[");
    const items: Literal[] = [];
    if (this.isOp("]")) {
      this.next();
      return items;
    }
    for (;;) {
      const item = this.parsePrimary();
      if (item.type !== "literal") {
        throw new ConditionSyntaxError(
          this.source,
          this.peek().pos,
          "List items must be literals",
        );
      }
      items.push(item.value);
      if (this.isOp(",")) {
        this.next();
        continue;
      }
      this.expectOp("]");
      return items;
    }
  }

  private parsePrimary(): ConditionExpr {
    const token = this.next();
    switch (token.kind) {
      case "string":
      case "number":
        return { type: "literal", value: token.value };
      case "ident":
        if (token.value === "true") return { type: "literal", value: true };
        if (token.value === "false") return { type: "literal", value: false };
        if (token.value === "null") return { type: "literal", value: null };
        return { type: "path", path: token.value };
      case "op":
        if (token.value === "(") {
          const inner = this.parseOr();
          this.expectOp(")");
          return inner;
        }
        throw new ConditionSyntaxError(this.source, token.pos, `Unexpected '${token.value}'`);
      case "eof":
        throw new ConditionSyntaxError(this.source, token.pos, "Unexpected end of expression");
    }
  }
}

const cache = new Map<string, ConditionExpr>();

export const parseCondition = (expression: string): ConditionExpr => {
  const cached = cache.get(expression);
  if (cached) {
    return cached;
  }
  const parsed = new Parser(expression, tokenize(expression)).parse();
  cache.set(expression, parsed);
  return parsed;
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Looks a variable up by its full dotted name first (flat keys such as
 * `review.decision`), then by walking nested objects.
 */
export const lookupVariable = (
  variables: Record<string, unknown>,
  path: string,
): { defined: boolean; value: unknown } => {
  if (Object.hasOwn(variables, path)) {
    const value = variables[path];
    return { defined: value !== undefined, value };
  }

  let current: unknown = variables;
  for (const segment of path.split(".")) {
    if (!isRecord(current) || !Object.hasOwn(current, segment)) {
      return { defined: false, value: undefined };
    }
    current = current[segment];
  }
  return { defined: current !== undefined, value: current };
};

const valueOf = (
  expr: ConditionExpr,
  variables: Record<string, unknown>,
): { defined: boolean; value: unknown } => {
  if (expr.type === "literal") {
    return { defined: true, value: expr.value };
  }
  if (expr.type === "path") {
    return lookupVariable(variables, expr.path);
  }
  return { defined: true, value: evaluate(expr, variables) };
};

const compareOrdered = (
  op: ">" | ">=" | "<" | "<=",
  left: unknown,
  right: unknown,
): boolean => {
  const bothNumbers = typeof left === "number" && typeof right === "number";
  const bothStrings = typeof left === "string" && typeof right === "string";
  if (!bothNumbers && !bothStrings) {
    return false;
  }
  switch (op) {
    case ">":
      return left > right;
    case ">=":
      return left >= right;
    case "<":
      return left < right;
    case "<=":
      return left <= right;
  }
};

const evaluate = (
  expr: ConditionExpr,
  variables: Record<string, unknown>,
): boolean => {
  switch (expr.type) {
    case "literal":
      return Boolean(expr.value);
    case "path": {
      const found = lookupVariable(variables, expr.path);
      return found.defined && Boolean(found.value);
    }
    case "not":
      return !evaluate(expr.operand, variables);
    case "and":
      return evaluate(expr.left, variables) && evaluate(expr.right, variables);
    case "or":
      return evaluate(expr.left, variables) || evaluate(expr.right, variables);
    case "in": {
      const left = valueOf(expr.left, variables);
      return left.defined && expr.items.some((item) => item === left.value);
    }
    case "compare": {
      const left = valueOf(expr.left, variables);
      const right = valueOf(expr.right, variables);
      if (!left.defined || !right.defined) {
        return false;
      }
      if (expr.op === "==") return left.value === right.value;
      if (expr.op === "!=") return left.value !== right.value;
      return compareOrdered(expr.op, left.value, right.value);
    }
  }
};

export const evaluateExpression = (
  expression: string,
  variables: Record<string, unknown>,
): boolean => evaluate(parseCondition(expression), variables);

const collectPaths = (expr: ConditionExpr, into: Set<string>): void => {
  switch (expr.type) {
    case "path":
      into.add(expr.path);
      return;
    case "not":
      collectPaths(expr.operand, into);
      return;
    case "and":
    case "or":
    case "compare":
      collectPaths(expr.left, into);
      collectPaths(expr.right, into);
      return;
    case "in":
      collectPaths(expr.left, into);
      return;
    case "literal":
      return;
  }
};

export const referencedVariables = (expression: string): string[] => {
  const paths = new Set<string>();
  collectPaths(parseCondition(expression), paths);
  return [...paths];
};
