/**
 * Parser and evaluator for the `where` predicate of /filter.
 *
 * Grammar (keywords are case-insensitive):
 *
 *   expression := or
 *   or         := and ("OR" and)*
 *   and        := not ("AND" not)*
 *   not        := "NOT" not | primary
 *   primary    := "(" expression ")" | column predicate
 *   predicate  := "IS" ["NOT"] "NULL" | operator literal
 *   operator   := "=" | "!=" | "<>" | "<" | "<=" | ">" | ">="
 *   column     := identifier | '"' quoted identifier '"'
 *   literal    := "'" string "'" | number | "TRUE" | "FALSE" | "NULL"
 *
 * Evaluation uses three-valued logic: a comparison involving null, or values
 * of different types, is unknown (null), and a row is kept only when the
 * whole predicate is true.
 */

export type ComparisonOperator = "=" | "!=" | "<" | "<=" | ">" | ">=";

export type Literal = string | number | boolean | null;

export type WhereExpression =
  | { type: "and"; left: WhereExpression; right: WhereExpression }
  | { type: "or"; left: WhereExpression; right: WhereExpression }
  | { type: "not"; operand: WhereExpression }
  | { type: "comparison"; column: string; operator: ComparisonOperator; value: Literal }
  | { type: "isNull"; column: string; negated: boolean };

export class WhereSyntaxError extends Error {
  readonly position: number;

  constructor(message: string, position: number) {
    super(`${message} at position ${position}`);
    this.name = "WhereSyntaxError";
    this.position = position;
  }
}

type Token =
  | { kind: "identifier"; value: string; position: number }
  | { kind: "quotedIdentifier"; value: string; position: number }
  | { kind: "string"; value: string; position: number }
  | { kind: "number"; value: number; position: number }
  | { kind: "keyword"; value: Keyword; position: number }
  | { kind: "operator"; value: ComparisonOperator; position: number }
  | { kind: "leftParen"; position: number }
  | { kind: "rightParen"; position: number }
  | { kind: "end"; position: number };

const KEYWORDS = ["AND", "OR", "NOT", "IS", "NULL", "TRUE", "FALSE"] as const;
type Keyword = (typeof KEYWORDS)[number];

function toKeyword(word: string): Keyword | undefined {
  const upper = word.toUpperCase();
  return KEYWORDS.find((keyword) => keyword === upper);
}

const NUMBER_PATTERN = /^-?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*/;
const OPERATOR_PATTERN = /^(?:<=|>=|<>|!=|=|<|>)/;

/** Reads a delimited token where a doubled delimiter escapes it */
function readDelimited(input: string, start: number, delimiter: string): { value: string; end: number } {
  let value = "";
  let i = start + 1;
  while (i < input.length) {
    const char = input[i];
    if (char === delimiter) {
      if (input[i + 1] === delimiter) {
        value += delimiter;
        i += 2;
        continue;
      }
      return { value, end: i + 1 };
    }
    value += char;
    i++;
  }
  throw new WhereSyntaxError(`Unterminated ${delimiter === "'" ? "string" : "identifier"}`, start);
}

export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < input.length) {
    const char = input[i];
    const rest = input.slice(i);

    if (/\s/.test(char)) {
      i++;
      continue;
    }
    if (char === "(") {
      tokens.push({ kind: "leftParen", position: i });
      i++;
      continue;
    }
    if (char === ")") {
      tokens.push({ kind: "rightParen", position: i });
      i++;
      continue;
    }
    if (char === "'") {
      const { value, end } = readDelimited(input, i, "'");
      tokens.push({ kind: "string", value, position: i });
      i = end;
      continue;
    }
    if (char === '"') {
      const { value, end } = readDelimited(input, i, '"');
      if (value === "") {
        throw new WhereSyntaxError("Empty identifier", i);
      }
      tokens.push({ kind: "quotedIdentifier", value, position: i });
      i = end;
      continue;
    }

    const operator = OPERATOR_PATTERN.exec(rest);
    if (operator) {
      const symbol = operator[0];
      tokens.push({ kind: "operator", value: symbol === "<>" ? "!=" : toOperator(symbol, i), position: i });
      i += symbol.length;
      continue;
    }

    const number = NUMBER_PATTERN.exec(rest);
    if (number) {
      tokens.push({ kind: "number", value: Number(number[0]), position: i });
      i += number[0].length;
      continue;
    }

    const identifier = IDENTIFIER_PATTERN.exec(rest);
    if (identifier) {
      const word = identifier[0];
      const keyword = toKeyword(word);
      tokens.push(keyword ? { kind: "keyword", value: keyword, position: i } : { kind: "identifier", value: word, position: i });
      i += word.length;
      continue;
    }

    throw new WhereSyntaxError(`Unexpected character '${char}'`, i);
  }

  tokens.push({ kind: "end", position: input.length });
  return tokens;
}

function toOperator(symbol: string, position: number): ComparisonOperator {
  switch (symbol) {
    case "=":
    case "!=":
    case "<":
    case "<=":
    case ">":
    case ">=":
      return symbol;
    default:
      throw new WhereSyntaxError(`Unknown operator '${symbol}'`, position);
  }
}

class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): WhereExpression {
    const expression = this.parseOr();
    const next = this.peek();
    if (next.kind !== "end") {
      throw new WhereSyntaxError("Unexpected token", next.position);
    }
    return expression;
  }

  private peek(): Token {
    return this.tokens[this.index];
  }

  private advance(): Token {
    const token = this.tokens[this.index];
    if (token.kind !== "end") {
      this.index++;
    }
    return token;
  }

  private acceptKeyword(keyword: Keyword): boolean {
    const token = this.peek();
    if (token.kind === "keyword" && token.value === keyword) {
      this.index++;
      return true;
    }
    return false;
  }

  private expectKeyword(keyword: Keyword): void {
    if (!this.acceptKeyword(keyword)) {
      throw new WhereSyntaxError(`Expected ${keyword}`, this.peek().position);
    }
  }

  private parseOr(): WhereExpression {
    let left = this.parseAnd();
    while (this.acceptKeyword("OR")) {
      left = { type: "or", left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): WhereExpression {
    let left = this.parseNot();
    while (this.acceptKeyword("AND")) {
      left = { type: "and", left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): WhereExpression {
    if (this.acceptKeyword("NOT")) {
      return { type: "not", operand: this.parseNot() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): WhereExpression {
    const token = this.advance();
    switch (token.kind) {
      case "leftParen": {
        const expression = this.parseOr();
        const closing = this.advance();
        if (closing.kind !== "rightParen") {
          throw new WhereSyntaxError("Expected ')'", closing.position);
        }
        return expression;
      }
      case "identifier":
      case "quotedIdentifier":
        return this.parsePredicate(token.value);
      default:
        throw new WhereSyntaxError("Expected a column or '('", token.position);
    }
  }

  private parsePredicate(column: string): WhereExpression {
    if (this.acceptKeyword("IS")) {
      const negated = this.acceptKeyword("NOT");
      this.expectKeyword("NULL");
      return { type: "isNull", column, negated };
    }

    const operator = this.advance();
    if (operator.kind !== "operator") {
      throw new WhereSyntaxError("Expected a comparison operator", operator.position);
    }
    return { type: "comparison", column, operator: operator.value, value: this.parseLiteral() };
  }

  private parseLiteral(): Literal {
    const token = this.advance();
    if (token.kind === "string" || token.kind === "number") {
      return token.value;
    }
    if (token.kind === "keyword") {
      if (token.value === "TRUE") return true;
      if (token.value === "FALSE") return false;
      if (token.value === "NULL") return null;
    }
    throw new WhereSyntaxError("Expected a literal", token.position);
  }
}

/**
 * Parses a where predicate. Throws WhereSyntaxError on malformed input,
 * including any statement separator.
 */
export function parseWhere(input: string): WhereExpression {
  const separator = input.indexOf(";");
  if (separator !== -1) {
    throw new WhereSyntaxError("Statement separators are not allowed", separator);
  }
  return new Parser(tokenize(input)).parse();
}

/**
 * Names of all columns referenced by the expression, without duplicates
 */
export function referencedColumns(expression: WhereExpression): string[] {
  const columns = new Set<string>();
  const visit = (node: WhereExpression): void => {
    switch (node.type) {
      case "and":
      case "or":
        visit(node.left);
        visit(node.right);
        break;
      case "not":
        visit(node.operand);
        break;
      case "comparison":
      case "isNull":
        columns.add(node.column);
        break;
    }
  };
  visit(expression);
  return [...columns];
}

function compare(cell: unknown, operator: ComparisonOperator, value: Literal): boolean | null {
  if (cell === null || cell === undefined || value === null) return null;

  let order: number;
  if (typeof cell === "number" && typeof value === "number") {
    order = cell - value;
  } else if (typeof cell === "string" && typeof value === "string") {
    order = cell < value ? -1 : cell > value ? 1 : 0;
  } else if (typeof cell === "boolean" && typeof value === "boolean") {
    order = Number(cell) - Number(value);
  } else {
    return null;
  }

  switch (operator) {
    case "=":
      return order === 0;
    case "!=":
      return order !== 0;
    case "<":
      return order < 0;
    case "<=":
      return order <= 0;
    case ">":
      return order > 0;
    case ">=":
      return order >= 0;
  }
}

/**
 * Evaluates the expression against a row: true, false, or null (unknown)
 */
export function evaluateWhere(expression: WhereExpression, row: Record<string, unknown>): boolean | null {
  switch (expression.type) {
    case "and": {
      const left = evaluateWhere(expression.left, row);
      if (left === false) return false;
      const right = evaluateWhere(expression.right, row);
      if (right === false) return false;
      return left === null || right === null ? null : true;
    }
    case "or": {
      const left = evaluateWhere(expression.left, row);
      if (left === true) return true;
      const right = evaluateWhere(expression.right, row);
      if (right === true) return true;
      return left === null || right === null ? null : false;
    }
    case "not": {
      const operand = evaluateWhere(expression.operand, row);
      return operand === null ? null : !operand;
    }
    case "isNull": {
      const cell = row[expression.column];
      const isNull = cell === null || cell === undefined;
      return expression.negated ? !isNull : isNull;
    }
    case "comparison":
      return compare(row[expression.column], expression.operator, expression.value);
  }
}
