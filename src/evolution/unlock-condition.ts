/**
 * Unlock-condition expressions.
 *
 * A small closed grammar over skill levels, parsed explicitly and evaluated
 * against a lookup of known skills. Nothing here reaches a general-purpose
 * evaluator.
 *
 *   expr       := orExpr
 *   orExpr     := andExpr (("or" | "||") andExpr)*
 *   andExpr    := notExpr (("and" | "&&") notExpr)*
 *   notExpr    := ("not" | "!") notExpr | primary
 *   primary    := "(" expr ")" | comparison
 *   comparison := operand (compareOp operand)+
 *   operand    := IDENTIFIER | INTEGER
 *
 * Keywords are case-insensitive. Chained comparisons ("5 <= a < 10") hold
 * only when every link holds.
 */
import { UnlockConditionError } from "./errors.js";

export type CompareOp = ">=" | "<=" | ">" | "<" | "==" | "!=";

export type Operand =
  | { kind: "skill"; id: string }
  | { kind: "int"; value: number };

export type ConditionNode =
  | { kind: "and"; left: ConditionNode; right: ConditionNode }
  | { kind: "or"; left: ConditionNode; right: ConditionNode }
  | { kind: "not"; operand: ConditionNode }
  | { kind: "compare"; operands: Operand[]; ops: CompareOp[] };

type Token =
  | { type: "ident"; value: string; pos: number }
  | { type: "int"; value: number; pos: number }
  | { type: "op"; value: CompareOp; pos: number }
  | { type: "and" | "or" | "not" | "lparen" | "rparen"; pos: number }
  | { type: "eof"; pos: number };

const COMPARE_OPS: readonly CompareOp[] = [">=", "<=", "==", "!=", ">", "<"];
const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_.-]/;

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source.charAt(i);

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === "(") {
      tokens.push({ type: "lparen", pos: i++ });
      continue;
    }
    if (ch === ")") {
      tokens.push({ type: "rparen", pos: i++ });
      continue;
    }

    const two = source.slice(i, i + 2);
    if (two === "&&" || two === "||") {
      tokens.push({ type: two === "&&" ? "and" : "or", pos: i });
      i += 2;
      continue;
    }

    const op = COMPARE_OPS.find((candidate) => source.startsWith(candidate, i));
    if (op) {
      tokens.push({ type: "op", value: op, pos: i });
      i += op.length;
      continue;
    }
    if (ch === "!") {
      tokens.push({ type: "not", pos: i++ });
      continue;
    }

    if (/[0-9]/.test(ch)) {
      const start = i;
      while (i < source.length && /[0-9]/.test(source.charAt(i))) i++;
      if (i < source.length && IDENT_START.test(source.charAt(i))) {
        throw new UnlockConditionError("Malformed number", source, start);
      }
      tokens.push({ type: "int", value: parseInt(source.slice(start, i), 10), pos: start });
      continue;
    }

    if (IDENT_START.test(ch)) {
      const start = i;
      while (i < source.length && IDENT_PART.test(source.charAt(i))) i++;
      const word = source.slice(start, i);
      const keyword = word.toLowerCase();
      if (keyword === "and" || keyword === "or" || keyword === "not") {
        tokens.push({ type: keyword, pos: start });
      } else {
        tokens.push({ type: "ident", value: word, pos: start });
      }
      continue;
    }

    throw new UnlockConditionError(`Unexpected character "${ch}"`, source, i);
  }

  tokens.push({ type: "eof", pos: source.length });
  return tokens;
}

class Parser {
  private index = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: Token[]
  ) {}

  parse(): ConditionNode {
    const node = this.parseOr();
    const next = this.peek();
    if (next.type !== "eof") {
      throw new UnlockConditionError("Unexpected trailing input", this.source, next.pos);
    }
    return node;
  }

  private peek(): Token {
    // The token list always ends with eof, and the index never passes it.
    return this.tokens[Math.min(this.index, this.tokens.length - 1)] ?? { type: "eof", pos: this.source.length };
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== "eof") this.index++;
    return token;
  }

  private parseOr(): ConditionNode {
    let left = this.parseAnd();
    while (this.peek().type === "or") {
      this.advance();
      left = { kind: "or", left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ConditionNode {
    let left = this.parseNot();
    while (this.peek().type === "and") {
      this.advance();
      left = { kind: "and", left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): ConditionNode {
    if (this.peek().type === "not") {
      this.advance();
      return { kind: "not", operand: this.parseNot() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): ConditionNode {
    const token = this.peek();
    if (token.type === "lparen") {
      this.advance();
      const inner = this.parseOr();
      const closing = this.advance();
      if (closing.type !== "rparen") {
        throw new UnlockConditionError('Expected ")"', this.source, closing.pos);
      }
      return inner;
    }
    return this.parseComparison();
  }

  private parseComparison(): ConditionNode {
    const operands: Operand[] = [this.parseOperand()];
    const ops: CompareOp[] = [];

    let next = this.peek();
    while (next.type === "op") {
      this.advance();
      ops.push(next.value);
      operands.push(this.parseOperand());
      next = this.peek();
    }

    if (ops.length === 0) {
      throw new UnlockConditionError("Expected a comparison operator", this.source, next.pos);
    }
    return { kind: "compare", operands, ops };
  }

  private parseOperand(): Operand {
    const token = this.advance();
    if (token.type === "ident") return { kind: "skill", id: token.value };
    if (token.type === "int") return { kind: "int", value: token.value };
    throw new UnlockConditionError("Expected a skill id or integer", this.source, token.pos);
  }
}

/** True when `id` tokenizes as a single skill identifier, so it can be written into an expression. */
export function isConditionIdentifier(id: string): boolean {
  if (!/^[A-Za-z_][A-Za-z0-9_.-]*$/.test(id)) return false;
  const word = id.toLowerCase();
  return word !== "and" && word !== "or" && word !== "not";
}

export function parseUnlockCondition(source: string): ConditionNode {
  if (source.trim() === "") {
    throw new UnlockConditionError("Empty condition", source, 0);
  }
  return new Parser(source, tokenize(source)).parse();
}

/** Skill ids an expression reads, in first-seen order. */
export function referencedSkills(node: ConditionNode): string[] {
  const seen = new Set<string>();
  const visit = (n: ConditionNode): void => {
    switch (n.kind) {
      case "and":
      case "or":
        visit(n.left);
        visit(n.right);
        return;
      case "not":
        visit(n.operand);
        return;
      case "compare":
        for (const operand of n.operands) {
          if (operand.kind === "skill") seen.add(operand.id);
        }
    }
  };
  visit(node);
  return [...seen];
}

function compare(left: number, op: CompareOp, right: number): boolean {
  switch (op) {
    case ">=":
      return left >= right;
    case "<=":
      return left <= right;
    case ">":
      return left > right;
    case "<":
      return left < right;
    case "==":
      return left === right;
    case "!=":
      return left !== right;
  }
}

/**
 * Evaluate a parsed condition. `levelOf` returns undefined for ids it does
 * not know, which is an evaluation error rather than level 0.
 */
export function evaluateCondition(
  node: ConditionNode,
  levelOf: (skillId: string) => number | undefined
): boolean {
  switch (node.kind) {
    case "and":
      return evaluateCondition(node.left, levelOf) && evaluateCondition(node.right, levelOf);
    case "or":
      return evaluateCondition(node.left, levelOf) || evaluateCondition(node.right, levelOf);
    case "not":
      return !evaluateCondition(node.operand, levelOf);
    case "compare": {
      const values = node.operands.map((operand) => {
        if (operand.kind === "int") return operand.value;
        const level = levelOf(operand.id);
        if (level === undefined) {
          throw new UnlockConditionError(`Unknown skill "${operand.id}"`, operand.id, 0);
        }
        return level;
      });
      return node.ops.every((op, i) => compare(values[i] ?? 0, op, values[i + 1] ?? 0));
    }
  }
}
