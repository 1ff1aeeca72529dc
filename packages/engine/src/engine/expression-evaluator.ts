// ─── Expression Evaluator ──────────────────────────────────────────
// A safe, sandboxed evaluator for the joker condition DSL.
// Expressions are strings like "contains('flush') && money >= 20" or
// "count_suit('scoring', 'hearts') * 3".
// NO eval() or Function(): we parse a restricted grammar, once, when
// the joker is constructed.

import type { PlayingCard } from "@jester/schema";
import { JesterError } from "../errors";
import type { ScoringContext } from "../types/behavior";

// ─── AST Node Types ────────────────────────────────────────────────
// Discriminated union on `kind` field.

export interface NumberLiteral {
  readonly kind: "NumberLiteral";
  readonly value: number;
}

export interface BooleanLiteral {
  readonly kind: "BooleanLiteral";
  readonly value: boolean;
}

export interface StringLiteral {
  readonly kind: "StringLiteral";
  readonly value: string;
}

export interface Identifier {
  readonly kind: "Identifier";
  readonly name: string;
}

export interface MemberAccess {
  readonly kind: "MemberAccess";
  readonly object: ASTNode;
  readonly property: string;
}

export interface FunctionCall {
  readonly kind: "FunctionCall";
  readonly callee: string;
  readonly args: readonly ASTNode[];
}

export type BinaryOperator =
  | "<"
  | ">"
  | "<="
  | ">="
  | "=="
  | "!="
  | "&&"
  | "||"
  | "+"
  | "-"
  | "*"
  | "/";

export interface BinaryOp {
  readonly kind: "BinaryOp";
  readonly operator: BinaryOperator;
  readonly left: ASTNode;
  readonly right: ASTNode;
}

export type UnaryOperator = "!" | "-";

export interface UnaryOp {
  readonly kind: "UnaryOp";
  readonly operator: UnaryOperator;
  readonly operand: ASTNode;
}

export type ASTNode =
  | NumberLiteral
  | BooleanLiteral
  | StringLiteral
  | Identifier
  | MemberAccess
  | FunctionCall
  | BinaryOp
  | UnaryOp;

// ─── Eval Result & Context ─────────────────────────────────────────

/**
 * The result of evaluating an expression.
 * Discriminated to distinguish booleans from numeric results.
 */
export type EvalResult =
  | { readonly kind: "boolean"; readonly value: boolean }
  | { readonly kind: "number"; readonly value: number }
  | { readonly kind: "string"; readonly value: string };

/** Bindings an expression can reference. */
export interface EvalContext {
  readonly game: ScoringContext;
  /** The evaluating joker's counters, readable as `self.<name>`. */
  readonly counters: Readonly<Record<string, number>>;
}

/** Error thrown when an expression is malformed or references unknown bindings. */
export class ExpressionError extends JesterError {
  constructor(message: string) {
    super(message, "expression");
    this.name = "ExpressionError";
  }
}

// ─── Environment ───────────────────────────────────────────────────

/** A builtin function callable from expressions. */
export interface BuiltinFunction {
  readonly minArgs: number;
  /** Omitted for variadic functions. */
  readonly maxArgs?: number;
  readonly call: (args: readonly EvalResult[], context: EvalContext) => EvalResult;
}

export type IdentifierResolver = (context: EvalContext) => EvalResult;

/**
 * The names an expression may use. Checked at compile time, so a typo
 * in a joker definition fails construction instead of the first hand.
 */
export interface ExpressionEnvironment {
  readonly functions: ReadonlyMap<string, BuiltinFunction>;
  readonly identifiers: ReadonlyMap<string, IdentifierResolver>;
  /** Counter names reachable through `self.`. */
  readonly counters?: readonly string[];
}

// ─── Tokens ────────────────────────────────────────────────────────

export type TokenKind =
  | "Number"
  | "Boolean"
  | "String"
  | "Identifier"
  | "Operator"
  | "LParen"
  | "RParen"
  | "Comma"
  | "Dot"
  | "EOF";

export interface Token {
  readonly kind: TokenKind;
  readonly value: string;
  readonly position: number;
}

// ─── Tokenizer ─────────────────────────────────────────────────────

const OPERATOR_CHARS = new Set([
  "<",
  ">",
  "=",
  "!",
  "&",
  "|",
  "+",
  "-",
  "*",
  "/",
]);

// Two-character operators that must be matched before single-char ones
const TWO_CHAR_OPERATORS = new Set(["<=", ">=", "==", "!=", "&&", "||"]);

/**
 * Converts an expression string into an array of tokens.
 * Pure function: no side effects.
 */
export function tokenize(expression: string): readonly Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < expression.length) {
    const ch = expression[pos]!;

    // Skip whitespace
    if (ch === " " || ch === "\t" || ch === "\n" || ch === "\r") {
      pos++;
      continue;
    }

    // Numbers (integer or decimal)
    if (isDigit(ch)) {
      const start = pos;
      while (pos < expression.length && isDigit(expression[pos]!)) {
        pos++;
      }
      if (pos < expression.length && expression[pos] === ".") {
        pos++;
        if (pos >= expression.length || !isDigit(expression[pos]!)) {
          throw new ExpressionError(
            `Invalid number at position ${start}: trailing decimal point`
          );
        }
        while (pos < expression.length && isDigit(expression[pos]!)) {
          pos++;
        }
      }
      tokens.push({
        kind: "Number",
        value: expression.slice(start, pos),
        position: start,
      });
      continue;
    }

    // Identifiers and boolean literals
    if (isIdentStart(ch)) {
      const start = pos;
      while (pos < expression.length && isIdentContinue(expression[pos]!)) {
        pos++;
      }
      const word = expression.slice(start, pos);
      if (word === "true" || word === "false") {
        tokens.push({ kind: "Boolean", value: word, position: start });
      } else {
        tokens.push({ kind: "Identifier", value: word, position: start });
      }
      continue;
    }

    // String literals (double or single quoted)
    if (ch === '"' || ch === "'") {
      const quote = ch;
      const start = pos;
      pos++; // skip opening quote
      let str = "";
      while (pos < expression.length && expression[pos] !== quote) {
        if (expression[pos] === "\\") {
          pos++; // skip backslash
          if (pos >= expression.length) {
            throw new ExpressionError(`Unterminated string at position ${start}`);
          }
        }
        str += expression[pos];
        pos++;
      }
      if (pos >= expression.length) {
        throw new ExpressionError(`Unterminated string at position ${start}`);
      }
      pos++; // skip closing quote
      tokens.push({ kind: "String", value: str, position: start });
      continue;
    }

    // Operators (two-char first, then single-char)
    if (OPERATOR_CHARS.has(ch)) {
      const start = pos;
      if (pos + 1 < expression.length) {
        const twoChar = expression.slice(pos, pos + 2);
        if (TWO_CHAR_OPERATORS.has(twoChar)) {
          tokens.push({ kind: "Operator", value: twoChar, position: start });
          pos += 2;
          continue;
        }
      }
      // Single-char operators (but reject lone `=`, `&`, `|`)
      if (ch === "=" || ch === "&" || ch === "|") {
        throw new ExpressionError(
          `Unexpected character '${ch}' at position ${pos}. Did you mean '${ch}${ch}'?`
        );
      }
      tokens.push({ kind: "Operator", value: ch, position: start });
      pos++;
      continue;
    }

    // Punctuation
    if (ch === "(") {
      tokens.push({ kind: "LParen", value: "(", position: pos });
      pos++;
      continue;
    }
    if (ch === ")") {
      tokens.push({ kind: "RParen", value: ")", position: pos });
      pos++;
      continue;
    }
    if (ch === ",") {
      tokens.push({ kind: "Comma", value: ",", position: pos });
      pos++;
      continue;
    }
    if (ch === ".") {
      tokens.push({ kind: "Dot", value: ".", position: pos });
      pos++;
      continue;
    }

    throw new ExpressionError(`Unexpected character '${ch}' at position ${pos}`);
  }

  tokens.push({ kind: "EOF", value: "", position: pos });
  return tokens;
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isIdentStart(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_";
}

function isIdentContinue(ch: string): boolean {
  return isIdentStart(ch) || isDigit(ch);
}

// ─── Parser ────────────────────────────────────────────────────────
// Recursive descent parser. Operator precedence (low → high):
//   ||  →  &&  →  ==, !=  →  <, >, <=, >=  →  +, -  →  *, /  →  unary !, -  →  call, member

const MAX_AST_NODES = 1000;

const OR_OPS: readonly BinaryOperator[] = ["||"];
const AND_OPS: readonly BinaryOperator[] = ["&&"];
const EQUALITY_OPS: readonly BinaryOperator[] = ["==", "!="];
const COMPARISON_OPS: readonly BinaryOperator[] = ["<", ">", "<=", ">="];
const ADDITIVE_OPS: readonly BinaryOperator[] = ["+", "-"];
const MULTIPLICATIVE_OPS: readonly BinaryOperator[] = ["*", "/"];

/**
 * Parses a token stream into an AST.
 * Pure function: no side effects.
 *
 * @throws {ExpressionError} on syntax errors or if the AST exceeds 1000 nodes.
 */
export function parse(tokens: readonly Token[]): ASTNode {
  let pos = 0;
  let nodeCount = 0;

  function countNode(): void {
    nodeCount++;
    if (nodeCount > MAX_AST_NODES) {
      throw new ExpressionError(
        `Expression too complex: AST exceeds ${MAX_AST_NODES} nodes`
      );
    }
  }

  function current(): Token {
    return tokens[pos] ?? { kind: "EOF", value: "", position: -1 };
  }

  function advance(): Token {
    const tok = current();
    pos++;
    return tok;
  }

  function expect(kind: TokenKind): Token {
    const tok = current();
    if (tok.kind !== kind) {
      throw new ExpressionError(
        `Expected ${kind} at position ${tok.position}, got '${tok.value}'`
      );
    }
    return advance();
  }

  /** Consumes the current token if it is one of `ops`. */
  function matchOperator(ops: readonly BinaryOperator[]): BinaryOperator | undefined {
    const tok = current();
    if (tok.kind !== "Operator") return undefined;
    const op = ops.find((candidate) => candidate === tok.value);
    if (op !== undefined) advance();
    return op;
  }

  /** One left-associative precedence level. */
  function parseLevel(ops: readonly BinaryOperator[], next: () => ASTNode): ASTNode {
    let left = next();
    for (let op = matchOperator(ops); op !== undefined; op = matchOperator(ops)) {
      const right = next();
      countNode();
      left = { kind: "BinaryOp", operator: op, left, right };
    }
    return left;
  }

  // ── Precedence levels ──

  function parseExpression(): ASTNode {
    return parseOr();
  }

  function parseOr(): ASTNode {
    return parseLevel(OR_OPS, parseAnd);
  }

  function parseAnd(): ASTNode {
    return parseLevel(AND_OPS, parseEquality);
  }

  function parseEquality(): ASTNode {
    return parseLevel(EQUALITY_OPS, parseComparison);
  }

  function parseComparison(): ASTNode {
    return parseLevel(COMPARISON_OPS, parseAdditive);
  }

  function parseAdditive(): ASTNode {
    return parseLevel(ADDITIVE_OPS, parseMultiplicative);
  }

  function parseMultiplicative(): ASTNode {
    return parseLevel(MULTIPLICATIVE_OPS, parseUnary);
  }

  function parseUnary(): ASTNode {
    const tok = current();
    if (tok.kind === "Operator" && (tok.value === "!" || tok.value === "-")) {
      advance();
      const operand = parseUnary();
      countNode();
      return { kind: "UnaryOp", operator: tok.value, operand };
    }
    return parseCallOrMember();
  }

  function parseCallOrMember(): ASTNode {
    let node = parsePrimary();

    // Member access: node.property
    while (current().kind === "Dot") {
      advance();
      const propTok = expect("Identifier");
      countNode();
      node = { kind: "MemberAccess", object: node, property: propTok.value };
    }

    return node;
  }

  function parsePrimary(): ASTNode {
    const tok = current();

    if (tok.kind === "Number") {
      advance();
      countNode();
      return { kind: "NumberLiteral", value: Number(tok.value) };
    }

    if (tok.kind === "Boolean") {
      advance();
      countNode();
      return { kind: "BooleanLiteral", value: tok.value === "true" };
    }

    if (tok.kind === "String") {
      advance();
      countNode();
      return { kind: "StringLiteral", value: tok.value };
    }

    // Identifier: might be followed by `(` for function call, or `.` for member
    if (tok.kind === "Identifier") {
      advance();

      if (current().kind === "LParen") {
        advance(); // consume `(`
        const args: ASTNode[] = [];

        if (current().kind !== "RParen") {
          args.push(parseExpression());
          while (current().kind === "Comma") {
            advance(); // consume `,`
            args.push(parseExpression());
          }
        }

        expect("RParen");
        countNode();
        return { kind: "FunctionCall", callee: tok.value, args };
      }

      countNode();
      return { kind: "Identifier", name: tok.value };
    }

    // Parenthesized expression
    if (tok.kind === "LParen") {
      advance();
      const inner = parseExpression();
      expect("RParen");
      return inner;
    }

    throw new ExpressionError(
      `Unexpected token '${tok.value}' at position ${tok.position}`
    );
  }

  const ast = parseExpression();

  // Ensure we consumed all tokens
  if (current().kind !== "EOF") {
    const tok = current();
    throw new ExpressionError(
      `Unexpected token '${tok.value}' at position ${tok.position} (expected end of expression)`
    );
  }

  return ast;
}

// ─── Name Checking ─────────────────────────────────────────────────

/**
 * Walks the AST and rejects unknown identifiers, unknown functions,
 * wrong argument counts and member access on anything but `self`.
 */
function checkNames(node: ASTNode, env: ExpressionEnvironment): void {
  switch (node.kind) {
    case "NumberLiteral":
    case "BooleanLiteral":
    case "StringLiteral":
      return;

    case "Identifier":
      if (!env.identifiers.has(node.name)) {
        throw new ExpressionError(`Unknown identifier: '${node.name}'`);
      }
      return;

    case "MemberAccess": {
      if (node.object.kind !== "Identifier" || node.object.name !== "self") {
        throw new ExpressionError(
          `Property access is only allowed on 'self' (got '.${node.property}')`
        );
      }
      if (!(env.counters ?? []).includes(node.property)) {
        throw new ExpressionError(`Unknown counter: 'self.${node.property}'`);
      }
      return;
    }

    case "FunctionCall": {
      if (node.callee === "if") {
        if (node.args.length < 2 || node.args.length > 3) {
          throw new ExpressionError(
            "if() requires 2-3 arguments: condition, then_expr[, else_expr]"
          );
        }
      } else {
        const fn = env.functions.get(node.callee);
        if (!fn) {
          throw new ExpressionError(`Unknown function: '${node.callee}'`);
        }
        const tooMany = fn.maxArgs !== undefined && node.args.length > fn.maxArgs;
        if (node.args.length < fn.minArgs || tooMany) {
          const expected =
            fn.maxArgs === fn.minArgs
              ? `exactly ${fn.minArgs}`
              : fn.maxArgs === undefined
                ? `at least ${fn.minArgs}`
                : `${fn.minArgs}-${fn.maxArgs}`;
          throw new ExpressionError(
            `${node.callee}() requires ${expected} argument(s), got ${node.args.length}`
          );
        }
      }
      for (const arg of node.args) checkNames(arg, env);
      return;
    }

    case "BinaryOp":
      checkNames(node.left, env);
      checkNames(node.right, env);
      return;

    case "UnaryOp":
      checkNames(node.operand, env);
      return;
  }
}

// ─── Evaluator ─────────────────────────────────────────────────────

const MAX_EVAL_DEPTH = 64;

/**
 * Evaluates an AST node against a context.
 * Depth-guarded to prevent stack overflow.
 */
function evaluateNode(
  node: ASTNode,
  context: EvalContext,
  env: ExpressionEnvironment,
  depth: number
): EvalResult {
  if (depth > MAX_EVAL_DEPTH) {
    throw new ExpressionError(`Maximum evaluation depth (${MAX_EVAL_DEPTH}) exceeded`);
  }

  switch (node.kind) {
    case "NumberLiteral":
      return { kind: "number", value: node.value };

    case "BooleanLiteral":
      return { kind: "boolean", value: node.value };

    case "StringLiteral":
      return { kind: "string", value: node.value };

    case "Identifier": {
      const resolve = env.identifiers.get(node.name);
      if (!resolve) {
        throw new ExpressionError(`Unknown identifier: '${node.name}'`);
      }
      return resolve(context);
    }

    case "MemberAccess": {
      const value = context.counters[node.property];
      if (value === undefined) {
        throw new ExpressionError(`Unknown counter: 'self.${node.property}'`);
      }
      return { kind: "number", value };
    }

    case "FunctionCall":
      return evaluateFunctionCall(node, context, env, depth);

    case "BinaryOp":
      return evaluateBinaryOp(node, context, env, depth);

    case "UnaryOp":
      return evaluateUnaryOp(node, context, env, depth);
  }
}

function evaluateFunctionCall(
  node: FunctionCall,
  context: EvalContext,
  env: ExpressionEnvironment,
  depth: number
): EvalResult {
  // ── Special form: if(condition, then_expr[, else_expr]) ──
  // Only the chosen branch is evaluated, so a chance() in the other
  // branch does not consume a random draw.
  if (node.callee === "if") {
    const condResult = evaluateNode(node.args[0]!, context, env, depth + 1);
    if (condResult.kind !== "boolean") {
      throw new ExpressionError(`if() condition must be boolean, got ${condResult.kind}`);
    }
    if (condResult.value) {
      return evaluateNode(node.args[1]!, context, env, depth + 1);
    }
    if (node.args.length === 3) {
      return evaluateNode(node.args[2]!, context, env, depth + 1);
    }
    return { kind: "number", value: 0 };
  }

  const fn = env.functions.get(node.callee);
  if (!fn) {
    throw new ExpressionError(`Unknown function: '${node.callee}'`);
  }

  const evaluatedArgs = node.args.map((arg) =>
    evaluateNode(arg, context, env, depth + 1)
  );
  return fn.call(evaluatedArgs, context);
}

function evaluateBinaryOp(
  node: BinaryOp,
  context: EvalContext,
  env: ExpressionEnvironment,
  depth: number
): EvalResult {
  // Short-circuit evaluation for logical operators
  if (node.operator === "&&" || node.operator === "||") {
    const left = evaluateNode(node.left, context, env, depth + 1);
    if (left.kind !== "boolean") {
      throw new ExpressionError(
        `Left operand of '${node.operator}' must be boolean, got ${left.kind}`
      );
    }
    if (node.operator === "&&" && !left.value) return { kind: "boolean", value: false };
    if (node.operator === "||" && left.value) return { kind: "boolean", value: true };
    const right = evaluateNode(node.right, context, env, depth + 1);
    if (right.kind !== "boolean") {
      throw new ExpressionError(
        `Right operand of '${node.operator}' must be boolean, got ${right.kind}`
      );
    }
    return { kind: "boolean", value: right.value };
  }

  const left = evaluateNode(node.left, context, env, depth + 1);
  const right = evaluateNode(node.right, context, env, depth + 1);

  switch (node.operator) {
    case "==":
      return { kind: "boolean", value: left.value === right.value };
    case "!=":
      return { kind: "boolean", value: left.value !== right.value };

    case "<":
    case ">":
    case "<=":
    case ">=":
      return evaluateComparison(node.operator, left, right);

    case "+":
    case "-":
    case "*":
    case "/":
      return evaluateArithmetic(node.operator, left, right);
  }
}

function evaluateComparison(
  op: "<" | ">" | "<=" | ">=",
  left: EvalResult,
  right: EvalResult
): EvalResult {
  if (left.kind !== "number" || right.kind !== "number") {
    throw new ExpressionError(
      `Comparison '${op}' requires numeric operands, got ${left.kind} and ${right.kind}`
    );
  }
  switch (op) {
    case "<":
      return { kind: "boolean", value: left.value < right.value };
    case ">":
      return { kind: "boolean", value: left.value > right.value };
    case "<=":
      return { kind: "boolean", value: left.value <= right.value };
    case ">=":
      return { kind: "boolean", value: left.value >= right.value };
  }
}

function evaluateArithmetic(
  op: "+" | "-" | "*" | "/",
  left: EvalResult,
  right: EvalResult
): EvalResult {
  if (left.kind !== "number" || right.kind !== "number") {
    throw new ExpressionError(
      `Arithmetic '${op}' requires numeric operands, got ${left.kind} and ${right.kind}`
    );
  }
  if (op === "/" && right.value === 0) {
    throw new ExpressionError("Division by zero");
  }
  switch (op) {
    case "+":
      return { kind: "number", value: left.value + right.value };
    case "-":
      return { kind: "number", value: left.value - right.value };
    case "*":
      return { kind: "number", value: left.value * right.value };
    case "/":
      return { kind: "number", value: left.value / right.value };
  }
}

function evaluateUnaryOp(
  node: UnaryOp,
  context: EvalContext,
  env: ExpressionEnvironment,
  depth: number
): EvalResult {
  const operand = evaluateNode(node.operand, context, env, depth + 1);

  switch (node.operator) {
    case "!":
      if (operand.kind !== "boolean") {
        throw new ExpressionError(`Unary '!' requires boolean operand, got ${operand.kind}`);
      }
      return { kind: "boolean", value: !operand.value };

    case "-":
      if (operand.kind !== "number") {
        throw new ExpressionError(`Unary '-' requires numeric operand, got ${operand.kind}`);
      }
      return { kind: "number", value: -operand.value };
  }
}

// ─── Public API ────────────────────────────────────────────────────

/** An expression parsed and name-checked once, evaluated many times. */
export interface CompiledExpression {
  readonly source: string;
  readonly ast: ASTNode;
  evaluate(context: EvalContext): EvalResult;
}

/**
 * Parses and name-checks an expression against an environment.
 *
 * @throws {ExpressionError} if the expression is invalid or uses unknown names.
 */
export function compileExpression(
  source: string,
  env: ExpressionEnvironment
): CompiledExpression {
  if (source.trim().length === 0) {
    throw new ExpressionError("Empty expression");
  }
  const ast = parse(tokenize(source));
  checkNames(ast, env);
  return {
    source,
    ast,
    evaluate: (context) => evaluateNode(ast, context, env, 0),
  };
}

/** Evaluates a compiled expression and requires a boolean result. */
export function evaluateCondition(
  compiled: CompiledExpression,
  context: EvalContext
): boolean {
  const result = compiled.evaluate(context);
  if (result.kind !== "boolean") {
    throw new ExpressionError(
      `Expected boolean expression, got ${result.kind}: "${compiled.source}"`
    );
  }
  return result.value;
}

/** Evaluates a compiled expression and requires a numeric result. */
export function evaluateNumber(
  compiled: CompiledExpression,
  context: EvalContext
): number {
  const result = compiled.evaluate(context);
  if (result.kind !== "number") {
    throw new ExpressionError(
      `Expected numeric expression, got ${result.kind}: "${compiled.source}"`
    );
  }
  return result.value;
}

/** The card list a zone name refers to. */
export type ZoneName = "played" | "scoring" | "held" | "deck" | "full_deck";

export function zoneCards(game: ScoringContext, zone: string): readonly PlayingCard[] {
  switch (zone) {
    case "played":
      return game.hand.played;
    case "scoring":
      return game.hand.scoring;
    case "held":
      return game.hand.held;
    case "deck":
      return game.snapshot.deck;
    case "full_deck":
      return game.snapshot.fullDeck;
    default:
      throw new ExpressionError(
        `Unknown zone: '${zone}' (expected played, scoring, held, deck or full_deck)`
      );
  }
}
