/**
 * Boolean guards over named variables.
 *
 *   $code NOT_NULL && $display NULL
 *   $refconditionId EQUALS_STRING $refDG13
 *   $class IN [E, I, 'O']
 *   $a NOT_NULL || $b NOT_NULL          (`||` binds looser than `&&`)
 *
 * Guards are compiled once and cached. Evaluation short-circuits left to right
 * and never throws: an unbound variable is null, so `NOT_NULL` is false,
 * `NULL` is true and every comparison fails.
 */

import { SpecificationError } from "./errors";
import { isEmptyValue, toText, type BoundValue } from "./values";

export type Operand = { kind: "variable"; name: string } | { kind: "literal"; value: string };

export type Condition =
  | { kind: "null"; variable: string; negated: boolean }
  | { kind: "equals"; variable: string; operand: Operand; negated: boolean }
  | { kind: "in"; variable: string; values: string[] }
  | { kind: "and"; terms: Condition[] }
  | { kind: "or"; terms: Condition[] };

export type VariableLookup = (name: string) => BoundValue | null;

type Token =
  | { kind: "variable"; text: string }
  | { kind: "word"; text: string }
  | { kind: "string"; text: string }
  | { kind: "punct"; text: "[" | "]" | "," | "&&" | "||" };

const compiled = new Map<string, Condition>();

export function parseCondition(source: string): Condition {
  const cached = compiled.get(source);
  if (cached) return cached;

  const parser = new ConditionParser(source, tokenize(source));
  const condition = parser.parse();
  compiled.set(source, condition);
  return condition;
}

export function evaluateCondition(condition: Condition, lookup: VariableLookup): boolean {
  switch (condition.kind) {
    case "null": {
      const empty = isEmptyValue(lookup(condition.variable));
      return condition.negated ? !empty : empty;
    }
    case "equals": {
      const left = toText(lookup(condition.variable));
      const right =
        condition.operand.kind === "literal" ? condition.operand.value : toText(lookup(condition.operand.name));
      if (left === null || right === null) return false;
      return condition.negated ? left !== right : left === right;
    }
    case "in": {
      const value = toText(lookup(condition.variable));
      return value !== null && condition.values.includes(value);
    }
    case "and":
      return condition.terms.every((term) => evaluateCondition(term, lookup));
    case "or":
      return condition.terms.some((term) => evaluateCondition(term, lookup));
  }
}

/** Every variable name a guard reads. */
export function conditionVariables(condition: Condition): Set<string> {
  const names = new Set<string>();
  const visit = (node: Condition): void => {
    switch (node.kind) {
      case "and":
      case "or":
        node.terms.forEach(visit);
        return;
      case "equals":
        names.add(node.variable);
        if (node.operand.kind === "variable") names.add(node.operand.name);
        return;
      case "null":
      case "in":
        names.add(node.variable);
        return;
    }
  };
  visit(condition);
  return names;
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const char = source.charAt(i);

    if (/\s/.test(char)) {
      i++;
    } else if (source.startsWith("&&", i) || source.startsWith("||", i)) {
      tokens.push({ kind: "punct", text: source.startsWith("&&", i) ? "&&" : "||" });
      i += 2;
    } else if (char === "[" || char === "]" || char === ",") {
      tokens.push({ kind: "punct", text: char });
      i++;
    } else if (char === "'" || char === '"') {
      const end = source.indexOf(char, i + 1);
      if (end < 0) {
        throw new SpecificationError(`Malformed condition "${source}": unterminated string`);
      }
      tokens.push({ kind: "string", text: source.slice(i + 1, end) });
      i = end + 1;
    } else {
      const match = /^[^\s[\],&|'"]+/.exec(source.slice(i));
      const text = match?.[0] ?? char;
      tokens.push(text.startsWith("$") ? { kind: "variable", text: text.slice(1) } : { kind: "word", text });
      i += text.length;
    }
  }

  return tokens;
}

class ConditionParser {
  private position = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: Token[],
  ) {}

  parse(): Condition {
    if (this.tokens.length === 0) throw this.error("empty condition");
    const condition = this.parseOr();
    if (this.position < this.tokens.length) throw this.error("unexpected trailing input");
    return condition;
  }

  private parseOr(): Condition {
    const terms = [this.parseAnd()];
    while (this.acceptPunct("||")) {
      terms.push(this.parseAnd());
    }
    return terms.length === 1 && terms[0] ? terms[0] : { kind: "or", terms };
  }

  private parseAnd(): Condition {
    const terms = [this.parseTerm()];
    while (this.acceptPunct("&&")) {
      terms.push(this.parseTerm());
    }
    return terms.length === 1 && terms[0] ? terms[0] : { kind: "and", terms };
  }

  private parseTerm(): Condition {
    const subject = this.next();
    if (subject?.kind !== "variable" || subject.text.length === 0) {
      throw this.error("expected a $variable");
    }
    const variable = subject.text;

    const operator = this.next();
    if (operator?.kind !== "word") throw this.error(`expected an operator after $${variable}`);

    switch (operator.text) {
      case "NULL":
        return { kind: "null", variable, negated: false };
      case "NOT_NULL":
        return { kind: "null", variable, negated: true };
      case "EQUALS_STRING":
        return { kind: "equals", variable, operand: this.parseOperand(), negated: false };
      case "NOT_EQUALS_STRING":
        return { kind: "equals", variable, operand: this.parseOperand(), negated: true };
      case "IN":
        return { kind: "in", variable, values: this.parseList() };
      default:
        throw this.error(`unknown operator ${operator.text}`);
    }
  }

  private parseOperand(): Operand {
    const token = this.next();
    if (token === undefined || token.kind === "punct") throw this.error("expected a value to compare with");
    return token.kind === "variable" ? { kind: "variable", name: token.text } : { kind: "literal", value: token.text };
  }

  private parseList(): string[] {
    if (!this.acceptPunct("[")) throw this.error("expected [ after IN");
    const values: string[] = [];

    while (!this.acceptPunct("]")) {
      const token = this.next();
      if (token?.kind !== "word" && token?.kind !== "string") throw this.error("expected a literal in IN list");
      values.push(token.text);
      if (!this.acceptPunct(",") && this.peek()?.text !== "]") throw this.error("expected , or ] in IN list");
    }
    return values;
  }

  private next(): Token | undefined {
    const token = this.tokens[this.position];
    this.position++;
    return token;
  }

  private peek(): Token | undefined {
    return this.tokens[this.position];
  }

  private acceptPunct(text: string): boolean {
    const token = this.peek();
    if (token?.kind === "punct" && token.text === text) {
      this.position++;
      return true;
    }
    return false;
  }

  private error(reason: string): SpecificationError {
    return new SpecificationError(`Malformed condition "${this.source}": ${reason}`);
  }
}
