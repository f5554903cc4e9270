import { createLogger } from '../logger.js';
import type { ToolSpec } from './types.js';

const log = createLogger('Calculator');

export const ALLOWED_CHARACTERS = '0123456789+-*/().,';

class DivisionByZeroError extends Error {
  constructor() {
    super('Division by zero');
    this.name = 'DivisionByZeroError';
  }
}

class EvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EvaluationError';
  }
}

/**
 * Recursive-descent evaluator for + - * / // ** and parentheses.
 *
 *   expr    := term (('+' | '-') term)*
 *   term    := unary (('*' | '/' | '//') unary)*
 *   unary   := ('+' | '-') unary | power
 *   power   := primary ('**' unary)?
 *   primary := number | '(' expr ')'
 */
class ExpressionParser {
  private pos = 0;

  constructor(private readonly input: string) {}

  parse(): number {
    const value = this.expr();
    if (this.pos < this.input.length) {
      throw new EvaluationError(`Unexpected '${this.input[this.pos]}' at ${this.pos}`);
    }
    return value;
  }

  private peek(token: string): boolean {
    return this.input.startsWith(token, this.pos);
  }

  private expr(): number {
    let value = this.term();
    while (this.peek('+') || this.peek('-')) {
      const op = this.input[this.pos++];
      const right = this.term();
      value = op === '+' ? value + right : value - right;
    }
    return value;
  }

  private term(): number {
    let value = this.unary();
    for (;;) {
      if (this.peek('**')) break;
      if (this.peek('//')) {
        this.pos += 2;
        const right = this.unary();
        if (right === 0) throw new DivisionByZeroError();
        value = Math.floor(value / right);
      } else if (this.peek('*')) {
        this.pos++;
        value *= this.unary();
      } else if (this.peek('/')) {
        this.pos++;
        const right = this.unary();
        if (right === 0) throw new DivisionByZeroError();
        value /= right;
      } else {
        break;
      }
    }
    return value;
  }

  private unary(): number {
    if (this.peek('-')) {
      this.pos++;
      return -this.unary();
    }
    if (this.peek('+')) {
      this.pos++;
      return this.unary();
    }
    return this.power();
  }

  private power(): number {
    const base = this.primary();
    if (this.peek('**')) {
      this.pos += 2;
      const exponent = this.unary();
      if (base === 0 && exponent < 0) throw new DivisionByZeroError();
      return base ** exponent;
    }
    return base;
  }

  private primary(): number {
    if (this.peek('(')) {
      this.pos++;
      const value = this.expr();
      if (!this.peek(')')) {
        throw new EvaluationError('Missing closing parenthesis');
      }
      this.pos++;
      return value;
    }

    const match = /^(\d+\.?\d*|\.\d+)/.exec(this.input.slice(this.pos));
    if (!match) {
      throw new EvaluationError(`Expected a number at ${this.pos}`);
    }
    this.pos += match[0].length;
    return Number(match[0]);
  }
}

export function evaluateExpression(expression: string): number {
  // Commas are accepted as thousands separators
  const compact = expression.replace(/[\s,]+/g, '');
  if (compact.length === 0) {
    throw new EvaluationError('Empty expression');
  }
  const value = new ExpressionParser(compact).parse();
  if (!Number.isFinite(value)) {
    throw new EvaluationError('Result is out of range');
  }
  return value;
}

export function calculate(expression: string): string {
  const trimmed = expression.trim();

  if (![...trimmed].every((c) => ALLOWED_CHARACTERS.includes(c) || /\s/.test(c))) {
    log.warn({ action: 'calculator.rejected', expression: trimmed }, 'Invalid characters in expression');
    return 'Error: Expression contains invalid characters. Only numbers and basic operators (+, -, *, /, parentheses) are allowed.';
  }

  try {
    const result = evaluateExpression(trimmed);
    log.info({ action: 'calculator.evaluated', expression: trimmed, result }, 'Calculator result');
    return `${trimmed} = ${result}`;
  } catch (error) {
    if (error instanceof DivisionByZeroError) {
      log.warn({ action: 'calculator.division_by_zero', expression: trimmed }, 'Division by zero in expression');
      return 'Error: Division by zero is not allowed.';
    }
    if (error instanceof EvaluationError) {
      log.warn({ action: 'calculator.syntax_error', expression: trimmed, error: error.message }, 'Could not evaluate expression');
      return `Error: Could not evaluate the expression '${trimmed}'. Please check your syntax.`;
    }
    throw error;
  }
}

export const calculatorTool: ToolSpec = {
  name: 'calculator',
  description:
    "Evaluates a basic arithmetic expression (e.g. '2+2', '10*5', '(100-4)/4'). Use this when the user asks for a calculation.",
  parameterName: 'expression',
  handler: calculate,
};
