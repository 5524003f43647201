import { ToolName } from '../../core/entities/Tool.js';
import { ToolInputError } from '../../core/errors.js';
import { ChatTool, ToolRunResult } from './types.js';

type Operator = '+' | '-' | '*' | '/' | '%' | '^';

type Token =
  | { type: 'number'; value: number }
  | { type: 'operator'; value: Operator }
  | { type: 'paren'; value: '(' | ')' };

// Runs of digits, operators and parentheses that start and end on an operand
const EXPRESSION_PATTERN = /-?[\d(.][\d\s.+\-*/%^()]*[\d)]/g;
const HAS_BINARY_OPERATOR = /[\d)]\s*(?:\*\*|[+\-*/%^])\s*[-\d(.]/;
// Dates (2024-01-15, 01/15/2024), phone numbers (555-123-4567) and versions (1.2.3)
const NON_ARITHMETIC = [/\d-\d+-\d/, /\d\/\d{1,2}\/\d/, /\d\.\d+\.\d/];

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < expression.length) {
    const char = expression[i];

    if (char === ' ' || char === '\t' || char === '\n') {
      i++;
      continue;
    }

    const number = /^(?:\d+(?:\.\d+)?|\.\d+)/.exec(expression.slice(i));
    if (number) {
      tokens.push({ type: 'number', value: Number(number[0]) });
      i += number[0].length;
      continue;
    }

    if (char === '*' && expression[i + 1] === '*') {
      tokens.push({ type: 'operator', value: '^' });
      i += 2;
      continue;
    }

    switch (char) {
      case '+':
      case '-':
      case '*':
      case '/':
      case '%':
      case '^':
        tokens.push({ type: 'operator', value: char });
        break;
      case '(':
      case ')':
        tokens.push({ type: 'paren', value: char });
        break;
      default:
        throw new ToolInputError(`Unexpected character "${char}" in expression`);
    }
    i++;
  }

  return tokens;
}

/**
 * Recursive-descent evaluator.
 *
 *   expr    := term (('+' | '-') term)*
 *   term    := unary (('*' | '/' | '%') unary)*
 *   unary   := ('+' | '-') unary | power
 *   power   := primary ('^' unary)?
 *   primary := number | '(' expr ')'
 *
 * `^` and `**` are right-associative and bind tighter than unary minus (-2^2 = -4).
 */
class Parser {
  private position = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): number {
    if (this.tokens.length === 0) {
      throw new ToolInputError('Empty expression');
    }
    const value = this.expression();
    if (this.position < this.tokens.length) {
      throw new ToolInputError('Unexpected input after expression');
    }
    return value;
  }

  private peek(): Token | undefined {
    return this.tokens[this.position];
  }

  private acceptOperator(...operators: Operator[]): Operator | null {
    const token = this.peek();
    if (token && token.type === 'operator' && operators.includes(token.value)) {
      this.position++;
      return token.value;
    }
    return null;
  }

  private expression(): number {
    let value = this.term();
    for (let op = this.acceptOperator('+', '-'); op; op = this.acceptOperator('+', '-')) {
      const right = this.term();
      value = op === '+' ? value + right : value - right;
    }
    return value;
  }

  private term(): number {
    let value = this.unary();
    for (let op = this.acceptOperator('*', '/', '%'); op; op = this.acceptOperator('*', '/', '%')) {
      const right = this.unary();
      if ((op === '/' || op === '%') && right === 0) {
        throw new ToolInputError('Cannot divide by zero');
      }
      value = op === '*' ? value * right : op === '/' ? value / right : value % right;
    }
    return value;
  }

  private unary(): number {
    const op = this.acceptOperator('+', '-');
    if (op) {
      const operand = this.unary();
      return op === '-' ? -operand : operand;
    }
    return this.power();
  }

  private power(): number {
    const base = this.primary();
    if (this.acceptOperator('^')) {
      return base ** this.unary();
    }
    return base;
  }

  private primary(): number {
    const token = this.peek();
    if (!token) {
      throw new ToolInputError('Expression ended unexpectedly');
    }
    this.position++;

    if (token.type === 'number') {
      return token.value;
    }
    if (token.type === 'paren' && token.value === '(') {
      const value = this.expression();
      const closing = this.peek();
      if (!closing || closing.type !== 'paren' || closing.value !== ')') {
        throw new ToolInputError('Missing closing parenthesis');
      }
      this.position++;
      return value;
    }
    throw new ToolInputError(`Unexpected "${token.value}" in expression`);
  }
}

/**
 * Evaluate an arithmetic expression. Throws ToolInputError for malformed
 * input, division by zero and non-finite results.
 */
export function evaluateExpression(expression: string): number {
  const value = new Parser(tokenize(expression)).parse();
  if (!Number.isFinite(value)) {
    throw new ToolInputError('Result is not a finite number');
  }
  return value;
}

/**
 * Render without floating point noise (0.1 + 0.2 → 0.3)
 */
export function formatNumber(value: number): string {
  if (Number.isInteger(value)) {
    return String(value);
  }
  return String(Number(value.toPrecision(12)));
}

/**
 * Longest arithmetic expression in a message, or null
 */
export function extractExpression(message: string): string | null {
  let best: string | null = null;
  for (const match of message.matchAll(EXPRESSION_PATTERN)) {
    const candidate = match[0].trim();
    if (NON_ARITHMETIC.some((pattern) => pattern.test(candidate))) {
      continue;
    }
    if (HAS_BINARY_OPERATOR.test(candidate) && (best === null || candidate.length > best.length)) {
      best = candidate;
    }
  }
  return best;
}

export class CalculatorTool implements ChatTool {
  readonly name: ToolName = 'calculator';

  applies(message: string, enabled: ReadonlySet<ToolName>): boolean {
    return enabled.has(this.name) && extractExpression(message) !== null;
  }

  async run(message: string): Promise<ToolRunResult> {
    const expression = extractExpression(message);
    if (!expression) {
      return { ok: false, error: new ToolInputError('No arithmetic expression found') };
    }

    try {
      const result = formatNumber(evaluateExpression(expression));
      return {
        ok: true,
        fragment: { tool: this.name, text: `Calculator result: ${expression} = ${result}` },
      };
    } catch (error) {
      if (error instanceof ToolInputError) {
        return { ok: false, error };
      }
      throw error;
    }
  }
}
