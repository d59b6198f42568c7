import jsep from 'jsep';
import type { MatrixValue } from '../parser/schema.ts';
import { EvalError } from '../runner/errors.ts';
import { LIMITS } from '../utils/constants.ts';
import { type StatusFlags, callFunction, isStatusFunction } from './functions.ts';
import {
  type ExpressionObject,
  type ExpressionValue,
  compareValues,
  isExpressionObject,
  isTruthy,
  looseEquals,
  stringify,
} from './values.ts';

/**
 * Expression evaluator for ${{ }} syntax
 * Supports:
 * - env.NAME, matrix.NAME, secrets.NAME, vars.NAME, github.NAME
 * - steps.<id>.outputs.<name>, steps.<id>.outcome, steps.<id>.conclusion
 * - needs.<job>.result, needs.<job>.outputs.<name> (also job.<id> / jobs.<id>)
 * - Literals, dotted and bracket access, ! && || == != < <= > >=, parentheses
 * - Built-in functions (see functions.ts)
 *
 * Evaluation is read-only: the context is never modified.
 */

export interface StepContextView {
  outputs: Record<string, string>;
  outcome: string;
  conclusion: string;
}

export interface JobContextView {
  result: string;
  outputs: Record<string, string>;
  /** False while any instance of the job is pending or running */
  finished: boolean;
}

export interface ExpressionContext {
  env?: Record<string, string>;
  matrix?: Record<string, MatrixValue>;
  secrets?: Record<string, string>;
  vars?: Record<string, string>;
  github?: Record<string, string>;
  steps?: Record<string, StepContextView>;
  needs?: Record<string, JobContextView>;
  jobs?: Record<string, JobContextView>;
  status?: StatusFlags;
}

type ASTNode = jsep.Expression;

const DEFAULT_STATUS: StatusFlags = { success: true, failure: false, cancelled: false };

const JOB_NAMESPACES = new Set(['needs', 'jobs', 'job']);

// Matches `.name-with-hyphens` so it can be rewritten as bracket access
const HYPHENATED_MEMBER = /\.([A-Za-z_][A-Za-z0-9_]*(?:-[A-Za-z0-9_-]*)+)/g;

function isLiteral(node: ASTNode): node is jsep.Literal {
  return node.type === 'Literal';
}

function isIdentifier(node: ASTNode): node is jsep.Identifier {
  return node.type === 'Identifier';
}

function isMember(node: ASTNode): node is jsep.MemberExpression {
  return node.type === 'MemberExpression';
}

function isBinary(node: ASTNode): node is jsep.BinaryExpression {
  return node.type === 'BinaryExpression';
}

function isUnary(node: ASTNode): node is jsep.UnaryExpression {
  return node.type === 'UnaryExpression';
}

function isCall(node: ASTNode): node is jsep.CallExpression {
  return node.type === 'CallExpression';
}

function getMember(object: ExpressionValue, key: ExpressionValue): ExpressionValue {
  if (Array.isArray(object)) {
    const index = typeof key === 'number' ? key : Number(stringify(key));
    if (!Number.isInteger(index) || index < 0 || index >= object.length) return '';
    return object[index];
  }
  if (!isExpressionObject(object)) return '';

  const name = stringify(key);
  if (Object.hasOwn(object, name)) return object[name];
  // Context keys are case-insensitive
  const lower = name.toLowerCase();
  for (const [candidate, value] of Object.entries(object)) {
    if (candidate.toLowerCase() === lower) return value;
  }
  return '';
}

function lookupView<T>(views: Record<string, T> | undefined, key: string): T | undefined {
  if (!views) return undefined;
  if (Object.hasOwn(views, key)) return views[key];
  const lower = key.toLowerCase();
  for (const [candidate, view] of Object.entries(views)) {
    if (candidate.toLowerCase() === lower) return view;
  }
  return undefined;
}

export interface ExpressionSpan {
  start: number;
  end: number;
  expr: string;
}

export class ExpressionEvaluator {
  /**
   * Helper to scan string for matches of ${{ ... }}, skipping braces inside string literals
   * @throws EvalError on an unclosed expression
   */
  static *scanExpressions(template: string): Generator<ExpressionSpan> {
    let i = 0;
    while (i < template.length) {
      if (!template.startsWith('${{', i)) {
        i++;
        continue;
      }

      let j = i + 3;
      let quote: string | null = null;
      let closed = false;
      while (j < template.length) {
        const char = template[j];
        if (quote) {
          if (char === quote) quote = null;
        } else if (char === "'" || char === '"') {
          quote = char;
        } else if (template.startsWith('}}', j)) {
          yield { start: i, end: j + 2, expr: template.substring(i + 3, j).trim() };
          i = j + 2;
          closed = true;
          break;
        }
        j++;
      }

      if (!closed) {
        throw new EvalError(`Unclosed expression starting at index ${i}`, template);
      }
    }
  }

  /**
   * Check if a string contains any expressions
   */
  static hasExpression(str: string): boolean {
    return str.includes('${{');
  }

  /**
   * Rewrite an expression into the dialect jsep parses: single-quoted strings (with ''
   * as the escaped quote) become double-quoted, and hyphenated member names become
   * bracket access.
   */
  static normalize(expr: string): string {
    let result = '';
    let code = '';
    let i = 0;

    const flushCode = () => {
      result += code.replace(HYPHENATED_MEMBER, (_match, name: string) => `["${name}"]`);
      code = '';
    };

    while (i < expr.length) {
      const char = expr[i];
      if (char === "'") {
        flushCode();
        let value = '';
        let j = i + 1;
        let closed = false;
        while (j < expr.length) {
          if (expr[j] === "'") {
            if (expr[j + 1] === "'") {
              value += "'";
              j += 2;
              continue;
            }
            closed = true;
            break;
          }
          value += expr[j];
          j++;
        }
        if (!closed) throw new EvalError('Unterminated string literal', expr);
        result += JSON.stringify(value);
        i = j + 1;
        continue;
      }
      if (char === '"') {
        flushCode();
        let j = i + 1;
        while (j < expr.length && expr[j] !== '"') {
          j += expr[j] === '\\' ? 2 : 1;
        }
        if (j >= expr.length) throw new EvalError('Unterminated string literal', expr);
        result += expr.substring(i, j + 1);
        i = j + 1;
        continue;
      }
      code += char;
      i++;
    }
    flushCode();
    return result;
  }

  /**
   * Parse an expression (without the ${{ }} wrapper)
   * @throws EvalError on syntax errors
   */
  static parse(expr: string): ASTNode {
    if (expr.trim().length === 0) {
      throw new EvalError('Empty expression', expr);
    }
    try {
      return jsep(ExpressionEvaluator.normalize(expr));
    } catch (error) {
      if (error instanceof EvalError) throw error;
      throw new EvalError(
        `Invalid expression: ${error instanceof Error ? error.message : String(error)}`,
        expr
      );
    }
  }

  /**
   * Evaluate a single expression (without the ${{ }} wrapper)
   */
  static evaluate(expr: string, context: ExpressionContext): ExpressionValue {
    const ast = ExpressionEvaluator.parse(expr);
    try {
      return ExpressionEvaluator.evaluateNode(ast, context, 0);
    } catch (error) {
      if (error instanceof EvalError && error.expression === undefined) {
        throw new EvalError(error.message, expr);
      }
      throw error;
    }
  }

  /**
   * Substitute every ${{ }} span in a template and keep the surrounding text
   */
  static evaluateTemplate(template: string, context: ExpressionContext): string {
    if (!ExpressionEvaluator.hasExpression(template)) return template;
    if (template.length > LIMITS.MAX_TEMPLATE_LENGTH) {
      throw new EvalError(
        `Template with expressions exceeds maximum length of ${LIMITS.MAX_TEMPLATE_LENGTH} characters`
      );
    }

    let resultStr = '';
    let lastIndex = 0;
    for (const match of ExpressionEvaluator.scanExpressions(template)) {
      resultStr += template.substring(lastIndex, match.start);
      resultStr += stringify(ExpressionEvaluator.evaluate(match.expr, context));
      lastIndex = match.end;
    }
    resultStr += template.substring(lastIndex);
    return resultStr;
  }

  /**
   * Evaluate every value of a mapping as a template
   */
  static evaluateRecord(
    record: Record<string, string> | undefined,
    context: ExpressionContext
  ): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(record ?? {})) {
      result[key] = ExpressionEvaluator.evaluateTemplate(value, context);
    }
    return result;
  }

  /**
   * Strip a single ${{ }} wrapper if the whole condition is one expression
   */
  static unwrap(condition: string): string {
    const trimmed = condition.trim();
    if (!trimmed.startsWith('${{')) return trimmed;
    const spans = Array.from(ExpressionEvaluator.scanExpressions(trimmed));
    if (spans.length === 1 && spans[0].start === 0 && spans[0].end === trimmed.length) {
      return spans[0].expr;
    }
    return trimmed;
  }

  /**
   * Evaluate an `if:` condition. A missing condition means `success()`, and a condition
   * that calls no status function is treated as `success() && (<condition>)`.
   */
  static evaluateCondition(condition: string | undefined, context: ExpressionContext): boolean {
    const expr = condition === undefined ? '' : ExpressionEvaluator.unwrap(condition);
    if (expr.length === 0) {
      return (context.status ?? DEFAULT_STATUS).success;
    }
    const ast = ExpressionEvaluator.parse(expr);
    if (!ExpressionEvaluator.usesStatusFunction(ast) && !(context.status ?? DEFAULT_STATUS).success) {
      return false;
    }
    try {
      return isTruthy(ExpressionEvaluator.evaluateNode(ast, context, 0));
    } catch (error) {
      if (error instanceof EvalError && error.expression === undefined) {
        throw new EvalError(error.message, expr);
      }
      throw error;
    }
  }

  /**
   * Whether a condition calls success(), failure(), always() or cancelled()
   */
  static hasStatusFunction(condition: string | undefined): boolean {
    if (condition === undefined) return false;
    const expr = ExpressionEvaluator.unwrap(condition);
    if (expr.length === 0) return false;
    return ExpressionEvaluator.usesStatusFunction(ExpressionEvaluator.parse(expr));
  }

  private static usesStatusFunction(node: ASTNode): boolean {
    let found = false;
    ExpressionEvaluator.walk(node, (child) => {
      if (isCall(child) && isIdentifier(child.callee) && isStatusFunction(child.callee.name)) {
        found = true;
      }
    });
    return found;
  }

  /**
   * List the names referenced under a namespace, e.g. `secrets` or `steps`.
   * Bare conditions are scanned too when `bare` is set.
   */
  static findReferences(template: string, namespace: string, bare = false): string[] {
    const names = new Set<string>();
    const exprs: string[] = [];
    if (ExpressionEvaluator.hasExpression(template)) {
      try {
        for (const span of ExpressionEvaluator.scanExpressions(template)) exprs.push(span.expr);
      } catch {
        // Malformed templates are reported when they are evaluated
        return [];
      }
    } else if (bare && template.trim().length > 0) {
      exprs.push(template);
    }

    for (const expr of exprs) {
      let ast: ASTNode;
      try {
        ast = ExpressionEvaluator.parse(expr);
      } catch {
        // Syntax errors are reported when the expression is evaluated
        continue;
      }
      ExpressionEvaluator.walk(ast, (node) => {
        if (!isMember(node)) return;
        if (!isIdentifier(node.object) || node.object.name.toLowerCase() !== namespace) return;
        if (!node.computed && isIdentifier(node.property)) {
          names.add(node.property.name);
        } else if (node.computed && isLiteral(node.property)) {
          names.add(String(node.property.value));
        }
      });
    }
    return Array.from(names);
  }

  private static walk(node: ASTNode, visit: (node: ASTNode) => void): void {
    visit(node);
    for (const child of Object.values(node)) {
      if (Array.isArray(child)) {
        for (const item of child) {
          if (ExpressionEvaluator.isNode(item)) ExpressionEvaluator.walk(item, visit);
        }
      } else if (ExpressionEvaluator.isNode(child)) {
        ExpressionEvaluator.walk(child, visit);
      }
    }
  }

  private static isNode(value: unknown): value is ASTNode {
    return (
      value !== null &&
      typeof value === 'object' &&
      'type' in value &&
      typeof value.type === 'string'
    );
  }

  /**
   * Evaluate an AST node recursively
   */
  private static evaluateNode(
    node: ASTNode,
    context: ExpressionContext,
    depth: number
  ): ExpressionValue {
    if (depth > LIMITS.MAX_EXPRESSION_DEPTH) {
      throw new EvalError(
        `Expression nesting exceeds maximum depth of ${LIMITS.MAX_EXPRESSION_DEPTH}`
      );
    }

    if (isLiteral(node)) {
      const value = node.value;
      if (value instanceof RegExp) {
        throw new EvalError('Regular expression literals are not supported');
      }
      return value;
    }

    if (isIdentifier(node)) {
      return ExpressionEvaluator.resolveNamespace(node.name, context);
    }

    if (isMember(node)) {
      return ExpressionEvaluator.evaluateMember(node, context, depth);
    }

    if (isUnary(node)) {
      const argument = ExpressionEvaluator.evaluateNode(node.argument, context, depth + 1);
      if (node.operator === '!') return !isTruthy(argument);
      if (node.operator === '-' && typeof argument === 'number') return -argument;
      throw new EvalError(`Unsupported unary operator: ${node.operator}`);
    }

    if (isBinary(node)) {
      return ExpressionEvaluator.evaluateBinary(node, context, depth);
    }

    if (isCall(node)) {
      if (!isIdentifier(node.callee)) {
        throw new EvalError('Only built-in function calls are supported');
      }
      const args = node.arguments.map((arg) =>
        ExpressionEvaluator.evaluateNode(arg, context, depth + 1)
      );
      return callFunction(node.callee.name, args, context.status ?? DEFAULT_STATUS);
    }

    throw new EvalError(`Unsupported expression type: ${node.type}`);
  }

  private static evaluateBinary(
    node: jsep.BinaryExpression,
    context: ExpressionContext,
    depth: number
  ): ExpressionValue {
    const left = ExpressionEvaluator.evaluateNode(node.left, context, depth + 1);

    // Logical operators short-circuit and yield an operand, not a boolean
    if (node.operator === '&&') {
      return isTruthy(left) ? ExpressionEvaluator.evaluateNode(node.right, context, depth + 1) : left;
    }
    if (node.operator === '||') {
      return isTruthy(left) ? left : ExpressionEvaluator.evaluateNode(node.right, context, depth + 1);
    }

    const right = ExpressionEvaluator.evaluateNode(node.right, context, depth + 1);
    switch (node.operator) {
      case '==':
        return looseEquals(left, right);
      case '!=':
        return !looseEquals(left, right);
      case '<': {
        const order = compareValues(left, right);
        return order !== undefined && order < 0;
      }
      case '<=': {
        const order = compareValues(left, right);
        return order !== undefined && order <= 0;
      }
      case '>': {
        const order = compareValues(left, right);
        return order !== undefined && order > 0;
      }
      case '>=': {
        const order = compareValues(left, right);
        return order !== undefined && order >= 0;
      }
      default:
        throw new EvalError(`Unsupported binary operator: ${node.operator}`);
    }
  }

  /**
   * Member access. Chains rooted at a job namespace go through the job views so that
   * reading the result or outputs of an unfinished job is an error instead of a stale value.
   */
  private static evaluateMember(
    node: jsep.MemberExpression,
    context: ExpressionContext,
    depth: number
  ): ExpressionValue {
    const segments: ASTNode[] = [];
    const properties: boolean[] = [];
    let current: ASTNode = node;
    while (isMember(current)) {
      segments.unshift(current.property);
      properties.unshift(current.computed);
      current = current.object;
    }

    const keys = segments.map((segment, index) => {
      if (!properties[index] && isIdentifier(segment)) return segment.name;
      return ExpressionEvaluator.evaluateNode(segment, context, depth + 1);
    });

    let value: ExpressionValue;
    let rest = keys;
    if (isIdentifier(current) && JOB_NAMESPACES.has(current.name.toLowerCase())) {
      const views = current.name.toLowerCase() === 'needs' ? context.needs : context.jobs;
      const jobId = stringify(keys[0]);
      const view = lookupView(views, jobId);
      if (!view) return '';
      const field = keys.length > 1 ? stringify(keys[1]).toLowerCase() : undefined;
      if (!view.finished && (field === undefined || field === 'result' || field === 'outputs')) {
        throw new EvalError(`Job "${jobId}" has not finished; its result and outputs are not available yet`);
      }
      value = ExpressionEvaluator.jobValue(view);
      rest = keys.slice(1);
    } else {
      value = ExpressionEvaluator.evaluateNode(current, context, depth + 1);
    }

    for (const key of rest) {
      value = getMember(value, key);
    }
    return value;
  }

  private static jobValue(view: JobContextView): ExpressionObject {
    return { result: view.result, outputs: { ...view.outputs } };
  }

  private static resolveNamespace(name: string, context: ExpressionContext): ExpressionValue {
    switch (name.toLowerCase()) {
      case 'env':
        return { ...(context.env ?? {}) };
      case 'matrix':
        return { ...(context.matrix ?? {}) };
      case 'secrets':
        return { ...(context.secrets ?? {}) };
      case 'vars':
        return { ...(context.vars ?? {}) };
      case 'github':
        return { ...(context.github ?? {}) };
      case 'steps': {
        const steps: ExpressionObject = {};
        for (const [id, step] of Object.entries(context.steps ?? {})) {
          steps[id] = { outputs: { ...step.outputs }, outcome: step.outcome, conclusion: step.conclusion };
        }
        return steps;
      }
      case 'needs':
      case 'jobs':
      case 'job': {
        const views = name.toLowerCase() === 'needs' ? context.needs : context.jobs;
        const jobs: ExpressionObject = {};
        for (const [id, view] of Object.entries(views ?? {})) {
          if (!view.finished) {
            throw new EvalError(`Job "${id}" has not finished; its result and outputs are not available yet`);
          }
          jobs[id] = ExpressionEvaluator.jobValue(view);
        }
        return jobs;
      }
      default:
        return '';
    }
  }
}
