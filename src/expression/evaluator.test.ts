import { describe, expect, test } from 'vitest';
import { EvalError } from '../runner/errors.ts';
import { type ExpressionContext, ExpressionEvaluator } from './evaluator.ts';

describe('ExpressionEvaluator', () => {
  const context: ExpressionContext = {
    env: { NAME: 'World', COUNT: '5' },
    matrix: { os: 'linux', node: 20 },
    secrets: { TOKEN: 'test-secret' },
    vars: { REGION: 'eu' },
    github: { run_id: 'run-1', workflow: 'ci', job: 'build', workspace: '/work' },
    steps: {
      build: { outputs: { version: '1.2.3' }, outcome: 'success', conclusion: 'success' },
      'lint-check': { outputs: {}, outcome: 'failure', conclusion: 'success' },
    },
    needs: {
      setup: { result: 'success', outputs: { key: 'abc' }, finished: true },
    },
    jobs: {
      setup: { result: 'success', outputs: { key: 'abc' }, finished: true },
      deploy: { result: '', outputs: {}, finished: false },
    },
    status: { success: true, failure: false, cancelled: false },
  };

  const failed: ExpressionContext = {
    ...context,
    status: { success: false, failure: true, cancelled: false },
  };

  test('should evaluate literals', () => {
    expect(ExpressionEvaluator.evaluate("'hello'", context)).toBe('hello');
    expect(ExpressionEvaluator.evaluate("'it''s'", context)).toBe("it's");
    expect(ExpressionEvaluator.evaluate('123', context)).toBe(123);
    expect(ExpressionEvaluator.evaluate('true', context)).toBe(true);
    expect(ExpressionEvaluator.evaluate('null', context)).toBe(null);
  });

  test('should read context namespaces', () => {
    expect(ExpressionEvaluator.evaluate('env.NAME', context)).toBe('World');
    expect(ExpressionEvaluator.evaluate('matrix.node', context)).toBe(20);
    expect(ExpressionEvaluator.evaluate('secrets.TOKEN', context)).toBe('test-secret');
    expect(ExpressionEvaluator.evaluate('vars.REGION', context)).toBe('eu');
    expect(ExpressionEvaluator.evaluate('github.run_id', context)).toBe('run-1');
  });

  test('should match context keys case-insensitively', () => {
    expect(ExpressionEvaluator.evaluate('env.name', context)).toBe('World');
    expect(ExpressionEvaluator.evaluate('ENV.NAME', context)).toBe('World');
    expect(ExpressionEvaluator.evaluate('Matrix.OS', context)).toBe('linux');
  });

  test('should yield an empty string for missing keys and unknown namespaces', () => {
    expect(ExpressionEvaluator.evaluate('env.MISSING', context)).toBe('');
    expect(ExpressionEvaluator.evaluate('steps.nope.outputs.x', context)).toBe('');
    expect(ExpressionEvaluator.evaluate('inputs.value', context)).toBe('');
  });

  test('should read step results, including hyphenated ids', () => {
    expect(ExpressionEvaluator.evaluate('steps.build.outputs.version', context)).toBe('1.2.3');
    expect(ExpressionEvaluator.evaluate('steps.lint-check.outcome', context)).toBe('failure');
    expect(ExpressionEvaluator.evaluate("steps['lint-check'].conclusion", context)).toBe(
      'success'
    );
  });

  test('should read finished dependencies', () => {
    expect(ExpressionEvaluator.evaluate('needs.setup.result', context)).toBe('success');
    expect(ExpressionEvaluator.evaluate('needs.setup.outputs.key', context)).toBe('abc');
    expect(ExpressionEvaluator.evaluate('jobs.setup.outputs.key', context)).toBe('abc');
    expect(ExpressionEvaluator.evaluate('needs.other.result', context)).toBe('');
  });

  test('should reject reads of unfinished jobs', () => {
    expect(() => ExpressionEvaluator.evaluate('jobs.deploy.result', context)).toThrow(EvalError);
    expect(() => ExpressionEvaluator.evaluate('jobs.deploy.outputs.url', context)).toThrow(
      'Job "deploy" has not finished; its result and outputs are not available yet (in "jobs.deploy.outputs.url")'
    );
    expect(() => ExpressionEvaluator.evaluate('toJSON(jobs)', context)).toThrow(/has not finished/);
  });

  test('should compare with loose equality', () => {
    expect(ExpressionEvaluator.evaluate("'ABC' == 'abc'", context)).toBe(true);
    expect(ExpressionEvaluator.evaluate("1 == '1'", context)).toBe(true);
    expect(ExpressionEvaluator.evaluate("'1.0' == 1", context)).toBe(true);
    expect(ExpressionEvaluator.evaluate("0 == ''", context)).toBe(false);
    expect(ExpressionEvaluator.evaluate("true == 'true'", context)).toBe(false);
    expect(ExpressionEvaluator.evaluate("null == ''", context)).toBe(false);
    expect(ExpressionEvaluator.evaluate("env.COUNT != 5", context)).toBe(false);
  });

  test('should order numbers, numeric strings and strings', () => {
    expect(ExpressionEvaluator.evaluate('2 < 10', context)).toBe(true);
    expect(ExpressionEvaluator.evaluate("'2' < 10", context)).toBe(true);
    expect(ExpressionEvaluator.evaluate("'abc' < 'abd'", context)).toBe(true);
    expect(ExpressionEvaluator.evaluate("'B' > 'a'", context)).toBe(true);
    expect(ExpressionEvaluator.evaluate("'x' < 1", context)).toBe(false);
    expect(ExpressionEvaluator.evaluate("'x' >= 1", context)).toBe(false);
    expect(ExpressionEvaluator.evaluate('env.COUNT >= 5', context)).toBe(true);
  });

  test('should return operands from logical operators', () => {
    expect(ExpressionEvaluator.evaluate("'' || 'default'", context)).toBe('default');
    expect(ExpressionEvaluator.evaluate("'a' && 'b'", context)).toBe('b');
    expect(ExpressionEvaluator.evaluate("0 && 'x'", context)).toBe(0);
    expect(ExpressionEvaluator.evaluate("!''", context)).toBe(true);
    expect(ExpressionEvaluator.evaluate("!(env.NAME == 'World')", context)).toBe(false);
  });

  test('should call built-in functions', () => {
    expect(ExpressionEvaluator.evaluate("contains('Hello World', 'WORLD')", context)).toBe(true);
    expect(ExpressionEvaluator.evaluate("contains(fromJSON('[\"a\",\"b\"]'), 'B')", context)).toBe(
      true
    );
    expect(ExpressionEvaluator.evaluate("startsWith('refs/heads/main', 'refs/')", context)).toBe(
      true
    );
    expect(ExpressionEvaluator.evaluate("endsWith('file.TS', '.ts')", context)).toBe(true);
    expect(ExpressionEvaluator.evaluate("format('{0}-{1}', 'a', 2)", context)).toBe('a-2');
    expect(ExpressionEvaluator.evaluate("format('{{0}}', 'x')", context)).toBe('{0}');
    expect(ExpressionEvaluator.evaluate("join(fromJSON('[1,2,3]'), '-')", context)).toBe('1-2-3');
    expect(ExpressionEvaluator.evaluate("join(fromJSON('[1,2]'))", context)).toBe('1,2');
    expect(ExpressionEvaluator.evaluate('toJSON(matrix)', context)).toBe(
      '{\n  "os": "linux",\n  "node": 20\n}'
    );
    expect(ExpressionEvaluator.evaluate("fromJSON('{\"a\":[7]}').a[0]", context)).toBe(7);
  });

  test('should match function names case-insensitively', () => {
    expect(ExpressionEvaluator.evaluate("FROMJSON('true')", context)).toBe(true);
    expect(ExpressionEvaluator.evaluate("Contains('abc', 'B')", context)).toBe(true);
  });

  test('should report bad calls and syntax as EvalError', () => {
    expect(() => ExpressionEvaluator.evaluate('nope()', context)).toThrow('Unknown function: nope');
    expect(() => ExpressionEvaluator.evaluate("contains('a')", context)).toThrow(
      'contains() expects 2 argument(s), got 1'
    );
    expect(() => ExpressionEvaluator.evaluate("format('{1}', 'a')", context)).toThrow(
      'format: placeholder {1} has no matching argument'
    );
    expect(() => ExpressionEvaluator.evaluate("fromJSON('{oops')", context)).toThrow(/^fromJSON: /);
    expect(() => ExpressionEvaluator.evaluate('env.NAME ==', context)).toThrow(
      /^Invalid expression: /
    );
    expect(() => ExpressionEvaluator.evaluate('   ', context)).toThrow('Empty expression');
    expect(() => ExpressionEvaluator.evaluate("'open", context)).toThrow(
      'Unterminated string literal'
    );
  });

  describe('templates', () => {
    test('should substitute expressions and keep surrounding text', () => {
      expect(ExpressionEvaluator.evaluateTemplate('Hello ${{ env.NAME }}!', context)).toBe(
        'Hello World!'
      );
      expect(
        ExpressionEvaluator.evaluateTemplate('${{ matrix.os }}-${{ matrix.node }}', context)
      ).toBe('linux-20');
      expect(ExpressionEvaluator.evaluateTemplate('no expressions', context)).toBe(
        'no expressions'
      );
    });

    test('should render null as an empty string', () => {
      expect(ExpressionEvaluator.evaluateTemplate('[${{ null }}]', context)).toBe('[]');
    });

    test('should ignore closing braces inside string literals', () => {
      expect(ExpressionEvaluator.evaluateTemplate("${{ format('{{x}}') }}", context)).toBe('{x}');
    });

    test('should reject an unclosed expression', () => {
      expect(() => ExpressionEvaluator.evaluateTemplate('${{ env.NAME', context)).toThrow(
        'Unclosed expression starting at index 0'
      );
    });

    test('should evaluate every value of a record', () => {
      expect(
        ExpressionEvaluator.evaluateRecord(
          { GREETING: 'hi ${{ env.NAME }}', PLAIN: 'x' },
          context
        )
      ).toEqual({ GREETING: 'hi World', PLAIN: 'x' });
      expect(ExpressionEvaluator.evaluateRecord(undefined, context)).toEqual({});
    });
  });

  describe('conditions', () => {
    test('should default to success()', () => {
      expect(ExpressionEvaluator.evaluateCondition(undefined, context)).toBe(true);
      expect(ExpressionEvaluator.evaluateCondition(undefined, failed)).toBe(false);
      expect(ExpressionEvaluator.evaluateCondition('', failed)).toBe(false);
    });

    test('should accept bare and wrapped conditions', () => {
      expect(ExpressionEvaluator.evaluateCondition("env.NAME == 'World'", context)).toBe(true);
      expect(ExpressionEvaluator.evaluateCondition("${{ env.NAME == 'Mars' }}", context)).toBe(
        false
      );
      expect(ExpressionEvaluator.evaluateCondition('false', context)).toBe(false);
    });

    test('should apply an implicit success() when no status function is called', () => {
      expect(ExpressionEvaluator.evaluateCondition("env.NAME == 'World'", failed)).toBe(false);
      expect(ExpressionEvaluator.evaluateCondition('always()', failed)).toBe(true);
      expect(ExpressionEvaluator.evaluateCondition('failure()', failed)).toBe(true);
      expect(ExpressionEvaluator.evaluateCondition('failure()', context)).toBe(false);
      expect(
        ExpressionEvaluator.evaluateCondition("always() && env.NAME == 'Mars'", failed)
      ).toBe(false);
    });

    test('should detect status functions', () => {
      expect(ExpressionEvaluator.hasStatusFunction('always() && true')).toBe(true);
      expect(ExpressionEvaluator.hasStatusFunction('${{ Success() }}')).toBe(true);
      expect(ExpressionEvaluator.hasStatusFunction("env.X == 'y'")).toBe(false);
      expect(ExpressionEvaluator.hasStatusFunction(undefined)).toBe(false);
    });
  });

  test('should give the same result on every evaluation and leave the context untouched', () => {
    const before = structuredClone(context);
    const expr = "format('{0}/{1}', steps.build.outputs.version, needs.setup.outputs.key)";
    const first = ExpressionEvaluator.evaluate(expr, context);
    const second = ExpressionEvaluator.evaluate(expr, context);
    expect(first).toBe('1.2.3/abc');
    expect(second).toBe(first);
    expect(context).toEqual(before);
  });

  test('should normalize single quotes and hyphenated members', () => {
    expect(ExpressionEvaluator.normalize("steps.my-step.outputs.x == 'a''b'")).toBe(
      'steps["my-step"].outputs.x == "a\'b"'
    );
    expect(ExpressionEvaluator.normalize('"keep.a-b" == env.X')).toBe('"keep.a-b" == env.X');
  });

  test('should find references under a namespace', () => {
    expect(
      ExpressionEvaluator.findReferences(
        'echo ${{ secrets.TOKEN }} ${{ secrets["OTHER"] }} ${{ env.X }}',
        'secrets'
      )
    ).toEqual(['TOKEN', 'OTHER']);
    expect(ExpressionEvaluator.findReferences("secrets.A == 'x'", 'secrets', true)).toEqual(['A']);
    expect(ExpressionEvaluator.findReferences("secrets.A == 'x'", 'secrets')).toEqual([]);
    expect(ExpressionEvaluator.findReferences('${{ secrets.A', 'secrets')).toEqual([]);
  });
});
