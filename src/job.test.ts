import { describe, expect, it } from 'vitest';
import { entries } from './__fixtures__/entries.js';
import { ACTION_CHECKOUT } from './constants.js';
import { ValidationError } from './errors.js';
import { Job } from './job.js';
import { RunStep, UsesStep } from './steps/index.js';
import { DocValue } from './types.js';
import { Expression } from './utils/expression.js';

function stepsOf(job: Job): DocValue[] {
  const steps = job.project().get('steps');
  return Array.isArray(steps) ? steps : [];
}

describe('Job', () => {
  it('runs on ubuntu-latest with a checkout step by default', () => {
    expect(entries(new Job().project())).toEqual(entries(
      new Map<string, unknown>([
        ['runs-on', 'ubuntu-latest'],
        ['steps', [new Map([['uses', ACTION_CHECKOUT]])]]
      ])
    ));
  });

  it('puts the checkout step before the given steps', () => {
    const steps = stepsOf(new Job({ steps: [new RunStep('npm test')] }));
    expect(steps).toEqual([new Map([['uses', ACTION_CHECKOUT]]), new Map([['run', 'npm test']])]);
  });

  it('skips checkout when disabled', () => {
    const job = new Job({ defaultCheckout: false, steps: [new RunStep('echo hi')] });
    expect(stepsOf(job)).toEqual([new Map([['run', 'echo hi']])]);
  });

  it('omits steps when there are none', () => {
    expect(new Job({ defaultCheckout: false }).project().has('steps')).toBe(false);
  });

  it('appends steps in order and leaves the caller array alone', () => {
    const given = [new RunStep('one')];
    const job = new Job({ steps: given, defaultCheckout: false });
    job.addStep(new RunStep('two')).addStep(new UsesStep('a/b@v1'));
    expect(given).toHaveLength(1);
    expect(stepsOf(job)).toEqual([
      new Map([['run', 'one']]),
      new Map([['run', 'two']]),
      new Map([['uses', 'a/b@v1']])
    ]);
  });

  it('projects fields in document order', () => {
    const job = new Job({
      name: 'Test',
      condition: "github.event_name == 'push'",
      needs: ['lint', 'build'],
      runsOn: new Expression('matrix.os'),
      matrix: { os: ['ubuntu-latest', 'windows-latest'] },
      timeoutMinutes: 30,
      outputs: { version: new Expression('steps.v.outputs.version'), plain: 'x' },
      env: { NODE_ENV: 'test' }
    }).project();
    expect([...job.keys()]).toEqual([
      'name',
      'if',
      'needs',
      'runs-on',
      'strategy',
      'timeout-minutes',
      'outputs',
      'env',
      'steps'
    ]);
    expect(job.get('runs-on')).toBe('${{ matrix.os }}');
    expect(job.get('needs')).toEqual(['lint', 'build']);
    expect(entries(job.get('outputs'))).toEqual(entries(
      new Map([
        ['version', '${{ steps.v.outputs.version }}'],
        ['plain', 'x']
      ])
    ));
  });

  it('keeps a single dependency as a string', () => {
    expect(new Job({ needs: 'build' }).project().get('needs')).toBe('build');
  });

  it('omits empty needs and env but keeps empty outputs', () => {
    const job = new Job({ needs: [], env: {}, outputs: {} }).project();
    expect(job.has('needs')).toBe(false);
    expect(job.has('env')).toBe(false);
    expect(entries(job.get('outputs'))).toEqual(entries(new Map()));
  });

  describe('strategy', () => {
    it('includes fail-fast next to the matrix', () => {
      const job = new Job({ matrix: { a: [1, 2] }, failFast: true });
      expect(entries(job.project().get('strategy'))).toEqual(entries(
        new Map<string, unknown>([
          ['matrix', new Map([['a', [1, 2]]])],
          ['fail-fast', true]
        ])
      ));
    });

    it('includes max-parallel', () => {
      const job = new Job({ matrix: { a: [1] }, failFast: false, maxParallel: 2 });
      const strategy = job.project().get('strategy');
      expect(strategy).toBeInstanceOf(Map);
      expect(strategy instanceof Map ? [...strategy.entries()] : []).toEqual([
        ['matrix', new Map([['a', [1]]])],
        ['fail-fast', false],
        ['max-parallel', 2]
      ]);
    });

    it('projects an expression matrix', () => {
      const job = new Job({ matrix: new Expression('fromJSON(needs.setup.outputs.matrix)') });
      expect(entries(job.project().get('strategy'))).toEqual(entries(
        new Map([['matrix', '${{ fromJSON(needs.setup.outputs.matrix) }}']])
      ));
    });

    it('keeps include and exclude entries as written', () => {
      const job = new Job({
        matrix: {
          os: ['ubuntu-latest'],
          include: [{ os: 'windows-latest', experimental: true }],
          exclude: [{ os: 'ubuntu-latest', node: 18 }]
        }
      });
      expect(entries(job.project().get('strategy'))).toEqual(entries(
        new Map([
          [
            'matrix',
            new Map<string, unknown>([
              ['os', ['ubuntu-latest']],
              ['include', [new Map<string, unknown>([['os', 'windows-latest'], ['experimental', true]])]],
              ['exclude', [new Map<string, unknown>([['os', 'ubuntu-latest'], ['node', 18]])]]
            ])
          ]
        ])
      ));
    });

    it('keeps the axis order of a map matrix', () => {
      const job = new Job({
        matrix: new Map([
          ['python', ['3.12']],
          ['3', ['x']]
        ])
      });
      const strategy = job.project().get('strategy');
      expect(entries(strategy instanceof Map ? strategy.get('matrix') : undefined)).toEqual([
        ['python', ['3.12']],
        ['3', ['x']]
      ]);
    });

    it('rejects fail-fast without a matrix', () => {
      expect(() => new Job({ failFast: true })).toThrow(ValidationError);
      expect(() => new Job({ failFast: false })).toThrow('"failFast" requires "matrix"');
    });

    it('rejects max-parallel without a matrix', () => {
      expect(() => new Job({ maxParallel: 1 })).toThrow('"maxParallel" requires "matrix"');
    });
  });

  it('describes its steps', () => {
    const job = new Job({ name: 'Build', steps: [new RunStep('make')] });
    expect(String(job)).toBe('Job(name="Build", steps=[UsesStep(uses="actions/checkout@v4"), RunStep(run="make")])');
  });
});
