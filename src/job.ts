import { ACTION_CHECKOUT, DEFAULT_RUNNER } from './constants.js';
import { ValidationError } from './errors.js';
import { Step, UsesStep } from './steps/index.js';
import { DocMap, DocValue, Literal, Node } from './types.js';
import { EnvVars, Expression, projectEnv, projectValue, toDocValue } from './utils/expression.js';

export type MatrixSpec = {
  include?: Record<string, Literal>[];
  exclude?: Record<string, Literal>[];
  [axis: string]: Literal | undefined;
};

/** Pass a `Map` when axis order matters for integer-like axis names. */
export type Matrix = MatrixSpec | Map<string, Literal> | Expression;

export type JobOptions = {
  name?: string;
  condition?: string;
  runsOn?: string | Expression;
  matrix?: Matrix;
  failFast?: boolean;
  maxParallel?: number;
  steps?: Step[];
  needs?: string | string[];
  outputs?: Record<string, string | Expression>;
  env?: EnvVars;
  timeoutMinutes?: number;
  /** Prepend an `actions/checkout` step. Defaults to true. */
  defaultCheckout?: boolean;
};

export class Job implements Node {
  readonly name?: string;
  private readonly condition: string;
  private readonly runsOn: string | Expression;
  private readonly matrix?: Matrix;
  private readonly failFast?: boolean;
  private readonly maxParallel?: number;
  private readonly steps: Step[];
  private readonly needs: string | string[];
  private readonly outputs?: Record<string, string | Expression>;
  private readonly env: EnvVars;
  private readonly timeoutMinutes?: number;

  constructor(options: JobOptions = {}) {
    if (options.matrix === undefined && options.failFast !== undefined) {
      throw new ValidationError('"failFast" requires "matrix"');
    }
    if (options.matrix === undefined && options.maxParallel !== undefined) {
      throw new ValidationError('"maxParallel" requires "matrix"');
    }
    this.name = options.name;
    this.condition = options.condition ?? '';
    this.runsOn = options.runsOn ?? DEFAULT_RUNNER;
    this.matrix = options.matrix;
    this.failFast = options.failFast;
    this.maxParallel = options.maxParallel;
    this.steps = [...(options.steps ?? [])];
    this.needs = options.needs ?? [];
    this.outputs = options.outputs ? { ...options.outputs } : undefined;
    this.env = { ...options.env };
    this.timeoutMinutes = options.timeoutMinutes;
    if (options.defaultCheckout ?? true) {
      this.steps.unshift(new UsesStep(ACTION_CHECKOUT));
    }
  }

  addStep(step: Step): this {
    this.steps.push(step);
    return this;
  }

  project(): DocMap {
    const job: DocMap = new Map();
    if (this.name !== undefined) job.set('name', this.name);
    if (this.condition) job.set('if', this.condition);
    if (this.needs.length) job.set('needs', typeof this.needs === 'string' ? this.needs : [...this.needs]);
    job.set('runs-on', projectValue(this.runsOn));
    if (this.matrix !== undefined) {
      const strategy: DocMap = new Map([['matrix', this.projectMatrix(this.matrix)]]);
      if (this.failFast !== undefined) strategy.set('fail-fast', this.failFast);
      if (this.maxParallel !== undefined) strategy.set('max-parallel', this.maxParallel);
      job.set('strategy', strategy);
    }
    if (this.timeoutMinutes !== undefined) job.set('timeout-minutes', this.timeoutMinutes);
    if (this.outputs !== undefined) {
      const outputs: DocMap = new Map();
      for (const [k, v] of Object.entries(this.outputs)) outputs.set(k, projectValue(v));
      job.set('outputs', outputs);
    }
    if (Object.keys(this.env).length) job.set('env', projectEnv(this.env));
    if (this.steps.length) job.set('steps', this.steps.map(step => step.project()));
    return job;
  }

  private projectMatrix(matrix: Matrix): DocValue {
    if (matrix instanceof Expression) return matrix.project();
    if (matrix instanceof Map) return toDocValue(matrix);
    const out: DocMap = new Map();
    for (const [axis, values] of Object.entries(matrix)) {
      if (values !== undefined) out.set(axis, toDocValue(values));
    }
    return out;
  }

  toString(): string {
    const label = this.name !== undefined ? `name=${JSON.stringify(this.name)}, ` : '';
    return `Job(${label}steps=[${this.steps.map(String).join(', ')}])`;
  }
}
