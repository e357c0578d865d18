import { DocMap, Node } from '../types.js';
import { StepOptions, copyStepOptions, describeStep, projectStep } from './step.js';

export type UsesStepOptions = StepOptions & {
  with?: Record<string, string>;
};

/** Invocation of a reusable action, `owner/action@version`. */
export class UsesStep implements Node {
  readonly kind = 'uses';
  readonly action: string;
  private args: Record<string, string>;
  private readonly options: StepOptions;

  constructor(action: string, options: UsesStepOptions = {}) {
    const { with: args, ...rest } = options;
    this.action = action;
    this.args = { ...args };
    this.options = copyStepOptions(rest);
  }

  withArgs(args: Record<string, string>): this {
    this.args = { ...args };
    return this;
  }

  project(): DocMap {
    const fields: DocMap = new Map([['uses', this.action]]);
    if (Object.keys(this.args).length) fields.set('with', new Map(Object.entries(this.args)));
    return projectStep(this.options, fields);
  }

  toString(): string {
    return describeStep(this.constructor.name, this.options, ['uses', this.action]);
  }
}
