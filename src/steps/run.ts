import { DocMap, Node } from '../types.js';
import { StepOptions, copyStepOptions, describeStep, projectStep } from './step.js';

export type RunStepOptions = StepOptions & {
  workdir?: string;
  shell?: string;
};

export class RunStep implements Node {
  readonly kind = 'run';
  readonly command: string;
  private readonly options: RunStepOptions;

  constructor(command: string, options: RunStepOptions = {}) {
    this.command = command;
    this.options = copyStepOptions(options);
  }

  project(): DocMap {
    const fields: DocMap = new Map([['run', this.command]]);
    if (this.options.shell !== undefined) fields.set('shell', this.options.shell);
    if (this.options.workdir !== undefined) fields.set('working-directory', this.options.workdir);
    return projectStep(this.options, fields);
  }

  toString(): string {
    return describeStep('RunStep', this.options, ['run', this.command]);
  }
}
