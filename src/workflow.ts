import { ValidationError } from './errors.js';
import { Job } from './job.js';
import { On, Schedule } from './on.js';
import { DocMap, DocValue, Node, Permissions } from './types.js';
import { EnvVars, Expression, Null, projectEnv, projectValue } from './utils/expression.js';
import { PROVENANCE_HEADER, dumpYaml } from './utils/yaml.js';

export type WorkflowOptions = {
  env?: EnvVars;
  concurrencyGroup?: string;
  cancelInProgress?: boolean | string | Expression;
  permissions?: Permissions;
};

type Falsy = null | undefined | false;

export type Triggers = {
  push?: On | Falsy;
  pullRequest?: On | Falsy;
  workflowDispatch?: Null | On | Falsy;
  schedule?: Schedule | Falsy;
};

const TRIGGER_KEYS = [
  ['push', 'push'],
  ['pullRequest', 'pull_request'],
  ['workflowDispatch', 'workflow_dispatch'],
  ['schedule', 'schedule']
] as const;

/**
 * Root of a workflow document, rendered to `<filename>.yml`.
 *
 * Workflows picked up by the CLI are subclasses that configure themselves in a
 * constructor taking no arguments:
 *
 * ```ts
 * class Ci extends Workflow {
 *   constructor() {
 *     super('ci', 'CI');
 *     this.on({ push: new On({ branches: ['main'] }) });
 *     this.addJob('test', new Job({ steps: [new RunStep('npm test')] }));
 *   }
 * }
 * ```
 */
export class Workflow implements Node {
  readonly filename: string;
  readonly name?: string;
  readonly jobs = new Map<string, Job>();
  private readonly env: EnvVars;
  private readonly concurrencyGroup?: string;
  private readonly cancelInProgress?: boolean | string | Expression;
  private readonly permissions?: Permissions;
  private readonly triggers = new Map<string, Node>();

  constructor(filename: string, name?: string, options: WorkflowOptions = {}) {
    if (options.cancelInProgress !== undefined && options.concurrencyGroup === undefined) {
      throw new ValidationError('"cancelInProgress" requires "concurrencyGroup"');
    }
    this.filename = filename;
    this.name = name;
    this.env = { ...options.env };
    this.concurrencyGroup = options.concurrencyGroup;
    this.cancelInProgress = options.cancelInProgress;
    this.permissions = options.permissions;
  }

  /** Set each given trigger and remove each trigger left out or falsy. */
  on(triggers: Triggers = {}): this {
    for (const [option, key] of TRIGGER_KEYS) {
      const trigger = triggers[option];
      if (trigger) this.triggers.set(key, trigger);
      else this.triggers.delete(key);
    }
    return this;
  }

  addJob(name: string, job: Job): this {
    this.jobs.set(name, job);
    return this;
  }

  project(): DocMap {
    const workflow: DocMap = new Map();
    if (this.name) workflow.set('name', this.name);
    if (Object.keys(this.env).length) workflow.set('env', projectEnv(this.env));
    if (this.concurrencyGroup) {
      if (this.cancelInProgress === undefined) {
        workflow.set('concurrency', this.concurrencyGroup);
      } else {
        workflow.set('concurrency', new Map<string, DocValue>([
          ['group', this.concurrencyGroup],
          ['cancel-in-progress', projectValue(this.cancelInProgress)]
        ]));
      }
    }
    if (this.permissions !== undefined) {
      workflow.set(
        'permissions',
        typeof this.permissions === 'string' ? this.permissions : new Map<string, DocValue>(Object.entries(this.permissions))
      );
    }
    const on: DocMap = new Map();
    for (const [key, trigger] of this.triggers) on.set(key, trigger.project());
    workflow.set('on', on);
    if (this.jobs.size) {
      const jobs: DocMap = new Map();
      for (const [name, job] of this.jobs) jobs.set(name, job.project());
      workflow.set('jobs', jobs);
    }
    return workflow;
  }

  render(): string {
    return `${PROVENANCE_HEADER}\n${dumpYaml(this.project())}`;
  }

  toString(): string {
    const label = this.name ? `name=${JSON.stringify(this.name)}, ` : '';
    return `Workflow(${label}filename=${JSON.stringify(this.filename)})`;
  }
}
