import { DiscoveryError } from './errors.js';
import { WorkflowSource } from './types.js';
import { Workflow } from './workflow.js';

export type WorkflowConstructor = new () => Workflow;

export function displayName(workflow: { filename: string; name?: string }): string {
  return workflow.name || workflow.filename;
}

/**
 * Constructors of the workflows a project defines.
 *
 * The entry module default-exports a registry; the CLI instantiates it to get
 * the documents to sync or check.
 */
export class WorkflowRegistry implements WorkflowSource {
  private readonly constructors = new Set<WorkflowConstructor>();

  register(...constructors: WorkflowConstructor[]): this {
    for (const ctor of constructors) this.constructors.add(ctor);
    return this;
  }

  get size(): number {
    return this.constructors.size;
  }

  instantiate(): Workflow[] {
    const workflows = [...this.constructors].map(Ctor => new Ctor());
    const seen = new Map<string, Workflow>();
    for (const workflow of workflows) {
      const other = seen.get(workflow.filename);
      if (other) {
        throw new DiscoveryError(`${other} and ${workflow} both render to "${workflow.filename}.yml"`);
      }
      seen.set(workflow.filename, workflow);
    }
    return workflows.sort((a, b) => compare(displayName(a), displayName(b)) || compare(a.filename, b.filename));
  }
}

export function defineWorkflows(...constructors: WorkflowConstructor[]): WorkflowRegistry {
  return new WorkflowRegistry().register(...constructors);
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
