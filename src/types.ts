export type DocScalar = string | number | boolean | null;

export type DocMap = Map<string, DocValue>;

export type DocValue = DocScalar | DocValue[] | DocMap;

/**
 * Anything that can project itself to a document value.
 *
 * `project()` must not mutate the node; calling it twice yields equal values.
 */
export interface Node {
  project(): DocValue;
}

// Plain objects follow JavaScript property order (integer-like keys first); a Map keeps insertion order.
export type Literal = DocScalar | Node | Literal[] | Map<string, Literal> | { [key: string]: Literal };

export type PermissionLevel = 'read' | 'write' | 'none';

export type Permissions = 'read-all' | 'write-all' | Record<string, PermissionLevel>;

export type IfNoFilesFound = 'error' | 'warn' | 'ignore';

export type RenderableWorkflow = {
  readonly filename: string;
  readonly name?: string;
  render(): string;
};

export type WorkflowSource = {
  instantiate(): RenderableWorkflow[];
};

export type CheckStatus = 'up-to-date' | 'outdated' | 'missing';

export type CheckResult = {
  workflow: RenderableWorkflow;
  path: string;
  status: CheckStatus;
};
