export * from './constants.js';
export { DiscoveryError, PipewrightError, ValidationError } from './errors.js';
export { Job } from './job.js';
export type { JobOptions, Matrix, MatrixSpec } from './job.js';
export { loadWorkflows } from './loader.js';
export { On, Schedule } from './on.js';
export type { OnOptions } from './on.js';
export { WorkflowRegistry, defineWorkflows, displayName } from './registry.js';
export type { WorkflowConstructor } from './registry.js';
export * from './steps/index.js';
export { checkWorkflows, formatForStdout, readWorkflow, syncWorkflows, workflowPath, writeWorkflow } from './sync.js';
export type * from './types.js';
export { Expression, Null, projectEnv, toDocValue } from './utils/expression.js';
export type { EnvValue, EnvVars } from './utils/expression.js';
export { PROVENANCE_HEADER, dumpYaml } from './utils/yaml.js';
export { Workflow } from './workflow.js';
export type { Triggers, WorkflowOptions } from './workflow.js';
