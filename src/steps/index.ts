import { RunStep } from './run.js';
import { UsesStep } from './uses.js';

export type Step = RunStep | UsesStep;

export { Artifact } from './artifact.js';
export type { DownloadOptions, UploadOptions } from './artifact.js';
export { CacheStep } from './cache.js';
export type { CacheStepOptions } from './cache.js';
export { RunStep } from './run.js';
export type { RunStepOptions } from './run.js';
export type { StepOptions } from './step.js';
export { UsesStep } from './uses.js';
export type { UsesStepOptions } from './uses.js';
