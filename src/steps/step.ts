import { DocMap } from '../types.js';
import { EnvVars, projectEnv } from '../utils/expression.js';

export type StepOptions = {
  name?: string;
  id?: string;
  /** Guard expression, emitted verbatim as `if`. */
  condition?: string;
  env?: EnvVars;
  continueOnError?: boolean;
  timeoutMinutes?: number;
};

export function copyStepOptions<T extends StepOptions>(options: T): T {
  return { ...options, env: options.env ? { ...options.env } : undefined };
}

/** Wrap the variant fields in the fields every step shares, in document order. */
export function projectStep(options: StepOptions, fields: DocMap): DocMap {
  const step: DocMap = new Map();
  if (options.name) step.set('name', options.name);
  if (options.id !== undefined) step.set('id', options.id);
  if (options.condition) step.set('if', options.condition);
  for (const [k, v] of fields) step.set(k, v);
  if (options.continueOnError !== undefined) step.set('continue-on-error', options.continueOnError);
  if (options.timeoutMinutes !== undefined) step.set('timeout-minutes', options.timeoutMinutes);
  if (options.env && Object.keys(options.env).length) step.set('env', projectEnv(options.env));
  return step;
}

export function describeStep(kind: string, options: StepOptions, fallback?: [label: string, value: string]): string {
  if (options.id !== undefined) return `${kind}(id=${JSON.stringify(options.id)})`;
  if (options.name !== undefined) return `${kind}(name=${JSON.stringify(options.name)})`;
  if (fallback && fallback[1]) return `${kind}(${fallback[0]}=${JSON.stringify(fallback[1])})`;
  return `${kind}(unnamed)`;
}
