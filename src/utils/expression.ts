import { DocMap, DocValue, Literal, Node } from '../types.js';

export class Expression implements Node {
  constructor(readonly expr: string) {}

  project(): string {
    return `\${{ ${this.expr} }}`;
  }

  toString(): string {
    return this.project();
  }
}

export class Null implements Node {
  project(): null {
    return null;
  }
}

export type EnvValue = string | number | boolean | Expression;

export type EnvVars = Record<string, EnvValue>;

export function isNode(value: unknown): value is Node {
  return typeof value === 'object' && value !== null && 'project' in value && typeof value.project === 'function';
}

export function projectEnv(env: EnvVars): DocMap {
  const out: DocMap = new Map();
  for (const [k, v] of Object.entries(env)) {
    out.set(k, v instanceof Expression ? v.project() : v);
  }
  return out;
}

export function projectValue(value: string | number | boolean | Node): DocValue {
  return isNode(value) ? value.project() : value;
}

// Plain user structures (matrix, outputs) are emitted as written.
export function toDocValue(input: Literal): DocValue {
  if (input === null || typeof input !== 'object') return input;
  if (Array.isArray(input)) return input.map(v => toDocValue(v));
  if (isNode(input)) return input.project();
  const out: DocMap = new Map();
  for (const [k, v] of input instanceof Map ? input.entries() : Object.entries(input)) {
    out.set(k, toDocValue(v));
  }
  return out;
}
