import { stat } from 'node:fs/promises';
import path from 'node:path';
import * as url from 'node:url';
import { tsImport } from 'tsx/esm/api';
import { DiscoveryError, formatError } from './errors.js';
import { RenderableWorkflow, WorkflowSource } from './types.js';

const TS_EXTENSIONS = new Set(['.ts', '.mts', '.cts']);

function isWorkflowSource(value: unknown): value is WorkflowSource {
  return typeof value === 'object' && value !== null && 'instantiate' in value && typeof value.instantiate === 'function';
}

function isRenderable(value: unknown): value is RenderableWorkflow {
  return (
    typeof value === 'object' &&
    value !== null &&
    'filename' in value &&
    typeof value.filename === 'string' &&
    'render' in value &&
    typeof value.render === 'function'
  );
}

async function importEntry(entryPath: string): Promise<unknown> {
  const href = url.pathToFileURL(entryPath).href;
  if (TS_EXTENSIONS.has(path.extname(entryPath))) {
    return tsImport(href, import.meta.url);
  }
  return import(href);
}

/** Import the entry module and instantiate the workflows its default export registers. */
export async function loadWorkflows(entryPath: string): Promise<RenderableWorkflow[]> {
  const resolved = path.resolve(entryPath);
  const info = await stat(resolved).catch(() => undefined);
  if (!info?.isFile()) {
    throw new DiscoveryError(`Entry module not found: ${resolved}`);
  }

  let mod: unknown;
  try {
    mod = await importEntry(resolved);
  } catch (e) {
    throw new DiscoveryError(`Failed to load ${resolved}: ${formatError(e)}`, { cause: e });
  }

  const source = typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : undefined;
  if (!isWorkflowSource(source)) {
    throw new DiscoveryError(`${resolved} must default-export a workflow registry (see defineWorkflows)`);
  }

  const instantiated: unknown = source.instantiate();
  if (!Array.isArray(instantiated)) {
    throw new DiscoveryError(`${resolved}: instantiate() must return an array of workflows`);
  }
  const workflows: unknown[] = instantiated;
  const invalid = workflows.findIndex(w => !isRenderable(w));
  if (invalid !== -1) {
    throw new DiscoveryError(`${resolved}: item ${invalid} is not a workflow`);
  }
  return workflows.filter(isRenderable);
}
