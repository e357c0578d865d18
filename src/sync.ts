import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { CheckResult, RenderableWorkflow } from './types.js';

export function workflowPath(workflow: RenderableWorkflow, outDir: string): string {
  return path.join(outDir, `${workflow.filename}.yml`);
}

export async function writeWorkflow(workflow: RenderableWorkflow, outDir: string): Promise<string> {
  const file = workflowPath(workflow, outDir);
  await mkdir(outDir, { recursive: true });
  await writeFile(file, workflow.render(), 'utf8');
  return file;
}

/** Contents of the committed file, or undefined when there is none. */
export async function readWorkflow(workflow: RenderableWorkflow, outDir: string): Promise<string | undefined> {
  try {
    return await readFile(workflowPath(workflow, outDir), 'utf8');
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return undefined;
    throw e;
  }
}

export async function syncWorkflows(workflows: RenderableWorkflow[], outDir: string): Promise<string[]> {
  const written: string[] = [];
  for (const workflow of workflows) {
    written.push(await writeWorkflow(workflow, outDir));
  }
  return written;
}

// Each render already ends in a newline; one more separates the documents.
export function formatForStdout(workflows: RenderableWorkflow[]): string {
  return workflows.map(w => w.render()).join('\n');
}

export async function checkWorkflows(workflows: RenderableWorkflow[], outDir: string): Promise<CheckResult[]> {
  const results: CheckResult[] = [];
  for (const workflow of workflows) {
    const actual = await readWorkflow(workflow, outDir);
    const status = actual === undefined ? 'missing' : actual === workflow.render() ? 'up-to-date' : 'outdated';
    results.push({ workflow, path: workflowPath(workflow, outDir), status });
  }
  return results;
}
