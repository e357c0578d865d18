import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { checkWorkflows, formatForStdout, readWorkflow, syncWorkflows, workflowPath } from './sync.js';
import { RenderableWorkflow } from './types.js';

const workflow = (filename: string, text: string): RenderableWorkflow => ({ filename, render: () => text });

describe('sync', () => {
  let dir: string;
  let outDir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'pipewright-'));
    outDir = path.join(dir, '.github', 'workflows');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('derives the file path from the filename', () => {
    expect(workflowPath(workflow('ci', ''), 'out')).toBe(path.join('out', 'ci.yml'));
  });

  it('writes each workflow, creating the directory', async () => {
    const written = await syncWorkflows([workflow('ci', 'name: CI\n'), workflow('release', 'name: Release\n')], outDir);
    expect(written).toEqual([path.join(outDir, 'ci.yml'), path.join(outDir, 'release.yml')]);
    expect(await readFile(path.join(outDir, 'ci.yml'), 'utf8')).toBe('name: CI\n');
    expect(await readFile(path.join(outDir, 'release.yml'), 'utf8')).toBe('name: Release\n');
  });

  it('overwrites existing files', async () => {
    await syncWorkflows([workflow('ci', 'old\n')], outDir);
    await syncWorkflows([workflow('ci', 'new\n')], outDir);
    expect(await readFile(path.join(outDir, 'ci.yml'), 'utf8')).toBe('new\n');
  });

  it('reads a missing file as undefined', async () => {
    expect(await readWorkflow(workflow('ci', ''), outDir)).toBeUndefined();
  });

  it('reports every workflow when checking', async () => {
    await mkdir(outDir, { recursive: true });
    await writeFile(path.join(outDir, 'current.yml'), 'same\n');
    await writeFile(path.join(outDir, 'stale.yml'), 'before\n');
    const results = await checkWorkflows(
      [workflow('stale', 'after\n'), workflow('missing', 'x\n'), workflow('current', 'same\n')],
      outDir
    );
    expect(results.map(r => [r.workflow.filename, r.status])).toEqual([
      ['stale', 'outdated'],
      ['missing', 'missing'],
      ['current', 'up-to-date']
    ]);
    expect(results[1]?.path).toBe(path.join(outDir, 'missing.yml'));
  });

  it('treats a trailing newline difference as outdated', async () => {
    await syncWorkflows([workflow('ci', 'a: 1\n')], outDir);
    const [result] = await checkWorkflows([workflow('ci', 'a: 1')], outDir);
    expect(result?.status).toBe('outdated');
  });
});

describe('formatForStdout', () => {
  it('separates documents with a blank line', () => {
    expect(formatForStdout([workflow('a', 'a: 1\n'), workflow('b', 'b: 2\n')])).toBe('a: 1\n\nb: 2\n');
  });

  it('prints a single document unchanged', () => {
    expect(formatForStdout([workflow('a', 'a: 1\n')])).toBe('a: 1\n');
  });
});
