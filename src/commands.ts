import fs from 'node:fs';
import path from 'node:path';
import * as url from 'node:url';
import { defineCommand } from 'citty';
import pc from 'picocolors';
import { resolveConfig } from './config.js';
import { loadWorkflows } from './loader.js';
import { checkWorkflows, formatForStdout, syncWorkflows } from './sync.js';
import { CheckStatus } from './types.js';

const __dirname = path.dirname(url.fileURLToPath(import.meta.url));

function getVersion(): string {
  const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8'));
  return typeof pkg === 'object' && pkg !== null && 'version' in pkg ? String(pkg.version) : '0.0.0';
}

const sharedArgs = {
  entry: {
    type: 'string',
    description: 'Module whose default export registers the workflows (default: actions.ts)'
  },
  'out-dir': {
    type: 'string',
    description: 'Directory holding the workflow files (default: .github/workflows)'
  },
  verbose: {
    type: 'boolean',
    alias: 'v',
    description: 'Print each workflow as it is handled',
    default: false
  }
} as const;

const syncArgs = {
  ...sharedArgs,
  print: {
    type: 'boolean',
    description: 'Print workflow YAML to stdout instead of writing files',
    default: false
  }
} as const;

type Flags = { entry?: string; outDir?: string; verbose: boolean; print: boolean };

function readFlags(args: Record<string, unknown>): Flags {
  const str = (v: unknown) => (typeof v === 'string' && v ? v : undefined);
  return {
    entry: str(args.entry),
    outDir: str(args['out-dir']),
    verbose: args.verbose === true,
    print: args.print === true
  };
}

async function sync(flags: Flags) {
  const config = resolveConfig(flags);
  const workflows = await loadWorkflows(config.entry);
  if (flags.print) {
    process.stdout.write(formatForStdout(workflows));
    return;
  }
  const written = await syncWorkflows(workflows, config.outputDir);
  if (flags.verbose) {
    for (const file of written) console.log(`wrote ${path.relative(process.cwd(), file)}`);
  }
}

const STATUS_LINE: Record<CheckStatus, (filename: string) => string> = {
  'up-to-date': f => `Workflow ${f} is up to date.`,
  outdated: f => pc.red(`Workflow ${f} is outdated!`),
  missing: f => pc.red(`Workflow ${f} is missing!`)
};

const syncCommand = defineCommand({
  meta: { name: 'sync', description: 'Generate workflow files from code' },
  args: syncArgs,
  run: async ({ args }) => {
    await sync(readFlags(args));
  }
});

const checkCommand = defineCommand({
  meta: { name: 'check', description: 'Check that generated workflow files are up to date' },
  args: sharedArgs,
  run: async ({ args }) => {
    const flags = readFlags(args);
    const config = resolveConfig(flags);
    const workflows = await loadWorkflows(config.entry);
    const results = await checkWorkflows(workflows, config.outputDir);
    for (const { workflow, path: file, status } of results) {
      console.log(STATUS_LINE[status](workflow.filename));
      if (flags.verbose && status !== 'up-to-date') console.log(pc.dim(`  ${file}`));
    }
    if (results.some(r => r.status !== 'up-to-date')) {
      console.error('Some workflows are outdated. Run pipewright sync to update them.');
      process.exit(1);
    }
  }
});

export const main = defineCommand({
  meta: {
    name: 'pipewright',
    version: getVersion(),
    description: 'Generate GitHub Actions workflows from code'
  },
  args: syncArgs,
  subCommands: {
    sync: syncCommand,
    check: checkCommand
  }
});

const SUBCOMMANDS = new Set(['sync', 'check']);
const VALUE_FLAGS = new Set(['--entry', '--out-dir']);

/**
 * Move the subcommand to the front of `argv`, or insert `sync` when none is
 * given, so flag values are never taken for a subcommand name.
 */
export function toRawArgs(argv: string[]): string[] {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;
    if (VALUE_FLAGS.has(arg)) {
      i++;
      continue;
    }
    if (arg.startsWith('-')) continue;
    if (SUBCOMMANDS.has(arg)) return [arg, ...argv.slice(0, i), ...argv.slice(i + 1)];
    return argv;
  }
  if (argv.some(arg => arg === '--help' || arg === '-h' || arg === '--version')) return argv;
  return ['sync', ...argv];
}
