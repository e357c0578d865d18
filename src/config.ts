import path from 'node:path';
import { DEFAULT_ENTRY, DEFAULT_OUTPUT_DIR } from './constants.js';

export type Config = {
  entry: string;
  outputDir: string;
};

export type ConfigOverrides = {
  entry?: string;
  outDir?: string;
};

/** Flags win over `PIPEWRIGHT_*` variables, which win over the defaults. */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Config {
  const entry = overrides.entry || env.PIPEWRIGHT_ENTRY || DEFAULT_ENTRY;
  const outputDir = overrides.outDir || env.PIPEWRIGHT_OUTPUT_DIR || DEFAULT_OUTPUT_DIR;
  return {
    entry: path.resolve(cwd, entry),
    outputDir: path.resolve(cwd, outputDir)
  };
}
