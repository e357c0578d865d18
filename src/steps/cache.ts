import { ACTION_CACHE, CACHE_VERSION } from '../constants.js';
import { StepOptions } from './step.js';
import { UsesStep } from './uses.js';

export type CacheStepOptions = Omit<StepOptions, 'name'> & {
  version?: string;
};

/** Step running `actions/cache`. */
export class CacheStep extends UsesStep {
  constructor(
    name: string,
    paths: Iterable<string>,
    key: string,
    restoreKeys?: Iterable<string>,
    options: CacheStepOptions = {}
  ) {
    const { version = CACHE_VERSION, ...rest } = options;
    const args: Record<string, string> = { path: [...paths].join('\n'), key };
    if (restoreKeys !== undefined) args['restore-keys'] = [...restoreKeys].join('\n');
    super(`${ACTION_CACHE}@${version}`, { ...rest, name, with: args });
  }

  /**
   * Cache `path` under `<slug>-<hash of hashFiles>`, restoring from any `<slug>-` entry.
   *
   * File names are quoted but not escaped, so a name containing `'` breaks the expression.
   */
  static simple(
    name: string,
    path: string,
    slug: string,
    hashFiles: Iterable<string>,
    options: CacheStepOptions = {}
  ): CacheStep {
    const quoted = [...hashFiles].map(f => `'${f}'`).join(', ');
    return new CacheStep(name, [path], `${slug}-\${{ hashFiles(${quoted}) }}`, [`${slug}-`], options);
  }
}
