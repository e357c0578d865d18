import { DocMap, DocValue, Node } from './types.js';

export type OnOptions = {
  paths?: Iterable<string>;
  branches?: Iterable<string>;
};

/** Event filter for `push` and `pull_request`. No filters means every event of that kind. */
export class On implements Node {
  private readonly paths: string[];
  private readonly branches: string[];

  constructor(options: OnOptions = {}) {
    this.paths = [...(options.paths ?? [])];
    this.branches = [...(options.branches ?? [])];
  }

  project(): DocMap {
    const on: DocMap = new Map();
    if (this.paths.length) on.set('paths', [...this.paths]);
    if (this.branches.length) on.set('branches', [...this.branches]);
    return on;
  }
}

export class Schedule implements Node {
  private readonly crons: string[];

  constructor(crons: Iterable<string>) {
    this.crons = [...crons];
  }

  project(): DocValue[] {
    return this.crons.map((cron): DocMap => new Map([['cron', cron]]));
  }
}
