import { ACTION_DOWNLOAD, ACTION_UPLOAD } from '../constants.js';
import { IfNoFilesFound } from '../types.js';
import { StepOptions } from './step.js';
import { UsesStep } from './uses.js';

export type UploadOptions = StepOptions & {
  ifNoFilesFound?: IfNoFilesFound;
  retentionDays?: number;
};

export type DownloadOptions = StepOptions & {
  /** Destination directory; defaults to the artifact path. */
  path?: string;
};

/** Pairs the upload-artifact and download-artifact actions for one named artifact. */
export class Artifact {
  readonly name: string;
  readonly path: string;

  constructor({ name, path }: { name: string; path: string }) {
    this.name = name;
    this.path = path;
  }

  asUpload(options: UploadOptions = {}): UsesStep {
    const { ifNoFilesFound, retentionDays, ...rest } = options;
    const args: Record<string, string> = { name: this.name, path: this.path };
    if (ifNoFilesFound !== undefined) args['if-no-files-found'] = ifNoFilesFound;
    if (retentionDays !== undefined) args['retention-days'] = String(retentionDays);
    return new UsesStep(ACTION_UPLOAD, {
      ...rest,
      name: rest.name ?? `Upload artifact '${this.name}'`,
      with: args
    });
  }

  asDownload(options: DownloadOptions = {}): UsesStep {
    const { path = this.path, ...rest } = options;
    return new UsesStep(ACTION_DOWNLOAD, {
      ...rest,
      name: rest.name ?? `Download artifact '${this.name}'`,
      with: { name: this.name, path }
    });
  }
}
