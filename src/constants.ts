export const ACTION_CHECKOUT = 'actions/checkout@v4';
export const ACTION_UPLOAD = 'actions/upload-artifact@v4';
export const ACTION_DOWNLOAD = 'actions/download-artifact@v4';
export const ACTION_CACHE = 'actions/cache';
export const CACHE_VERSION = 'v4';

export const DEFAULT_RUNNER = 'ubuntu-latest';
export const DEFAULT_ENTRY = 'actions.ts';
export const DEFAULT_OUTPUT_DIR = '.github/workflows';
