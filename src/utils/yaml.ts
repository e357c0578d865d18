import YAML from 'yaml';
import { DocValue } from '../types.js';

export const PROVENANCE_HEADER =
  '# This file is generated by pipewright. Edit the workflow source and run `pipewright sync` instead.';

/**
 * Dump a projected document as YAML.
 *
 * Keys keep their insertion order, duplicate subtrees are written out in full
 * (the platform rejects anchors and aliases), multi-line strings use literal
 * block style and no scalar is ever folded across lines.
 */
export function dumpYaml(value: DocValue): string {
  return YAML.stringify(value, {
    aliasDuplicateObjects: false,
    blockQuote: 'literal',
    lineWidth: 0,
    sortMapEntries: false
  });
}
