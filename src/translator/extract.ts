/**
 * Path extraction inside a loaded source tree
 *
 * Three ordered attempts, first hit wins:
 *  A. the whole path as one literal key (`{"a.b": "..."}`)
 *  B. a segment-by-segment walk; a segment that is missing or names a
 *     leaf leaves the walk at the last branch reached, and the next
 *     segment is looked up there (`{"a": {"b": "..."}}` answers `a.x.b`)
 *  C. the first segment, then the remainder as one literal key
 *     (`{"a": {"b.c": "..."}}`)
 */

import type { TranslationBranch, TranslationNode } from './types.js';

function literal(tree: TranslationBranch, path: string): TranslationNode | undefined {
  return tree.children.get(path);
}

function walk(tree: TranslationBranch, path: string): TranslationNode | undefined {
  let current: TranslationBranch = tree;
  let output: TranslationNode | undefined;
  for (const segment of path.split('.')) {
    output = current.children.get(segment);
    if (output?.kind === 'branch') {
      current = output;
    }
  }
  return output;
}

function twoLevel(tree: TranslationBranch, path: string): TranslationNode | undefined {
  const dot = path.indexOf('.');
  if (dot === -1) {
    return undefined;
  }
  const group = tree.children.get(path.slice(0, dot));
  return group?.kind === 'branch' ? group.children.get(path.slice(dot + 1)) : undefined;
}

export function extractPath(tree: TranslationBranch, path: string): TranslationNode | undefined {
  return literal(tree, path) ?? walk(tree, path) ?? twoLevel(tree, path);
}
