/**
 * Tree conversion and merging
 *
 * Raw trees from loaders become tagged nodes so the rest of the translator
 * can match on `kind` instead of inspecting value shapes.
 */

import type { RawTranslationTree, RawTranslationValue } from '../schemas/translation-schemas.js';
import type { Message, MessageTree, TranslationBranch, TranslationNode } from './types.js';

export function emptyBranch(): TranslationBranch {
  return { kind: 'branch', children: new Map() };
}

function toNode(value: RawTranslationValue): TranslationNode {
  if (typeof value === 'string') {
    return { kind: 'leaf', value };
  }
  if (Array.isArray(value)) {
    return { kind: 'leaf', value: [...value] };
  }
  return toTranslationNode(value);
}

/**
 * Convert a validated raw tree into a branch node
 */
export function toTranslationNode(tree: RawTranslationTree): TranslationBranch {
  const children = new Map<string, TranslationNode>();
  for (const [key, value] of Object.entries(tree)) {
    children.set(key, toNode(value));
  }
  return { kind: 'branch', children };
}

function mergeNode(base: TranslationNode, override: TranslationNode): TranslationNode {
  if (base.kind === 'branch' && override.kind === 'branch') {
    return mergeTrees(base, override);
  }
  if (base.kind === 'leaf' && override.kind === 'leaf') {
    const earlier = base.value;
    const later = override.value;
    if (typeof earlier !== 'string' && typeof later !== 'string') {
      return { kind: 'leaf', value: [...later, ...earlier.slice(later.length)] };
    }
  }
  return override;
}

/**
 * Deep merge two branches. Keys of `override` win at leaves; branches present
 * on both sides are merged recursively. Two lists merge index by index, so
 * `['a', 'b', 'c']` under `['x']` gives `['x', 'b', 'c']`. Any other clash
 * goes to `override`. Neither input is mutated.
 */
export function mergeTrees(base: TranslationBranch, override: TranslationBranch): TranslationBranch {
  const children = new Map(base.children);
  for (const [key, node] of override.children) {
    const existing = children.get(key);
    children.set(key, existing ? mergeNode(existing, node) : node);
  }
  return { kind: 'branch', children };
}

/**
 * Merge trees in discovery order; the last one has the highest precedence
 */
export function mergeAll(trees: readonly TranslationBranch[]): TranslationBranch {
  const [first, ...rest] = trees;
  if (!first) {
    return emptyBranch();
  }
  return rest.reduce(mergeTrees, first);
}

/**
 * Plain-data view of a node, safe to hand to callers
 */
export function toMessage(node: TranslationNode): Message {
  if (node.kind === 'leaf') {
    return typeof node.value === 'string' ? node.value : [...node.value];
  }
  return toMessageTree(node);
}

export function toMessageTree(branch: TranslationBranch): MessageTree {
  const tree: MessageTree = {};
  for (const [key, child] of branch.children) {
    // defineProperty keeps keys such as "__proto__" as own data
    Object.defineProperty(tree, key, {
      value: toMessage(child),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return tree;
}
