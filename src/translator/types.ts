/**
 * Translator Type Definitions
 *
 * @packageDocumentation
 */

import type { RawTranslationInput } from '../schemas/translation-schemas.js';

// ═══════════════════════════════════════════════════════════════════════════
// Tree Nodes
// ═══════════════════════════════════════════════════════════════════════════

export interface TranslationLeaf {
  kind: 'leaf';
  value: string | readonly string[];
}

export interface TranslationBranch {
  kind: 'branch';
  children: ReadonlyMap<string, TranslationNode>;
}

/**
 * A loaded tree node: a leaf message or a branch of named children, never both
 */
export type TranslationNode = TranslationLeaf | TranslationBranch;

// ═══════════════════════════════════════════════════════════════════════════
// Lookup Results
// ═══════════════════════════════════════════════════════════════════════════

export interface MessageTree {
  [key: string]: Message;
}

/**
 * What a lookup returns. A tree comes back when the key names a whole group.
 */
export type Message = string | string[] | MessageTree;

export type MessageArgValue = string | number | boolean | Date | null | undefined;

/**
 * Placeholder values: named (`{name}`) or positional (`{0}`, `{1}`)
 */
export type MessageArgs = Readonly<Record<string, MessageArgValue>> | readonly MessageArgValue[];

// ═══════════════════════════════════════════════════════════════════════════
// Collaborators
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Discovery and loading of raw trees for a logical source name.
 *
 * Returns every tree found for the pair, in discovery order (later trees
 * take precedence when merged). Zero matches is an empty array.
 */
export interface SourceLoader {
  load(source: string, locale: string): RawTranslationInput[];
}

/**
 * ICU message-pattern formatting engine
 */
export interface MessageFormatter {
  format(locale: string, pattern: string, args: Readonly<Record<string, MessageArgValue>>): string;
}
