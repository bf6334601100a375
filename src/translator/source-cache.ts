/**
 * Per-locale, per-source cache of loaded translation trees
 *
 * Each (locale, source) pair goes to the loader at most once. Entries are
 * never evicted; the cache lives as long as its owner.
 */

import { RawTranslationTreeSchema } from '../schemas/translation-schemas.js';
import { TranslatorError, TranslatorErrorCode } from '../errors.js';
import { logger } from '../utils/logger.js';
import { mergeAll, toTranslationNode } from './tree.js';
import type { SourceLoader, TranslationBranch } from './types.js';

export class SourceCache {
  /** locale -> source -> merged tree */
  private readonly language = new Map<string, Map<string, TranslationBranch>>();

  /** locale -> source names already loaded, in load order */
  private readonly loadedFiles = new Map<string, Set<string>>();

  constructor(private readonly loader: SourceLoader) {}

  ensureLoaded(source: string, locale: string): TranslationBranch {
    const cached = this.language.get(locale)?.get(source);
    if (cached && this.isLoaded(source, locale)) {
      return cached;
    }

    const trees = this.loader.load(source, locale).map((raw, index) => {
      const result = RawTranslationTreeSchema.safeParse(raw);
      if (!result.success) {
        throw new TranslatorError(
          TranslatorErrorCode.INVALID_SOURCE_DATA,
          `Invalid translation tree #${index + 1} for "${source}" (${locale}): ${result.error.message}`
        );
      }
      return toTranslationNode(result.data);
    });
    const merged = mergeAll(trees);

    this.record(source, locale, merged);
    logger.debug('Loaded translation source', { source, locale, trees: trees.length });

    return merged;
  }

  isLoaded(source: string, locale: string): boolean {
    return this.loadedFiles.get(locale)?.has(source) ?? false;
  }

  /**
   * Source names loaded for a locale, in load order
   */
  loadedSources(locale: string): string[] {
    return [...(this.loadedFiles.get(locale) ?? [])];
  }

  private record(source: string, locale: string, tree: TranslationBranch): void {
    let loaded = this.loadedFiles.get(locale);
    if (!loaded) {
      loaded = new Set();
      this.loadedFiles.set(locale, loaded);
    }
    loaded.add(source);

    let sources = this.language.get(locale);
    if (!sources) {
      sources = new Map();
      this.language.set(locale, sources);
    }
    sources.set(source, tree);
  }
}
