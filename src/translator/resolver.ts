/**
 * Message Resolver
 *
 * Resolves dotted keys (`validation.required`) against lazily loaded,
 * locale-scoped sources. The first key segment names the source; the rest is
 * the path inside it. Lookups fall back from the active locale to its
 * language-only form, then to the fallback locale, then to the key itself.
 *
 * @example
 * ```typescript
 * const resolver = new MessageResolver({
 *   locale: 'fr-FR',
 *   loader: new FileSourceLoader({ searchPaths: ['./app'] }),
 * });
 *
 * resolver.lookup('validation.required');
 * resolver.lookup('cart.items', { count: 3 });
 * ```
 */

import { logger } from '../utils/logger.js';
import { extractPath } from './extract.js';
import { IcuMessageFormatter, detectIntlSupport, formatMessage } from './formatter.js';
import { SourceCache } from './source-cache.js';
import { toMessage, toMessageTree } from './tree.js';
import type { Message, MessageArgs, MessageFormatter, MessageTree, SourceLoader, TranslationNode } from './types.js';

export const DEFAULT_FALLBACK_LOCALE = 'en';

export interface MessageResolverOptions {
  /** Active locale for lookups and formatting */
  locale: string;
  /** Discovery/loading collaborator for raw trees */
  loader: SourceLoader;
  /** Last locale tried before degrading to the key (default: 'en') */
  fallbackLocale?: string;
  /** Formatting engine; `null` disables formatting (default: ICU engine) */
  formatter?: MessageFormatter | null;
}

export class MessageResolver {
  private locale: string;
  private readonly fallbackLocale: string;
  private readonly cache: SourceCache;
  private readonly formatter: MessageFormatter | null;

  /** Formatting capability, settled once at construction */
  private readonly intlSupport: boolean;

  constructor(options: MessageResolverOptions) {
    this.locale = options.locale;
    this.fallbackLocale = options.fallbackLocale ?? DEFAULT_FALLBACK_LOCALE;
    this.cache = new SourceCache(options.loader);
    this.formatter = options.formatter === undefined ? new IcuMessageFormatter() : options.formatter;
    this.intlSupport = this.formatter !== null && detectIntlSupport();
  }

  /**
   * Set the locale used for subsequent lookups. `null` keeps the current one.
   */
  setLocale(locale?: string | null): this {
    if (locale !== null && locale !== undefined) {
      this.locale = locale;
    }
    return this;
  }

  getLocale(): string {
    return this.locale;
  }

  /**
   * Resolve a dotted key to its message, formatted with `args`.
   * Never throws for missing keys or sources; the key itself is the last resort.
   */
  lookup(key: string, args: MessageArgs = {}): Message {
    // No source segment: the key is the message
    if (!key.includes('.')) {
      return this.format(key, args);
    }

    const dot = key.indexOf('.');
    const source = key.slice(0, dot);
    const path = key.slice(dot + 1);

    let output = this.resolve(source, path, this.locale);

    if (output === undefined && this.locale.indexOf('-') > 0) {
      output = this.resolve(source, path, this.locale.slice(0, this.locale.indexOf('-')));
    }

    if (output === undefined) {
      output = this.resolve(source, path, this.fallbackLocale);
    }

    if (output === undefined) {
      logger.debug('Translation not found, using key', { key, locale: this.locale });
      return this.format(key, args);
    }

    return this.format(toMessage(output), args);
  }

  /**
   * The merged tree of one source for a locale, without fallback
   */
  getSource(source: string, locale: string = this.locale): MessageTree {
    return toMessageTree(this.cache.ensureLoaded(source, locale));
  }

  isLoaded(source: string, locale: string = this.locale): boolean {
    return this.cache.isLoaded(source, locale);
  }

  /**
   * Source names loaded so far for a locale
   */
  loadedSources(locale: string = this.locale): string[] {
    return this.cache.loadedSources(locale);
  }

  private resolve(source: string, path: string, locale: string): TranslationNode | undefined {
    return extractPath(this.cache.ensureLoaded(source, locale), path);
  }

  private format(message: Message, args: MessageArgs): Message {
    return formatMessage(message, this.locale, args, this.intlSupport ? this.formatter : null);
  }
}
