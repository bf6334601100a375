/**
 * locale-resolver - dotted-key message lookup over lazily loaded locale sources
 *
 * Architecture:
 * - Source files in <searchPath>/Translations/{locale}/{source}.{json,yaml,yml}
 * - Per-resolver cache, each (locale, source) loaded at most once
 * - Fallback chain: locale -> language-only locale -> fallback locale -> key
 * - Optional ICU formatting of the resolved message
 *
 * Usage:
 * ```typescript
 * import { createResolver } from 'locale-resolver';
 *
 * const resolver = createResolver({ locale: 'fr-FR', searchPaths: ['./app'] });
 * resolver.lookup('validation.required');
 * resolver.lookup('cart.summary', { count: 2 });
 * ```
 */

// Resolver
export { MessageResolver, DEFAULT_FALLBACK_LOCALE } from './translator/resolver.js';
export type { MessageResolverOptions } from './translator/resolver.js';
export { SourceCache } from './translator/source-cache.js';
export { extractPath } from './translator/extract.js';
export { emptyBranch, mergeAll, mergeTrees, toMessage, toMessageTree, toTranslationNode } from './translator/tree.js';
export { IcuMessageFormatter, detectIntlSupport, formatMessage, normalizeArgs } from './translator/formatter.js';

// Loaders
export { FileSourceLoader, DEFAULT_EXTENSIONS, DEFAULT_TRANSLATIONS_DIRECTORY } from './loaders/file-loader.js';
export type { FileSourceLoaderOptions } from './loaders/file-loader.js';
export { MemorySourceLoader } from './loaders/memory-loader.js';

// Configuration
export { createResolver, loadResolverConfig, parseResolverConfig } from './utils/config-loader.js';
export { RawTranslationTreeSchema, ResolverConfigSchema, SourceExtensionSchema } from './schemas/translation-schemas.js';
export type {
  RawTranslationInput,
  RawTranslationInputValue,
  RawTranslationScalar,
  RawTranslationTree,
  RawTranslationValue,
  ResolverConfig,
  ResolverConfigInput,
  SourceExtension,
} from './schemas/translation-schemas.js';

// Errors and logging
export { TranslatorError, TranslatorErrorCode } from './errors.js';
export { LogLevel, Logger, getLogger, logger } from './utils/logger.js';

// Type definitions
export type {
  Message,
  MessageArgs,
  MessageArgValue,
  MessageFormatter,
  MessageTree,
  SourceLoader,
  TranslationBranch,
  TranslationLeaf,
  TranslationNode,
} from './translator/types.js';
