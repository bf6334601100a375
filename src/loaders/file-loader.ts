/**
 * File Source Loader
 *
 * Discovers `<searchPath>/<directory>/<locale>/<source>.<ext>` across the
 * configured search paths and parses every match. Order is search path
 * first, then extension, and decides merge precedence: later files win.
 */

import { readFileSync, statSync } from 'fs';
import { join, resolve } from 'path';
import { TranslatorError, TranslatorErrorCode, toError } from '../errors.js';
import {
  RawTranslationTreeSchema,
  type RawTranslationTree,
  type SourceExtension,
} from '../schemas/translation-schemas.js';
import type { SourceLoader } from '../translator/types.js';
import { parseJson, parseYaml, type ParseResult } from '../utils/json-utils.js';
import { logger } from '../utils/logger.js';

export interface FileSourceLoaderOptions {
  /** Root directories, searched in order */
  searchPaths: readonly string[];
  /** Directory under each search path that holds locale folders (default: 'Translations') */
  directory?: string;
  /** File extensions tried for each search path, in order */
  extensions?: readonly SourceExtension[];
}

export const DEFAULT_TRANSLATIONS_DIRECTORY = 'Translations';
export const DEFAULT_EXTENSIONS: readonly SourceExtension[] = ['json', 'yaml', 'yml'];

/**
 * A locale or source name must stay a single path segment
 */
function isSafeSegment(segment: string): boolean {
  return segment !== '' && segment !== '.' && !segment.includes('..') && !/[\\/]/.test(segment);
}

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    // ENOENT and friends: nothing discovered here
    return false;
  }
}

export class FileSourceLoader implements SourceLoader {
  private readonly searchPaths: readonly string[];
  private readonly directory: string;
  private readonly extensions: readonly SourceExtension[];

  constructor(options: FileSourceLoaderOptions) {
    this.searchPaths = options.searchPaths.map(path => resolve(path));
    this.directory = options.directory ?? DEFAULT_TRANSLATIONS_DIRECTORY;
    this.extensions = options.extensions ?? DEFAULT_EXTENSIONS;
  }

  /**
   * Concrete files for a source/locale pair, in discovery order
   */
  discover(source: string, locale: string): string[] {
    if (!isSafeSegment(source) || !isSafeSegment(locale)) {
      logger.warn('Ignoring translation name outside the locale directory', { source, locale });
      return [];
    }

    const files: string[] = [];
    for (const searchPath of this.searchPaths) {
      for (const extension of this.extensions) {
        const candidate = join(searchPath, this.directory, locale, `${source}.${extension}`);
        if (isFile(candidate)) {
          files.push(candidate);
        }
      }
    }
    return files;
  }

  load(source: string, locale: string): RawTranslationTree[] {
    return this.discover(source, locale).map(file => this.loadFile(file));
  }

  private loadFile(file: string): RawTranslationTree {
    let content: string;
    try {
      content = readFileSync(file, 'utf8');
    } catch (error) {
      throw new TranslatorError(
        TranslatorErrorCode.SOURCE_READ_FAILED,
        `Failed to read translation file ${file}`,
        toError(error)
      );
    }

    const result: ParseResult<RawTranslationTree> = file.endsWith('.json')
      ? parseJson(content, RawTranslationTreeSchema)
      : parseYaml(content, RawTranslationTreeSchema, {});

    if (!result.success) {
      logger.error('Malformed translation file', { file, error: result.error });
      throw new TranslatorError(
        TranslatorErrorCode.INVALID_SOURCE_DATA,
        `Malformed translation file ${file}: ${result.error}`
      );
    }

    logger.debug('Read translation file', { file });
    return result.data;
  }
}
