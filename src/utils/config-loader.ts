/**
 * Resolver Configuration Loader
 * Loads resolver configuration from YAML or JSON files with Zod validation
 */

import { readFileSync } from 'fs';
import { dirname, extname, isAbsolute, resolve } from 'path';
import { TranslatorError, TranslatorErrorCode, toError } from '../errors.js';
import { FileSourceLoader } from '../loaders/file-loader.js';
import {
  ResolverConfigSchema,
  type ResolverConfig,
  type ResolverConfigInput,
} from '../schemas/translation-schemas.js';
import { IcuMessageFormatter } from '../translator/formatter.js';
import { MessageResolver } from '../translator/resolver.js';
import { parseJson, parseYaml, type ParseResult } from './json-utils.js';

/**
 * Validate a configuration object and apply defaults
 */
export function parseResolverConfig(input: unknown): ResolverConfig {
  const result = ResolverConfigSchema.safeParse(input);
  if (!result.success) {
    throw new TranslatorError(
      TranslatorErrorCode.INVALID_CONFIG,
      `Invalid resolver configuration: ${result.error.message}`
    );
  }
  return result.data;
}

/**
 * Load a resolver configuration file (.yaml, .yml or .json).
 * Relative search paths are resolved against the file's directory.
 */
export function loadResolverConfig(filePath: string): ResolverConfig {
  const ext = extname(filePath).toLowerCase();
  if (ext !== '.yaml' && ext !== '.yml' && ext !== '.json') {
    throw new TranslatorError(
      TranslatorErrorCode.INVALID_CONFIG,
      `Invalid config filename: ${filePath}. Only .yaml/.yml/.json files are allowed.`
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new TranslatorError(
      TranslatorErrorCode.INVALID_CONFIG,
      `Failed to load config file ${filePath}: ${toError(error).message}`,
      toError(error)
    );
  }

  const result: ParseResult<ResolverConfig> = ext === '.json'
    ? parseJson(content, ResolverConfigSchema)
    : parseYaml(content, ResolverConfigSchema);

  if (!result.success) {
    throw new TranslatorError(
      TranslatorErrorCode.INVALID_CONFIG,
      `Failed to load config file ${filePath}: ${result.error}`
    );
  }

  const baseDir = dirname(resolve(filePath));
  return {
    ...result.data,
    searchPaths: result.data.searchPaths.map(path => (isAbsolute(path) ? path : resolve(baseDir, path))),
  };
}

/**
 * Build a resolver backed by translation files from a configuration
 */
export function createResolver(config: ResolverConfigInput): MessageResolver {
  const { locale, fallbackLocale, searchPaths, directory, extensions, formatting } = parseResolverConfig(config);

  return new MessageResolver({
    locale,
    fallbackLocale,
    loader: new FileSourceLoader({ searchPaths, directory, extensions }),
    formatter: formatting ? new IcuMessageFormatter() : null,
  });
}
