import { describe, it, expect } from 'vitest';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { createResolver, loadResolverConfig, parseResolverConfig } from '../../src/utils/config-loader.js';
import { TranslatorError, TranslatorErrorCode } from '../../src/errors.js';

const fixtures = fileURLToPath(new URL('../fixtures', import.meta.url));
const app = join(fixtures, 'app');

function codeOf(fn: () => unknown): TranslatorErrorCode | undefined {
  try {
    fn();
  } catch (error) {
    return TranslatorError.isTranslatorError(error) ? error.code : undefined;
  }
  return undefined;
}

describe('config-loader', () => {
  describe('parseResolverConfig', () => {
    it('should apply defaults', () => {
      expect(parseResolverConfig({ searchPaths: [app] })).toEqual({
        locale: 'en',
        fallbackLocale: 'en',
        searchPaths: [app],
        directory: 'Translations',
        extensions: ['json', 'yaml', 'yml'],
        formatting: true,
      });
    });

    it('should reject a configuration without search paths', () => {
      expect(codeOf(() => parseResolverConfig({ searchPaths: [] }))).toBe(TranslatorErrorCode.INVALID_CONFIG);
      expect(codeOf(() => parseResolverConfig({}))).toBe(TranslatorErrorCode.INVALID_CONFIG);
    });

    it('should reject unknown extensions', () => {
      expect(codeOf(() => parseResolverConfig({ searchPaths: [app], extensions: ['php'] }))).toBe(
        TranslatorErrorCode.INVALID_CONFIG
      );
    });
  });

  describe('loadResolverConfig', () => {
    it('should load YAML and resolve search paths against the file', () => {
      const config = loadResolverConfig(join(fixtures, 'config', 'locale-resolver.yaml'));

      expect(config).toEqual({
        locale: 'fr',
        fallbackLocale: 'en',
        searchPaths: [app],
        directory: 'Translations',
        extensions: ['json', 'yaml', 'yml'],
        formatting: false,
      });
    });

    it('should validate JSON files', () => {
      const file = join(fixtures, 'config', 'empty-search-paths.json');
      expect(codeOf(() => loadResolverConfig(file))).toBe(TranslatorErrorCode.INVALID_CONFIG);
    });

    it('should reject other file types', () => {
      expect(() => loadResolverConfig(join(fixtures, 'config', 'settings.txt'))).toThrow(
        'Only .yaml/.yml/.json files are allowed'
      );
    });

    it('should report a missing file as a configuration error', () => {
      const file = join(fixtures, 'config', 'missing.yaml');
      expect(codeOf(() => loadResolverConfig(file))).toBe(TranslatorErrorCode.INVALID_CONFIG);
    });
  });

  describe('createResolver', () => {
    it('should build a file-backed resolver', () => {
      const resolver = createResolver({ searchPaths: [app] });

      expect(resolver.getLocale()).toBe('en');
      expect(resolver.lookup('validation.required')).toBe('This field is required.');
      expect(resolver.lookup('validation.minLength', { field: 'Name', min: 3 })).toBe(
        'Name must be at least 3 characters.'
      );
    });

    it('should skip formatting when it is turned off', () => {
      const resolver = createResolver(loadResolverConfig(join(fixtures, 'config', 'locale-resolver.yaml')));

      expect(resolver.getLocale()).toBe('fr');
      expect(resolver.lookup('validation.required')).toBe('Ce champ est obligatoire.');
      expect(resolver.lookup('validation.minLength', { field: 'Nom', min: 3 })).toBe(
        '{field} must be at least {min, number} characters.'
      );
    });

    it('should throw for an invalid configuration', () => {
      expect(() => createResolver({ searchPaths: [] })).toThrow(TranslatorError);
    });
  });
});
