/**
 * Zod validation schemas for translation sources and resolver configuration
 * Ensures data integrity at load time
 */

import { z } from 'zod';

/**
 * A raw translation tree after validation: every leaf is text
 */
export type RawTranslationValue = string | string[] | RawTranslationTree;

export interface RawTranslationTree {
  [key: string]: RawTranslationValue;
}

/**
 * A raw translation tree as produced by a source loader, before numbers and
 * booleans are read as text
 */
export type RawTranslationScalar = string | number | boolean;

export type RawTranslationInputValue = RawTranslationScalar | RawTranslationScalar[] | RawTranslationInput;

export interface RawTranslationInput {
  [key: string]: RawTranslationInputValue;
}

const LeafSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String);

/**
 * Leaves are scalars or lists of scalars, coerced to strings (`404` → `"404"`).
 * Nulls, nested lists and objects inside lists are malformed data.
 */
export const RawTranslationTreeSchema: z.ZodType<RawTranslationTree, z.ZodTypeDef, RawTranslationInput> = z.lazy(
  () => z.record(z.string(), z.union([LeafSchema, z.array(LeafSchema), RawTranslationTreeSchema]))
);

export const SourceExtensionSchema = z.enum(['json', 'yaml', 'yml']);

export type SourceExtension = z.infer<typeof SourceExtensionSchema>;

/**
 * Schema for resolver configuration (locale-resolver.yaml / .json)
 */
export const ResolverConfigSchema = z.object({
  locale: z.string().min(1).default('en'),
  fallbackLocale: z.string().min(1).default('en'),
  searchPaths: z.array(z.string().min(1)).min(1, 'At least one search path is required'),
  directory: z.string().default('Translations'),
  extensions: z.array(SourceExtensionSchema).min(1).default(['json', 'yaml', 'yml']),
  formatting: z.boolean().default(true),
});

/** Validated configuration, defaults applied */
export type ResolverConfig = z.infer<typeof ResolverConfigSchema>;

/** Configuration as written by callers, defaults optional */
export type ResolverConfigInput = z.input<typeof ResolverConfigSchema>;
