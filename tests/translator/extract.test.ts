/**
 * Tests for translator/extract.ts
 */
import { describe, it, expect } from 'vitest';
import { extractPath } from '../../src/translator/extract.js';
import { toMessage, toTranslationNode } from '../../src/translator/tree.js';
import type { Message } from '../../src/translator/types.js';
import type { RawTranslationTree } from '../../src/schemas/translation-schemas.js';

function extract(tree: RawTranslationTree, path: string): Message | undefined {
  const node = extractPath(toTranslationNode(tree), path);
  return node ? toMessage(node) : undefined;
}

describe('extractPath', () => {
  it('should find a top-level key', () => {
    expect(extract({ required: 'Required.' }, 'required')).toBe('Required.');
  });

  it('should match a dotted key literally before walking segments', () => {
    const tree = { 'a.b': 'leaf', a: { b: 'nested' } };
    expect(extract(tree, 'a.b')).toBe('leaf');
  });

  it('should walk nested branches one segment at a time', () => {
    expect(extract({ rules: { length: { max: 'Too long.' } } }, 'rules.length.max')).toBe('Too long.');
  });

  it('should return a branch when the path stops at one', () => {
    expect(extract({ menu: { file: 'File' } }, 'menu')).toEqual({ file: 'File' });
  });

  it('should look up later segments in the last branch when one is missing', () => {
    expect(extract({ a: { b: 'v' } }, 'a.x.b')).toBe('v');
  });

  it('should look up later segments in the last branch when one is a leaf', () => {
    expect(extract({ a: 'x', b: 'y' }, 'a.b')).toBe('y');
  });

  it('should answer with whatever the last segment finds', () => {
    expect(extract({ a: { b: 'v' } }, 'a.b.x')).toBeUndefined();
  });

  it('should look up the remainder literally under the first segment', () => {
    const tree = { status: { paid: 'Paid', 'open.pending': 'Pending payment' } };
    expect(extract(tree, 'status.open.pending')).toBe('Pending payment');
  });

  it('should not use the two-level lookup when the first segment is a leaf', () => {
    expect(extract({ status: 'flat' }, 'status.open')).toBeUndefined();
  });

  it('should return undefined for a missing path', () => {
    expect(extract({ a: { b: 'x' } }, 'a.c')).toBeUndefined();
    expect(extract({}, 'anything')).toBeUndefined();
  });
});
