import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { normalizeTagName, normalizeTagNames } from '../modules/tags/tag-names';
import { createTagSchema } from '../modules/tags/tags.schemas';

describe('tag names', () => {
  it('trims and lowercases', () => {
    assert.equal(normalizeTagName('  TypeScript '), 'typescript');
  });

  it('de-duplicates after normalizing and drops blanks, keeping first-seen order', () => {
    assert.deepEqual(normalizeTagNames(['Backend', 'api', ' backend', '   ', 'API', 'infra']), [
      'backend',
      'api',
      'infra'
    ]);
  });

  it('validates length after normalizing', () => {
    assert.deepEqual(createTagSchema.parse({ name: '  Node  ' }), { name: 'node' });
    assert.equal(createTagSchema.safeParse({ name: '   ' }).success, false);
    assert.equal(createTagSchema.safeParse({ name: 'x'.repeat(51) }).success, false);
  });
});
