import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { UnprocessableEntityException } from '@nestjs/common';
import { createProjectSchema, listProjectsQuerySchema } from '../modules/projects/projects.schemas';
import { ZodValidationPipe } from '../shared/validation/zod-validation.pipe';

function issuePaths(error: unknown): string[] {
  assert.ok(error instanceof UnprocessableEntityException);
  const body = error.getResponse();
  assert.ok(typeof body === 'object' && body !== null && 'issues' in body && Array.isArray(body.issues));
  return body.issues.map((issue: { path: string }) => issue.path);
}

describe('ZodValidationPipe', () => {
  it('returns the parsed value with defaults applied', () => {
    const pipe = new ZodValidationPipe(createProjectSchema);

    assert.deepEqual(pipe.transform({ title: '  Portfolio ', description: 'A site' }), {
      title: 'Portfolio',
      description: 'A site',
      githubUrl: null,
      isPublic: false,
      tagNames: []
    });
  });

  it('coerces query strings', () => {
    const pipe = new ZodValidationPipe(listProjectsQuerySchema);

    assert.deepEqual(pipe.transform({ limit: '25', publicOnly: 'true' }), {
      publicOnly: true,
      limit: 25,
      offset: 0,
      sort: 'newest'
    });
  });

  it('rejects invalid input with 422 and the failing paths', () => {
    const pipe = new ZodValidationPipe(createProjectSchema);

    assert.throws(
      () => pipe.transform({ title: 'x', description: 'ok', githubUrl: 'not a url', tagNames: ['a', 7] }),
      (error: unknown) => {
        assert.ok(error instanceof UnprocessableEntityException);
        assert.equal(error.getStatus(), 422);
        assert.deepEqual(issuePaths(error), ['title', 'githubUrl', 'tagNames.1']);
        return true;
      }
    );
  });
});
