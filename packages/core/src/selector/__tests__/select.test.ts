import { describe, it, expect, vi } from 'vitest';

import { User, UserId, prefixedUserApi, userApi } from '../../../test/fixtures/user-api.js';
import { compile } from '../../compiler/compile.js';
import { DIAGNOSTIC_CODES } from '../../diag/codes.js';
import type { DiagnosticEnvelope } from '../../diag/validate.js';
import { ErrorCode } from '../../errors/codes.js';
import type { Operation } from '../../openapi/types.js';
import {
  alt,
  body,
  capture,
  del,
  get,
  post,
  query,
  sub,
} from '../../route/builders.js';
import type { RouteTree } from '../../route/tree.js';
import * as t from '../../schema/types.js';
import { StructuralConflictError } from '../../types/errors.js';
import {
  type OperationIdentity,
  applyOver,
  embeds,
  select,
  selectDetailed,
} from '../select.js';

function conflictOf(run: () => unknown): StructuralConflictError {
  try {
    run();
  } catch (error) {
    if (error instanceof StructuralConflictError) return error;
    throw error;
  }
  throw new Error('expected a structural conflict');
}

const byId: RouteTree = sub(capture('user_id', UserId), get(User));

describe('select', () => {
  it('finds a single branch', () => {
    expect(select(byId, userApi)).toEqual([
      { path: '/{user_id}', method: 'get' },
    ]);
  });

  it('returns every operation when the pattern is the tree itself', () => {
    expect(select(userApi, userApi)).toEqual([
      { path: '/', method: 'get' },
      { path: '/', method: 'post' },
      { path: '/{user_id}', method: 'get' },
    ]);
  });

  it('keeps pattern declaration order', () => {
    const pattern = alt(byId, get(t.arrayOf(User)));
    expect(select(pattern, userApi)).toEqual([
      { path: '/{user_id}', method: 'get' },
      { path: '/', method: 'get' },
    ]);
  });

  it('descends through shared prefixes', () => {
    expect(select(sub('users', byId), prefixedUserApi)).toEqual([
      { path: '/users/{user_id}', method: 'get' },
    ]);
  });

  it('matches a factored pattern against separately declared branches', () => {
    const tree = alt(sub('users', get(User)), sub('users', sub(body(User), post(UserId))));
    const pattern = sub('users', alt(get(User), sub(body(User), post(UserId))));
    expect(select(pattern, tree)).toEqual([
      { path: '/users', method: 'get' },
      { path: '/users', method: 'post' },
    ]);
  });

  it('matches a split pattern against a factored tree', () => {
    const pattern = alt(sub('users', byId), sub('users', get(t.arrayOf(User))));
    expect(select(pattern, prefixedUserApi)).toEqual([
      { path: '/users/{user_id}', method: 'get' },
      { path: '/users', method: 'get' },
    ]);
  });

  it('compares types by identity, not by instance', () => {
    const pattern = sub(capture('user_id', t.newtype('UserId', t.int64())), get(User));
    expect(embeds(pattern, userApi)).toBe(true);
  });

  it('collapses duplicate identities with a diagnostic', () => {
    const seen: DiagnosticEnvelope[] = [];
    const pattern = alt(get(t.arrayOf(User)), get(t.arrayOf(User)));
    const result = selectDetailed(pattern, userApi, {
      onDiagnostic: (d) => seen.push(d),
    });

    expect(result.selection).toEqual([{ path: '/', method: 'get' }]);
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]).toMatchObject({
      code: DIAGNOSTIC_CODES.SELECTION_DUPLICATE_COLLAPSED,
      phase: 'select',
      location: 'GET /',
    });
    expect(seen).toEqual(result.diagnostics);
  });

  it('rejects an endpoint whose response differs', () => {
    const error = conflictOf(() =>
      select(sub(capture('user_id', UserId), get(UserId)), userApi)
    );
    expect(error.errorCode).toBe(ErrorCode.PATTERN_NOT_EMBEDDABLE);
    expect(error.message).toBe(
      'Pattern endpoint GET /{user_id} has no counterpart in the route tree'
    );
    expect(error.context?.location).toBe('GET /{user_id}');
  });

  it('rejects a method the tree never declares', () => {
    const error = conflictOf(() => select(del(), userApi));
    expect(error.context?.location).toBe('DELETE /');
  });

  it('rejects a qualifier the tree does not have', () => {
    const pattern = sub(query('limit', t.int32()), get(t.arrayOf(User)));
    const error = conflictOf(() => select(pattern, userApi));
    expect(error.context?.location).toBe('GET /');
  });

  it('reports the first failing branch of an alternative pattern', () => {
    const pattern = alt(sub(body(User), post(UserId)), sub('admins', get()));
    const error = conflictOf(() => select(pattern, userApi));
    expect(error.context?.location).toBe('GET /admins');
  });
});

describe('embeds', () => {
  it('distinguishes capture names', () => {
    const tree = sub(capture('id', UserId), get(User));
    expect(embeds(sub(capture('id', UserId), get(User)), tree)).toBe(true);
    expect(embeds(sub(capture('user_id', UserId), get(User)), tree)).toBe(false);
  });
});

describe('applyOver', () => {
  const document = compile(userApi);

  it('rewrites only the selected operations', () => {
    const out = applyOver(select(byId, userApi), document, (operation) => ({
      ...operation,
      summary: 'Fetch one user',
    }));

    expect(out.paths['/{user_id}']?.get?.summary).toBe('Fetch one user');
    expect(out.paths['/']).toBe(document.paths['/']);
    expect(document.paths['/{user_id}']?.get?.summary).toBeUndefined();
  });

  it('passes each identity to the transform once', () => {
    const transform = vi.fn((operation: Operation) => operation);
    const identity: OperationIdentity = { path: '/', method: 'post' };
    applyOver([identity, identity], document, transform);

    expect(transform).toHaveBeenCalledTimes(1);
    expect(transform).toHaveBeenCalledWith(document.paths['/']?.post, identity);
  });

  it('fails before transforming when an identity is missing', () => {
    const transform = vi.fn((operation: Operation) => operation);
    const error = conflictOf(() =>
      applyOver(
        [
          { path: '/', method: 'get' },
          { path: '/admins', method: 'get' },
        ],
        document,
        transform
      )
    );

    expect(error.errorCode).toBe(ErrorCode.SELECTION_NOT_IN_DOCUMENT);
    expect(error.message).toBe('Selected operation GET /admins is not in the document');
    expect(error.context).toMatchObject({ path: '/admins', method: 'get' });
    expect(transform).not.toHaveBeenCalled();
  });

  it('returns an equal document for an empty selection', () => {
    expect(applyOver([], document, () => ({ responses: {} }))).toEqual(document);
  });
});
