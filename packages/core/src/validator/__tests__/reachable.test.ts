import { describe, it, expect } from 'vitest';

import {
  User,
  prefixedUserApi,
  userApi,
} from '../../../test/fixtures/user-api.js';
import { alt, body, capture, del, get, put, sub } from '../../route/builders.js';
import * as t from '../../schema/types.js';
import { reachableTypes } from '../reachable.js';

const summary = (types: ReturnType<typeof reachableTypes>): string[][] =>
  types.map(({ descriptor, firstSeen }) => [descriptor.id, firstSeen]);

describe('reachableTypes', () => {
  it('walks the tree left to right', () => {
    expect(summary(reachableTypes(userApi))).toEqual([
      ['[User]', 'GET / 200'],
      ['User', '/ body'],
      ['UserId', 'POST / 200'],
    ]);
  });

  it('records the full path under prefixes', () => {
    expect(summary(reachableTypes(prefixedUserApi))).toEqual([
      ['[User]', 'GET /users 200'],
      ['User', '/users body'],
      ['UserId', 'POST /users 200'],
    ]);
  });

  it('includes explicit response bodies with their status', () => {
    const Problem = t.object('Problem', { detail: t.string() });
    const tree = sub(
      capture('id', t.int32()),
      alt(
        del(undefined, { status: 204, responses: { 409: { type: Problem } } }),
        sub(body(User), put(User, { status: 201 }))
      )
    );
    expect(summary(reachableTypes(tree))).toEqual([
      ['Problem', 'DELETE /{id} 409'],
      ['User', '/{id} body'],
    ]);
  });

  it('ignores parameter types', () => {
    expect(reachableTypes(sub(capture('id', t.int32()), get()))).toEqual([]);
  });
});
