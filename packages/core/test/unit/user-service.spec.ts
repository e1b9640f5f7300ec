import { describe, it, expect } from 'vitest';

import {
  ErrorCode,
  RouteSpecError,
  compileDetailed,
  capture,
  get,
  operationsOf,
  select,
  serializeDocument,
  setResponseFor,
  sub,
  t,
  validateAll,
} from '../../src/index.js';
import { User, UserId, prefixedUserApi } from '../fixtures/user-api.js';

describe('user service end to end', () => {
  const { document, diagnostics } = compileDetailed(prefixedUserApi, {
    info: { title: 'Users', version: '2.1.0' },
    servers: [{ url: 'https://api.test' }],
  });

  it('compiles without diagnostics', () => {
    expect(diagnostics).toEqual([]);
    expect(document.servers).toEqual([{ url: 'https://api.test' }]);
    expect(
      operationsOf(document).map(({ method, path }) => `${method.toUpperCase()} ${path}`)
    ).toEqual(['GET /users', 'POST /users', 'GET /users/{user_id}']);
  });

  it('annotates one operation through a pattern', () => {
    const byId = select(
      sub('users', capture('user_id', UserId), get(User)),
      prefixedUserApi
    );
    const annotated = setResponseFor(byId, 410, { description: 'User was removed' })(
      document
    );
    expect(Object.keys(annotated.paths['/users/{user_id}']?.get?.responses ?? {})).toEqual([
      '200',
      '404',
      '410',
    ]);
    expect(annotated.paths['/users']).toBe(document.paths['/users']);
  });

  it('serializes exact int64 bounds', () => {
    const text = serializeDocument(document, { space: 0 });
    expect(text).toContain(
      '"UserId":{"type":"integer","format":"int64","minimum":-9223372036854775808,"maximum":9223372036854775807}'
    );
  });

  it('validates every body type', () => {
    const report = validateAll(prefixedUserApi, { samplesPerType: 25 });
    expect(report.sections.map((s) => [s.typeId, s.firstSeen])).toEqual([
      ['[User]', 'GET /users 200'],
      ['User', '/users body'],
      ['UserId', 'POST /users 200'],
    ]);
    expect(report.summary.failed).toBe(0);
  });

  it('rejects a pattern for a route the service lacks', () => {
    let caught: unknown;
    try {
      select(sub('users', 'me', get(User)), prefixedUserApi);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(RouteSpecError);
    expect(caught).toMatchObject({
      errorCode: ErrorCode.PATTERN_NOT_EMBEDDABLE,
      context: { location: 'GET /users/me' },
    });
  });

  it('keeps distinct integer widths apart', () => {
    const Small = t.newtype('Small', t.int8());
    const report = validateAll(get(Small), { samplesPerType: 10 });
    expect(report.components).toEqual({
      Small: { type: 'integer', minimum: -128, maximum: 127 },
    });
  });
});
