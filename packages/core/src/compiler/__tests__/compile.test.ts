import { describe, it, expect, vi } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import {
  body,
  capture,
  captureAll,
  del,
  description,
  get,
  header,
  post,
  put,
  query,
  queryFlag,
  queryList,
  security,
  sub,
  summary,
  alt,
} from '../../route/builders.js';
import * as t from '../../schema/types.js';
import { RouteTreeError } from '../../types/errors.js';
import { serializeDocument } from '../../serialize/document-json.js';
import { compile, compileDetailed } from '../compile.js';
import {
  User,
  UserId,
  prefixedUserApi,
  userApi,
} from '../../../test/fixtures/user-api.js';

const JSON_UTF8 = 'application/json;charset=utf-8';

const int64Schema = {
  type: 'integer',
  format: 'int64',
  minimum: -9223372036854775808n,
  maximum: 9223372036854775807n,
};

const userRef = { $ref: '#/components/schemas/User' };

describe('compile', () => {
  it('compiles the user service', () => {
    expect(compile(userApi)).toEqual({
      openapi: '3.0.0',
      info: { title: '', version: '' },
      paths: {
        '/': {
          get: {
            responses: {
              '200': {
                description: '',
                content: {
                  [JSON_UTF8]: { schema: { type: 'array', items: userRef } },
                },
              },
            },
          },
          post: {
            requestBody: { content: { [JSON_UTF8]: { schema: userRef } } },
            responses: {
              '200': {
                description: '',
                content: {
                  [JSON_UTF8]: {
                    schema: { $ref: '#/components/schemas/UserId' },
                  },
                },
              },
              '400': { description: 'Invalid `body`' },
            },
          },
        },
        '/{user_id}': {
          get: {
            parameters: [
              {
                name: 'user_id',
                in: 'path',
                required: true,
                schema: int64Schema,
              },
            ],
            responses: {
              '200': {
                description: '',
                content: { [JSON_UTF8]: { schema: userRef } },
              },
              '404': { description: '`user_id` not found' },
            },
          },
        },
      },
      components: {
        schemas: {
          User: {
            type: 'object',
            properties: { name: { type: 'string' }, age: int64Schema },
            required: ['name', 'age'],
          },
          UserId: int64Schema,
        },
      },
    });
  });

  it('prefixes every path of a nested tree', () => {
    const document = compile(prefixedUserApi);
    expect(Object.keys(document.paths)).toEqual(['/users', '/users/{user_id}']);
    expect(Object.keys(document.paths['/users'] ?? {})).toEqual(['get', 'post']);
  });

  it('reports operations, schemas and merges in its metrics', () => {
    const { metrics, diagnostics, registry } = compileDetailed(userApi);
    expect(metrics.operations).toBe(3);
    expect(metrics.schemas).toBe(2);
    expect(metrics.mergedOperations).toBe(0);
    expect(diagnostics).toEqual([]);
    expect(registry.has('UserId')).toBe(true);
  });

  it('keeps 64-bit bounds as bigint until serialized', () => {
    const document = compile(get(t.object('Account', { balance: t.int() })));
    expect(document.components.schemas).toMatchObject({
      Account: { properties: { balance: { minimum: -9223372036854775808n } } },
    });
    expect(() => JSON.stringify(document)).toThrow(TypeError);
    expect(serializeDocument(document, { space: 0 })).toContain(
      '"balance":{"type":"integer","minimum":-9223372036854775808,"maximum":9223372036854775807}'
    );
  });

  it('compiles an empty path to /', () => {
    expect(Object.keys(compile(get()).paths)).toEqual(['/']);
  });
});

describe('qualifier stacking', () => {
  it('turns headers and query strings into parameters in declaration order', () => {
    const tree = sub(
      'search',
      header('X-Trace', t.string({ format: 'uuid' }), { required: true }),
      query('q', t.string(), { required: true }),
      queryList('tag', t.string()),
      queryFlag('verbose', t.boolean()),
      get(t.arrayOf(t.string()))
    );
    const operation = compile(tree).paths['/search']?.get;
    expect(operation?.parameters).toEqual([
      {
        name: 'X-Trace',
        in: 'header',
        required: true,
        schema: { type: 'string', format: 'uuid' },
      },
      { name: 'q', in: 'query', required: true, schema: { type: 'string' } },
      {
        name: 'tag',
        in: 'query',
        required: false,
        schema: { type: 'array', items: { type: 'string' } },
      },
      {
        name: 'verbose',
        in: 'query',
        required: false,
        allowEmptyValue: true,
        schema: { type: 'boolean' },
      },
    ]);
    expect(operation?.responses['400']).toEqual({
      description: 'Invalid `tag` or `q` or `X-Trace`',
    });
    expect(operation?.responses['404']).toBeUndefined();
  });

  it('names nested captures innermost first', () => {
    const tree = sub(
      'users',
      capture('user_id', UserId),
      'posts',
      capture('post_id', t.int32()),
      query('a', t.int32()),
      body(t.string()),
      put()
    );
    const responses = compile(tree).paths['/users/{user_id}/posts/{post_id}']?.put
      ?.responses;
    expect(responses?.['400']).toEqual({
      description: 'Invalid `body` or `a` or `post_id` or `user_id`',
    });
    expect(responses?.['404']).toEqual({
      description: '`post_id` or `user_id` not found',
    });
  });

  it('keeps qualifiers out of sibling alternatives', () => {
    const document = compile(alt(sub(query('a', t.int32()), get()), post()));
    expect(document.paths['/']?.get?.parameters).toEqual([
      {
        name: 'a',
        in: 'query',
        required: false,
        schema: {
          type: 'integer',
          format: 'int32',
          minimum: -2147483648,
          maximum: 2147483647,
        },
      },
    ]);
    expect(document.paths['/']?.get?.responses['400']).toEqual({
      description: 'Invalid `a`',
    });
    expect(document.paths['/']?.post).toEqual({
      responses: { '200': { description: '' } },
    });
  });

  it('captures every remaining segment as an array', () => {
    const tree = sub('files', captureAll('path', t.string()), get(t.string()));
    const document = compile(tree);
    expect(document.paths['/files/{path}']?.get?.parameters).toEqual([
      {
        name: 'path',
        in: 'path',
        required: true,
        schema: { type: 'array', items: { type: 'string' } },
      },
    ]);
    expect(document.paths['/files/{path}']?.get?.responses['404']).toEqual({
      description: '`path` not found',
    });
  });

  it('infers nothing for lenient parameters', () => {
    const tree = sub(
      capture('id', t.int32(), { lenient: true }),
      query('q', t.string(), { lenient: true }),
      body(t.string(), { lenient: true }),
      put()
    );
    expect(compile(tree).paths['/{id}']?.put?.responses).toEqual({
      '200': { description: '' },
    });
  });

  it('keeps parameter descriptions', () => {
    const tree = sub(
      capture('id', UserId, { description: 'User to fetch' }),
      get(User)
    );
    expect(compile(tree).paths['/{id}']?.get?.parameters?.[0]).toEqual({
      name: 'id',
      in: 'path',
      required: true,
      description: 'User to fetch',
      schema: int64Schema,
    });
  });

  it('applies security requirements and registers their schemes', () => {
    const bearer = { type: 'http', scheme: 'bearer' } as const;
    const tree = sub(security('bearer', bearer, ['read']), 'me', get(User));
    const document = compile(tree);
    expect(document.paths['/me']?.get?.security).toEqual([
      { bearer: ['read'] },
    ]);
    expect(document.components.securitySchemes).toEqual({ bearer });
  });

  it('takes summary and description from qualifiers unless the endpoint sets them', () => {
    const tree = alt(
      sub('a', summary('List'), description('All of them'), get()),
      sub('b', summary('List'), get(undefined, { summary: 'Override' }))
    );
    const document = compile(tree);
    expect(document.paths['/a']?.get).toMatchObject({
      summary: 'List',
      description: 'All of them',
    });
    expect(document.paths['/b']?.get?.summary).toBe('Override');
  });

  it('uses explicit content types for bodies', () => {
    const tree = sub(
      body(User, { contentTypes: ['application/json', 'application/xml'] }),
      post()
    );
    expect(compile(tree).paths['/']?.post?.requestBody).toEqual({
      content: {
        'application/json': { schema: userRef },
        'application/xml': { schema: userRef },
      },
    });
  });

  it('rejects a second request body on one route', () => {
    const tree = sub(body(User), body(User), post());
    expect(() => compile(tree)).toThrow(RouteTreeError);
    expect(() => compile(tree)).toThrow(
      'Route declares more than one request body (Body :: User)'
    );
  });
});

describe('responses', () => {
  it('lets explicit responses replace inferred ones', () => {
    const onDiagnostic = vi.fn();
    const tree = sub(
      capture('id', UserId),
      get(User, { responses: { 404: { description: 'No such user' } } })
    );
    const { document, diagnostics } = compileDetailed(tree, { onDiagnostic });
    expect(document.paths['/{id}']?.get?.responses['404']).toEqual({
      description: 'No such user',
    });
    expect(diagnostics).toEqual([
      {
        code: 'INFERRED_RESPONSE_SUPERSEDED',
        phase: 'compile',
        location: 'GET /{id}',
        details: { status: '404', inferred: '`id` not found' },
      },
    ]);
    expect(onDiagnostic).toHaveBeenCalledTimes(1);
  });

  it('builds status, headers and bodies of declared responses', () => {
    const tree = post(undefined, {
      status: 201,
      responseHeaders: [
        { name: 'Location', type: t.string(), description: 'New resource' },
      ],
      responses: {
        409: { description: 'Already exists', type: User },
      },
    });
    expect(compile(tree).paths['/']?.post?.responses).toEqual({
      '201': {
        description: '',
        headers: {
          Location: { schema: { type: 'string' }, description: 'New resource' },
        },
      },
      '409': {
        description: 'Already exists',
        content: { [JSON_UTF8]: { schema: userRef } },
      },
    });
  });

  it('copies operation metadata from the endpoint', () => {
    const tree = del(undefined, {
      status: 204,
      operationId: 'purge',
      tags: ['admin', 'admin'],
      deprecated: true,
    });
    expect(compile(tree).paths['/']?.delete).toEqual({
      operationId: 'purge',
      tags: ['admin'],
      deprecated: true,
      responses: { '204': { description: '' } },
    });
  });
});

describe('compile options', () => {
  it('fills info, servers and tags', () => {
    const document = compile(get(), {
      info: { title: 'Users', version: '1.0.0' },
      servers: [{ url: 'https://api.example.test' }],
      tags: [{ name: 'users', description: 'User management' }],
    });
    expect(document.info).toEqual({ title: 'Users', version: '1.0.0' });
    expect(document.servers).toEqual([{ url: 'https://api.example.test' }]);
    expect(document.tags).toEqual([
      { name: 'users', description: 'User management' },
    ]);
  });

  it('omits empty servers, tags and security schemes', () => {
    const document = compile(get());
    expect('servers' in document).toBe(false);
    expect('tags' in document).toBe(false);
    expect(document.components).toEqual({ schemas: {} });
  });

  it('can skip inferred error responses', () => {
    const document = compile(userApi, { inferErrorResponses: false });
    expect(Object.keys(document.paths['/']?.post?.responses ?? {})).toEqual([
      '200',
    ]);
    expect(
      Object.keys(document.paths['/{user_id}']?.get?.responses ?? {})
    ).toEqual(['200']);
  });

  it('uses the default content type for bodies without one', () => {
    const document = compile(userApi, {
      defaultContentType: 'application/json',
    });
    expect(document.paths['/']?.post?.requestBody?.content).toEqual({
      'application/json': { schema: userRef },
    });
  });

  it('rejects invalid options before compiling', () => {
    let caught: unknown;
    try {
      compile(get(), { servers: [{ url: '' }] });
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({ errorCode: ErrorCode.CONFIGURATION_ERROR });
  });

  it('disables metrics on request', () => {
    const { metrics } = compileDetailed(userApi, { metrics: false });
    expect(metrics.operations).toBe(0);
  });
});
