import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { fillPath, childContext, readStream, type StreamDefinition } from '../../connectors/base/stream.js';
import { ApiError, ConfigError, DataError } from '../../connectors/base/errors.js';
import type { FetchFn } from '../../connectors/base/types.js';
import { collect } from '../helpers/mock-api.js';

const schema = z.object({ id: z.string() });

function definition(overrides: Partial<StreamDefinition>): StreamDefinition {
  return {
    name: 'things',
    path: '/things',
    recordsPath: '$.items[*]',
    primaryKeys: ['id'],
    schema,
    partitioning: 'none',
    enabled: true,
    ...overrides,
  };
}

describe('fillPath', () => {
  it('fills placeholders from the context', () => {
    expect(fillPath('/organizations/{organizationId}/users', { organizationId: 'org-1' }))
      .toBe('/organizations/org-1/users');
  });

  it('URI-encodes values', () => {
    expect(fillPath('/forms/{formId}/questions', { formId: 'a/b c' })).toBe('/forms/a%2Fb%20c/questions');
  });

  it('raises a ConfigError for a missing key', () => {
    expect(() => fillPath('/forms/{formId}/questions', { organizationId: 'org-1' })).toThrow(ConfigError);
  });

  it('leaves templates without placeholders untouched', () => {
    expect(fillPath('/workspaces', {})).toBe('/workspaces');
  });
});

describe('childContext', () => {
  const link = { stream: 'forms', key: 'id', as: 'formId' };

  it('maps the parent key onto the child context key', () => {
    expect(childContext(link, { id: 'f1', name: 'Survey' })).toEqual({ formId: 'f1' });
  });

  it('stringifies numeric ids', () => {
    expect(childContext(link, { id: 42 })).toEqual({ formId: '42' });
  });

  it('raises a DataError when the parent record lacks the key', () => {
    expect(() => childContext(link, { name: 'Survey' })).toThrow(DataError);
  });
});

describe('readStream', () => {
  it('makes one request for an unpaginated stream', async () => {
    const paths: string[] = [];
    const fetch: FetchFn = async (path) => {
      paths.push(path);
      return [{ id: 'u1' }, { id: 'u2' }];
    };

    const records = await collect(readStream(
      fetch,
      definition({ path: '/organizations/{organizationId}/users', recordsPath: '$[*]' }),
      { organizationId: 'org-1' },
    ));

    expect(records).toEqual([{ id: 'u1' }, { id: 'u2' }]);
    expect(paths).toEqual(['/organizations/org-1/users']);
  });

  it('flattens pages of a paginated stream in order', async () => {
    const bodies = [{ items: [{ id: 'a' }, { id: 'b' }] }, { items: [{ id: 'c' }] }, { items: [] }];
    let idx = 0;
    const fetch: FetchFn = async () => bodies[idx++];

    const records = await collect(readStream(fetch, definition({ pagination: { pageSize: 2 } }), {}));

    expect(records.map(r => r.id)).toEqual(['a', 'b', 'c']);
    expect(idx).toBe(3);
  });

  it('tags API errors with the stream name', async () => {
    const fetch: FetchFn = async () => {
      throw new ApiError({ source: 'Tally', status: 403, statusText: 'Forbidden', url: 'https://api.tally.test/things' });
    };

    const err = await collect(readStream(fetch, definition({}), {})).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ApiError);
    expect(err).toMatchObject({ resource: 'things', status: 403 });
    expect(err).toHaveProperty('message', '[things] Tally API error: 403 Forbidden for https://api.tally.test/things');
  });

  it('tags data errors with the stream name', async () => {
    const fetch: FetchFn = async () => ({ items: 'nope' });

    const err = await collect(readStream(fetch, definition({}), {})).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DataError);
    expect(err).toMatchObject({ resource: 'things' });
    expect(err).toHaveProperty('message', '[things] Expected an array at $.items[*], got string');
  });

  it('leaves other errors untagged', async () => {
    const fetch: FetchFn = async () => {
      throw new Error('socket hang up');
    };

    const err = await collect(readStream(fetch, definition({}), {})).catch((e: unknown) => e);

    expect(err).toHaveProperty('message', 'socket hang up');
  });
});
