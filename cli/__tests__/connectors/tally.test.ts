import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  TALLY_STREAMS, createTallyClient, resolveOrganizationPartitions, tallyVerifyConnection,
} from '../../connectors/tally.js';
import { ApiError, NoOrganizationError } from '../../connectors/base/errors.js';
import { readStream, type StreamDefinition } from '../../connectors/base/stream.js';
import type { FetchFn } from '../../connectors/base/types.js';
import { mockTallyApi, jsonResponse, collect } from '../helpers/mock-api.js';

const config = { api_key: 'test-secret', base_url: 'https://api.tally.test' };

afterEach(() => {
  vi.unstubAllGlobals();
});

function stream(name: string): StreamDefinition {
  const found = TALLY_STREAMS.find(d => d.name === name);
  if (!found) throw new Error(`no stream ${name}`);
  return found;
}

function tallyFetch(): FetchFn {
  const client = createTallyClient(config);
  return (path, options) => client.request(path, options);
}

describe('TALLY_STREAMS', () => {
  it('lists streams parents-first, with webhooks disabled', () => {
    expect(TALLY_STREAMS.map(d => [d.name, d.enabled])).toEqual([
      ['users', true],
      ['invites', true],
      ['forms', true],
      ['questions', true],
      ['submissions', true],
      ['workspaces', true],
      ['webhooks', false],
    ]);
  });

  it('links questions and submissions to forms by id', () => {
    expect(stream('questions').parent).toEqual({ stream: 'forms', key: 'id', as: 'formId' });
    expect(stream('submissions').parent).toEqual({ stream: 'forms', key: 'id', as: 'formId' });
  });
});

describe('resolveOrganizationPartitions', () => {
  it('returns configured ids verbatim without calling the API', async () => {
    const api = mockTallyApi({});

    const partitions = await resolveOrganizationPartitions(createTallyClient(config), ['org-b', 'org-a', 'org-c']);

    expect(partitions).toEqual([{ organizationId: 'org-b' }, { organizationId: 'org-a' }, { organizationId: 'org-c' }]);
    expect(api.fetch).not.toHaveBeenCalled();
  });

  it('looks up the current user once when no ids are configured', async () => {
    const api = mockTallyApi({
      '/users/me': () => ({ id: 'u1', fullName: 'Test User', organizationId: 'org-me' }),
    });

    const partitions = await resolveOrganizationPartitions(createTallyClient(config), []);

    expect(partitions).toEqual([{ organizationId: 'org-me' }]);
    expect(api.calls()).toEqual(['/users/me']);
    expect(api.fetch).toHaveBeenCalledWith(
      'https://api.tally.test/users/me',
      expect.objectContaining({ headers: expect.objectContaining({ Authorization: 'Bearer test-secret' }) }),
    );
  });

  it('fails when the current user has no organization', async () => {
    mockTallyApi({ '/users/me': () => ({ id: 'u1', organizationId: null }) });

    await expect(resolveOrganizationPartitions(createTallyClient(config), [])).rejects.toThrow(NoOrganizationError);
  });

  it('propagates a non-2xx lookup as an ApiError', async () => {
    mockTallyApi({ '/users/me': () => jsonResponse({ message: 'Unauthorized' }, 401) });

    const err = await resolveOrganizationPartitions(createTallyClient(config), []).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ApiError);
    expect(err).toMatchObject({ status: 401 });
  });
});

describe('stream requests', () => {
  it('users: one unpaginated request per organization', async () => {
    const api = mockTallyApi({
      '/organizations/:organizationId/users': ({ organizationId }) => [{ id: `u-${organizationId}` }],
    });

    const records = await collect(readStream(tallyFetch(), stream('users'), { organizationId: 'org-1' }));

    expect(records).toEqual([{ id: 'u-org-1' }]);
    expect(api.calls()).toEqual(['/organizations/org-1/users']);
  });

  it('invites: one request even when the list is empty', async () => {
    const api = mockTallyApi({ '/organizations/:organizationId/invites': () => [] });

    const records = await collect(readStream(tallyFetch(), stream('invites'), { organizationId: 'org-1' }));

    expect(records).toEqual([]);
    expect(api.calls()).toEqual(['/organizations/org-1/invites']);
  });

  it('forms: limit=500 on every page, page from 2 on', async () => {
    const api = mockTallyApi({
      '/forms': (_p, url) => {
        const page = url.searchParams.get('page') ?? '1';
        return page === '3' ? { items: [] } : { items: [{ id: `f-page${page}` }] };
      },
    });

    const records = await collect(readStream(tallyFetch(), stream('forms'), { organizationId: 'org-1' }));

    expect(records.map(r => r.id)).toEqual(['f-page1', 'f-page2']);
    expect(api.calls()).toEqual(['/forms?limit=500', '/forms?limit=500&page=2', '/forms?limit=500&page=3']);
  });

  it('questions: one request per form', async () => {
    const api = mockTallyApi({
      '/forms/:formId/questions': ({ formId }) => ({ questions: [{ id: 'q1', formId }, { id: 'q2', formId }] }),
    });

    const records = await collect(readStream(tallyFetch(), stream('questions'), { formId: 'f1' }));

    expect(records.map(r => r.id)).toEqual(['q1', 'q2']);
    expect(api.calls()).toEqual(['/forms/f1/questions']);
  });

  it('submissions: filter=all, no page size, paged until empty', async () => {
    const api = mockTallyApi({
      '/forms/:formId/submissions': (_p, url) =>
        url.searchParams.get('page') === null ? { submissions: [{ id: 's1' }] } : { submissions: [] },
    });

    const records = await collect(readStream(tallyFetch(), stream('submissions'), { formId: 'f1' }));

    expect(records.map(r => r.id)).toEqual(['s1']);
    expect(api.calls()).toEqual(['/forms/f1/submissions?filter=all', '/forms/f1/submissions?filter=all&page=2']);
  });

  it('workspaces: page param only', async () => {
    const api = mockTallyApi({ '/workspaces': () => ({ items: [] }) });

    await collect(readStream(tallyFetch(), stream('workspaces'), {}));

    expect(api.calls()).toEqual(['/workspaces']);
  });

  it('webhooks: limit=100', async () => {
    const api = mockTallyApi({ '/webhooks': () => ({ webhooks: [] }) });

    await collect(readStream(tallyFetch(), stream('webhooks'), {}));

    expect(api.calls()).toEqual(['/webhooks?limit=100']);
  });

  it('aborts on an error page and names the stream', async () => {
    mockTallyApi({
      '/forms': (_p, url) =>
        url.searchParams.get('page') === null
          ? { items: [{ id: 'f1' }] }
          : jsonResponse({ message: 'boom' }, 500),
    });

    const seen: string[] = [];
    const err = await (async () => {
      for await (const record of readStream(tallyFetch(), stream('forms'), { organizationId: 'org-1' })) {
        seen.push(String(record.id));
      }
    })().catch((e: unknown) => e);

    expect(seen).toEqual(['f1']);
    expect(err).toBeInstanceOf(ApiError);
    expect(err).toMatchObject({ resource: 'forms', status: 500 });
  });
});

describe('tallyVerifyConnection', () => {
  it('returns user details on success', async () => {
    mockTallyApi({
      '/users/me': () => ({ id: 'u1', fullName: 'Test User', email: 'test@example.com', organizationId: 'org-1' }),
    });

    expect(await tallyVerifyConnection(config)).toEqual({
      success: true,
      userName: 'Test User',
      email: 'test@example.com',
      organizationId: 'org-1',
    });
  });

  it('returns the error on failure', async () => {
    mockTallyApi({ '/users/me': () => jsonResponse({ message: 'Unauthorized' }, 401) });

    const result = await tallyVerifyConnection(config);

    expect(result.success).toBe(false);
    expect(result.error).toContain('401');
  });
});
