/**
 * Tests for continuation-driven pagination
 */

import { describe, it, expect } from 'vitest';
import { collectPages, paginate, toPageResult, type PageResult } from '../../src/client/paginate.js';
import type { ApiResponse } from '../../src/client/schemas.js';
import { HttpStatusError } from '../../src/lib/errors.js';
import { createFetchMock, createTestTransport, jsonResponse, paramsOfCall } from '../helpers.js';

function parseMembers(body: ApiResponse): string[] {
  const members = body.query?.['categorymembers'];
  return Array.isArray(members) ? members.map((member) => String(member.title)) : [];
}

function membersBody(titles: string[], cmcontinue?: string): Record<string, unknown> {
  return {
    ...(cmcontinue ? { continue: { cmcontinue, continue: '-||' } } : { batchcomplete: '' }),
    query: { categorymembers: titles.map((title, i) => ({ pageid: i + 1, ns: 0, title })) },
  };
}

describe('toPageResult', () => {
  it('should read the continuation token for the given key', () => {
    const page = toPageResult(membersBody(['A'], 'page|2'), 'cmcontinue', parseMembers);
    expect(page).toEqual({ items: ['A'], continuation: 'page|2' });
  });

  it('should treat a continue block without the key as the end', () => {
    const body = { continue: { clcontinue: '12|X', continue: '||' }, query: { categorymembers: [] } };
    expect(toPageResult(body, 'cmcontinue', parseMembers)).toEqual({ items: [] });
  });
});

describe('paginate', () => {
  it('should follow continuation tokens until the last page', async () => {
    const fetchMock = createFetchMock((params) => {
      switch (params.get('cmcontinue')) {
        case null:
          return jsonResponse(membersBody(['A', 'B'], 'page|C'));
        case 'page|C':
          return jsonResponse(membersBody(['C', 'D'], 'page|E'));
        default:
          return jsonResponse(membersBody(['E']));
      }
    });
    const transport = createTestTransport(fetchMock);

    const pages: PageResult<string>[] = [];
    for await (const page of paginate({
      transport,
      params: { action: 'query', list: 'categorymembers', cmtitle: 'Category:Letters' },
      lang: 'en',
      continueKey: 'cmcontinue',
      parse: parseMembers,
    })) {
      pages.push(page);
    }

    expect(pages.map((page) => page.items)).toEqual([['A', 'B'], ['C', 'D'], ['E']]);
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(paramsOfCall(fetchMock, 0).has('cmcontinue')).toBe(false);
    expect(paramsOfCall(fetchMock, 1).get('cmcontinue')).toBe('page|C');
    expect(paramsOfCall(fetchMock, 2).get('cmcontinue')).toBe('page|E');
    expect(paramsOfCall(fetchMock, 2).get('cmtitle')).toBe('Category:Letters');
  });

  it('should not mutate the caller params', async () => {
    const fetchMock = createFetchMock((params) =>
      jsonResponse(params.has('cmcontinue') ? membersBody(['B']) : membersBody(['A'], 'next'))
    );
    const params = { action: 'query', list: 'categorymembers' };

    await collectPages({
      transport: createTestTransport(fetchMock),
      params,
      lang: 'en',
      continueKey: 'cmcontinue',
      parse: parseMembers,
    });

    expect(params).toEqual({ action: 'query', list: 'categorymembers' });
  });
});

describe('collectPages', () => {
  it('should make a single request when there is no continuation', async () => {
    const fetchMock = createFetchMock(() => jsonResponse(membersBody(['Only'])));

    const items = await collectPages({
      transport: createTestTransport(fetchMock),
      params: { action: 'query' },
      lang: 'en',
      continueKey: 'cmcontinue',
      parse: parseMembers,
    });

    expect(items).toEqual(['Only']);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should concatenate items in cursor order', async () => {
    const fetchMock = createFetchMock((_params, call) =>
      jsonResponse(call < 4 ? membersBody([`P${call}`], `c${call + 1}`) : membersBody(['P4']))
    );

    const items = await collectPages({
      transport: createTestTransport(fetchMock),
      params: { action: 'query' },
      lang: 'en',
      continueKey: 'cmcontinue',
      parse: parseMembers,
    });

    expect(items).toEqual(['P0', 'P1', 'P2', 'P3', 'P4']);
  });

  it('should surface an error from a later page', async () => {
    const fetchMock = createFetchMock((_params, call) =>
      call === 0 ? jsonResponse(membersBody(['A'], 'next')) : new Response('', { status: 500, statusText: 'Internal Server Error' })
    );

    await expect(
      collectPages({
        transport: createTestTransport(fetchMock),
        params: { action: 'query' },
        lang: 'en',
        continueKey: 'cmcontinue',
        parse: parseMembers,
      })
    ).rejects.toThrow(HttpStatusError);
  });
});
