/**
 * Incoming and outgoing page links
 */

import { createLogger } from '../lib/logger.js';
import { collectPages } from '../client/paginate.js';
import { firstPage, requireQuery, type ApiResponse } from '../client/schemas.js';
import type { QueryParams } from '../client/transport.js';
import { resolveContext } from './context.js';
import { Namespace, type ApiOptions, type LinkDirection, type WikiLink } from './types.js';

const getLog = () => createLogger('api:links');

export function linksParams(page: string, direction: LinkDirection, namespaces: readonly number[]): QueryParams {
  const ns = namespaces.join('|');
  if (direction === 'incoming') {
    return {
      action: 'query',
      titles: page,
      prop: 'linkshere',
      lhprop: 'pageid|title',
      lhlimit: 'max',
      lhnamespace: ns,
    };
  }
  return {
    action: 'query',
    titles: page,
    prop: 'links',
    plnamespace: ns,
    pllimit: 'max',
  };
}

/** Continuation key for a link direction */
export function linksContinueKey(direction: LinkDirection): 'lhcontinue' | 'plcontinue' {
  return direction === 'incoming' ? 'lhcontinue' : 'plcontinue';
}

export function parseLinks(body: ApiResponse, direction: LinkDirection): WikiLink[] {
  const page = firstPage(requireQuery(body, `${direction} links`));
  const raw = direction === 'incoming' ? page?.linkshere : page?.links;
  return (raw ?? []).map((link) => ({
    pageId: link.pageid ?? 0,
    ns: link.ns,
    title: link.title,
  }));
}

export interface LinksOptions extends ApiOptions {
  /** Default: outgoing */
  direction?: LinkDirection;
  /** Namespaces to keep (default: [0]) */
  namespaces?: readonly number[];
}

/**
 * List the links to or from a page
 */
export async function getLinks(page: string, options: LinksOptions = {}): Promise<WikiLink[]> {
  const direction = options.direction ?? 'outgoing';
  const namespaces = options.namespaces ?? [Namespace.MAIN];
  const { transport, lang } = resolveContext(options);

  getLog().info(`Retrieving ${direction} links`, { page, lang });

  return collectPages({
    transport,
    params: linksParams(page, direction, namespaces),
    lang,
    continueKey: linksContinueKey(direction),
    parse: (body) => parseLinks(body, direction),
  });
}
