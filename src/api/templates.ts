/**
 * Templates transcluded on a page
 */

import { createLogger } from '../lib/logger.js';
import { collectPages } from '../client/paginate.js';
import { firstPage, requireQuery, type ApiResponse } from '../client/schemas.js';
import type { QueryParams } from '../client/transport.js';
import { resolveContext } from './context.js';
import { Namespace, type ApiOptions } from './types.js';

const getLog = () => createLogger('api:templates');

export function templatesParams(page: string): QueryParams {
  return {
    action: 'query',
    prop: 'templates',
    titles: page,
    tlnamespace: String(Namespace.TEMPLATE),
    tllimit: 'max',
  };
}

export function parseTemplates(body: ApiResponse): string[] {
  const page = firstPage(requireQuery(body, 'templates'));
  return (page?.templates ?? []).map((template) => template.title);
}

/**
 * List `Template:` pages transcluded on a page
 */
export async function getTemplates(page: string, options: ApiOptions = {}): Promise<string[]> {
  const { transport, lang } = resolveContext(options);
  getLog().info('Retrieving templates', { page, lang });

  return collectPages({
    transport,
    params: templatesParams(page),
    lang,
    continueKey: 'tlcontinue',
    parse: parseTemplates,
  });
}
