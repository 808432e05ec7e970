/**
 * Category members and page categories
 */

import { createLogger } from '../lib/logger.js';
import { CATEGORY_PREFIX } from '../lib/constants.js';
import { ValidationError } from '../lib/errors.js';
import { collectPages } from '../client/paginate.js';
import { listPages, requireQuery, type ApiResponse } from '../client/schemas.js';
import type { QueryParams } from '../client/transport.js';
import { resolveContext } from './context.js';
import { Namespace, type ApiOptions, type CategoryMember } from './types.js';

const getLog = () => createLogger('api:category');

/**
 * Ensure a category title carries the `Category:` prefix
 *
 * Idempotent: already-prefixed names pass through unchanged.
 */
export function normalizeCategory(category: string): string {
  return category.startsWith(CATEGORY_PREFIX) ? category : `${CATEGORY_PREFIX}${category}`;
}

/**
 * Remove the `Category:` prefix if present
 */
export function stripCategoryPrefix(title: string): string {
  return title.startsWith(CATEGORY_PREFIX) ? title.slice(CATEGORY_PREFIX.length) : title;
}

/**
 * `cmtype` value for a namespace
 *
 * @throws {ValidationError} For namespaces other than main and category
 */
export function cmtypeForNamespace(namespace: number): 'page' | 'subcat' {
  switch (namespace) {
    case Namespace.MAIN:
      return 'page';
    case Namespace.CATEGORY:
      return 'subcat';
    default:
      throw new ValidationError(`Unsupported namespace: ${namespace}`);
  }
}

export function categoryMembersParams(category: string, namespace: number): QueryParams {
  return {
    action: 'query',
    list: 'categorymembers',
    cmtitle: normalizeCategory(category),
    cmtype: cmtypeForNamespace(namespace),
    cmlimit: 'max',
    cmnamespace: String(namespace),
  };
}

export function parseCategoryMembers(body: ApiResponse): CategoryMember[] {
  const query = requireQuery(body, 'category members');
  return (query.categorymembers ?? []).map((member) => ({
    pageId: member.pageid ?? 0,
    ns: member.ns,
    title: member.title,
  }));
}

export interface CategoryMembersOptions extends ApiOptions {
  /** Namespace of the members to list (default: category, i.e. subcategories) */
  namespace?: number;
}

/**
 * List the pages or subcategories of a category
 *
 * @throws {ValidationError} For an unsupported namespace, before any request
 */
export async function getCategoryMembers(
  category: string,
  options: CategoryMembersOptions = {}
): Promise<CategoryMember[]> {
  const namespace = options.namespace ?? Namespace.CATEGORY;
  const params = categoryMembersParams(category, namespace);
  const { transport, lang } = resolveContext(options);

  getLog().info(`Retrieving ${params['cmtype']}s`, { category: params['cmtitle'], lang });

  return collectPages({
    transport,
    params,
    lang,
    continueKey: 'cmcontinue',
    parse: parseCategoryMembers,
  });
}

// ── Page categories ──────────────────────────────────────────────────────────

export function pageCategoriesParams(page: string, hidden: boolean): QueryParams {
  const params: QueryParams = {
    action: 'query',
    prop: 'categories',
    titles: page,
    cllimit: 'max',
  };
  if (!hidden) {
    params['clshow'] = '!hidden';
  }
  return params;
}

export function parsePageCategories(body: ApiResponse): string[] {
  const query = requireQuery(body, 'page categories');
  return listPages(query).flatMap((page) => (page.categories ?? []).map((category) => category.title));
}

export interface PageCategoriesOptions extends ApiOptions {
  /** Include hidden maintenance categories (default: false) */
  hidden?: boolean;
}

/**
 * List the categories a page belongs to, with their `Category:` prefix
 */
export async function getPageCategories(
  page: string,
  options: PageCategoriesOptions = {}
): Promise<string[]> {
  const { transport, lang } = resolveContext(options);
  getLog().info('Retrieving categories for page', { page, lang });

  return collectPages({
    transport,
    params: pageCategoriesParams(page, options.hidden ?? false),
    lang,
    continueKey: 'clcontinue',
    parse: parsePageCategories,
  });
}
