/**
 * Wire shapes of MediaWiki `action=query` responses
 *
 * Only the fields the client reads are declared; everything else passes
 * through untouched. Responses use the default `formatversion=1`, where
 * `query.pages` is an object keyed by page id ("-1", "-2", ... for missing
 * pages).
 */

import { z } from 'zod';
import { ApiError } from '../lib/errors.js';

/** Error envelope (`{"error": {"code": ..., "info": ...}}`) */
export const ApiErrorBodySchema = z
  .object({
    code: z.string().optional(),
    info: z.string().optional(),
  })
  .passthrough();

/** Top-level response envelope */
export const ApiResponseSchema = z
  .object({
    batchcomplete: z.union([z.string(), z.boolean()]).optional(),
    continue: z.record(z.string(), z.unknown()).optional(),
    error: ApiErrorBodySchema.optional(),
    query: z.record(z.string(), z.unknown()).optional(),
  })
  .passthrough();

export type ApiResponse = z.infer<typeof ApiResponseSchema>;

/** `{ pageid, ns, title }` entries shared by category members and link lists */
export const PageRefSchema = z
  .object({
    pageid: z.number().int().optional(),
    ns: z.number().int(),
    title: z.string(),
  })
  .passthrough();

export type PageRef = z.infer<typeof PageRefSchema>;

/** One entry of `query.pages` */
export const PageSchema = z
  .object({
    pageid: z.number().int().optional(),
    ns: z.number().int().optional(),
    title: z.string().optional(),
    missing: z.unknown().optional(),
    invalid: z.unknown().optional(),
    extract: z.string().optional(),
    length: z.number().int().optional(),
    categories: z.array(PageRefSchema).optional(),
    links: z.array(PageRefSchema).optional(),
    linkshere: z.array(PageRefSchema).optional(),
    redirects: z.array(PageRefSchema).optional(),
    templates: z.array(PageRefSchema).optional(),
  })
  .passthrough();

export type Page = z.infer<typeof PageSchema>;

/** `{ from, to }` entries of `query.redirects` and `query.normalized` */
export const TitleMappingSchema = z
  .object({
    from: z.string(),
    to: z.string(),
  })
  .passthrough();

export type TitleMapping = z.infer<typeof TitleMappingSchema>;

/** The parts of `query` the endpoint parsers read */
export const QuerySchema = z
  .object({
    pages: z.record(z.string(), PageSchema).optional(),
    categorymembers: z.array(PageRefSchema).optional(),
    redirects: z.array(TitleMappingSchema).optional(),
    normalized: z.array(TitleMappingSchema).optional(),
  })
  .passthrough();

export type Query = z.infer<typeof QuerySchema>;

/** Page-level list properties that paginate */
export type PageListKey = 'categories' | 'links' | 'linkshere' | 'redirects' | 'templates';

/**
 * Parse the `query` block of a response
 *
 * A missing block yields an empty query; a malformed one is reported by the
 * caller through the returned Zod error.
 */
export function parseQuery(body: ApiResponse): z.SafeParseReturnType<unknown, Query> {
  return QuerySchema.safeParse(body.query ?? {});
}

/**
 * Parse the `query` block or fail with an `ApiError` of code `malformed_response`
 */
export function requireQuery(body: ApiResponse, context: string): Query {
  const parsed = parseQuery(body);
  if (!parsed.success) {
    const info = `Malformed query block in ${context}: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`;
    throw new ApiError(info, 'malformed_response', info);
  }
  return parsed.data;
}

/**
 * Pages of a response in server order
 */
export function listPages(query: Query): Page[] {
  return Object.values(query.pages ?? {});
}

/**
 * First (and for single-title queries, sole) page of a response
 */
export function firstPage(query: Query): Page | undefined {
  return listPages(query)[0];
}

/**
 * Read a string continuation token from a `continue` block
 */
export function readContinuation(body: ApiResponse, key: string): string | undefined {
  const value = body.continue?.[key];
  if (typeof value === 'string' || typeof value === 'number') {
    return String(value);
  }
  return undefined;
}
