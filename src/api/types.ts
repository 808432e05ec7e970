/**
 * Types for the endpoint operations
 */

import type { MediaWikiTransport } from '../client/transport.js';
import type { BatchOptions } from '../client/batch.js';

/** MediaWiki namespace identifiers used by the client */
export const Namespace = {
  MAIN: 0,
  TEMPLATE: 10,
  CATEGORY: 14,
} as const;

export type Namespace = (typeof Namespace)[keyof typeof Namespace];

/** Direction of page links */
export type LinkDirection = 'incoming' | 'outgoing';

/** Options shared by every network operation */
export interface ApiOptions {
  /** Wiki language code (default: 'en') */
  lang?: string;
  /** Transport to use; a default one is built per call when omitted */
  transport?: MediaWikiTransport;
}

/** Options of operations that fan out over many titles */
export interface BatchApiOptions extends ApiOptions, Omit<BatchOptions, 'logger'> {}

/** A Wikipedia article */
export interface Article {
  /** Canonical title, which may differ from the requested one */
  title: string;
  /** Plaintext extract, possibly empty */
  text: string;
  pageId: number;
  lang: string;
  /** Heuristic: the extract looks cut short (informational only) */
  possiblyTruncated: boolean;
  /** Wikitext size in bytes as reported by `prop=info` */
  wikitextLength?: number;
}

/** Result of a multi-article fetch */
export interface ArticleBatch {
  /** Fetched articles in completion order */
  articles: Article[];
  /** Requested titles that do not exist */
  missing: string[];
}

/** A member of a category */
export interface CategoryMember {
  pageId: number;
  ns: number;
  title: string;
}

/** A link to or from a page */
export interface WikiLink {
  pageId: number;
  ns: number;
  title: string;
}

/** Requested title -> final redirect destination, or null for non-redirects */
export type RedirectMap = Map<string, string | null>;
