/**
 * Resolve the transport and language of an operation call
 */

import { MediaWikiTransport } from '../client/transport.js';
import { DEFAULT_LANG } from '../lib/constants.js';
import type { ApiOptions } from './types.js';

export interface CallContext {
  transport: MediaWikiTransport;
  lang: string;
}

export function resolveContext(options: ApiOptions = {}): CallContext {
  return {
    transport: options.transport ?? new MediaWikiTransport(),
    lang: options.lang ?? DEFAULT_LANG,
  };
}
