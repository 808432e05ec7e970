/**
 * CLI Module Exports
 *
 * Re-exports all CLI commands and utilities.
 */

// Commands
export { articleCommand, renderArticles } from './article.js';
export { categoryCommand, renderMembers, renderMatrixSummary, summarizeMatrix } from './category.js';
export { pageCategoriesCommand } from './page-categories.js';
export { linksCommand, renderLinks, parseNamespaces } from './links.js';
export { templatesCommand } from './templates.js';
export { redirectsCommand, redirectsToCommand, renderRedirects } from './redirects.js';
export { headingsCommand, renderHeadingFrequency } from './headings.js';

// Shared plumbing
export { withClientOptions, clientFromOptions, progressReporter, printJson, describeError, runAction } from './shared.js';
export type { GlobalOptions } from './shared.js';

// Utilities
export {
  color,
  supportsColor,
  stripAnsi,
  createProgressBar,
  formatDuration,
  formatNumber,
  formatTable,
  loadConfig,
  fatal,
  warn,
  parseList,
  parsePositiveInt,
  CONFIG_FILE,
} from './utils.js';

export type { ProgressBar, ProgressBarConfig, LoadConfigOptions } from './utils.js';
