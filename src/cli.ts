#!/usr/bin/env node
/**
 * wikicorpus CLI
 *
 * Harvest Wikipedia articles, categories, links and redirects through the
 * MediaWiki Action API.
 */

import { Command } from 'commander';
import { CLIENT_VERSION } from './lib/constants.js';
import { generateRunId, withRunContext } from './lib/logger.js';
import { articleCommand } from './cli/article.js';
import { categoryCommand } from './cli/category.js';
import { pageCategoriesCommand } from './cli/page-categories.js';
import { linksCommand } from './cli/links.js';
import { templatesCommand } from './cli/templates.js';
import { redirectsCommand, redirectsToCommand } from './cli/redirects.js';
import { headingsCommand } from './cli/headings.js';

// Library logs surface from warn up unless LOG_LEVEL says otherwise
process.env['LOG_LEVEL'] ??= 'warn';

const program = new Command()
  .name('wikicorpus')
  .description('Harvest Wikipedia corpora through the MediaWiki API')
  .version(CLIENT_VERSION);

// Register commands
program.addCommand(articleCommand);
program.addCommand(categoryCommand);
program.addCommand(pageCategoriesCommand);
program.addCommand(linksCommand);
program.addCommand(templatesCommand);
program.addCommand(redirectsCommand);
program.addCommand(redirectsToCommand);
program.addCommand(headingsCommand);

// One run id per invocation, carried by every log line
await withRunContext({ runId: generateRunId() }, () => program.parseAsync(process.argv));
