#!/usr/bin/env node

import { Command } from 'commander';
import { config } from './config';
import { LibraryCatalog } from './lib/library-catalog';
import { groupByBranch } from './functions/findBranch';
import { LibraryPortal } from './portal/controller';
import { ReadlinePrompter, consoleOutput } from './portal/prompter';
import { parseMenuChoice, parseNeedNames, parseYear, requireText } from './portal/input';
import { formatBranchInfo, formatNearbyBranches, formatYearlySummary } from './portal/formatters';
import { NotFoundError, isOperationalError } from './utils/errors';
import { logger } from './utils/logger';
import type { NearbyOptions } from './types';

function report(error: unknown): void {
  if (isOperationalError(error)) {
    console.error(`Error: ${error.message}`);
    return;
  }
  logger.error('Portal failed', { error });
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
}

async function runMenu(): Promise<void> {
  const catalog = LibraryCatalog.load(config);
  const prompter = new ReadlinePrompter();
  try {
    await new LibraryPortal(catalog, prompter, consoleOutput, {
      displayLimit: config.locator.displayLimit,
    }).run();
  } finally {
    prompter.close();
    logger.debug('Result cache usage', catalog.cacheStats());
  }
}

const program = new Command();

program
  .name('opl-portal')
  .description('Ontario Public Library System Portal: branch search, library locator and yearly archives')
  .version('1.0.0');

program
  .command('menu', { isDefault: true })
  .description('Open the interactive portal')
  .action(runMenu);

program
  .command('branch')
  .description('Look up a library branch by name or code')
  .argument('<query>', 'Library name (or part of it) or library number, e.g. L0353')
  .action((query: string) => {
    const catalog = LibraryCatalog.load(config);
    const histories = groupByBranch(catalog.findBranch(requireText(query, 'library branch name or code')));
    if (histories.length === 0) {
      throw new NotFoundError(`No library branch matches "${query}"`);
    }
    histories.forEach((history, index) => {
      if (index > 0) console.log('');
      formatBranchInfo(history).forEach(line => console.log(line));
    });
  });

program
  .command('nearby')
  .description('Find library branches near a postal code')
  .argument('<postalCode>', 'Ontario postal code, e.g. K1P1J1')
  .option('-n, --need <need...>', 'Required needs: has_french_resources, has_electronic_resources, has_print_resources, has_website')
  .option('-l, --limit <number>', 'Number of branches to list', String(config.locator.displayLimit))
  .action((postalCode: string, options: NearbyOptions) => {
    const limit = parseMenuChoice(options.limit ?? String(config.locator.displayLimit), 1000);
    const needs = parseNeedNames(options.need ?? []);
    const catalog = LibraryCatalog.load(config);
    const results = catalog.searchNearby(postalCode, needs);

    if (results.length === 0) {
      console.log('Sorry! Could not find any libraries nearby.');
      return;
    }
    console.log(`Found ${results.length} libraries, nearest first:`);
    formatNearbyBranches(results, limit).forEach(line => console.log(line));
  });

program
  .command('archive')
  .description('Show yearly statistics of the library system')
  .argument('<year>', 'Archive year, e.g. 2018')
  .action((year: string) => {
    const catalog = LibraryCatalog.load(config);
    formatYearlySummary(catalog.summarize(parseYear(year))).forEach(line => console.log(line));
  });

program.parseAsync(process.argv).catch(report);
