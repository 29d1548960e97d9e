/**
 * src/portal/controller.ts
 *
 * Menu-driven portal modelled as a finite-state machine. Each state handler
 * prompts, calls the catalog and returns the next state; operational errors
 * are printed and the same prompt is asked again.
 */

import { LibraryCatalog } from '../lib/library-catalog';
import { groupByBranch } from '../functions/findBranch';
import { isOperationalError, MalformedInputError, NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import {
  parseMenuChoice,
  parseNeedSelection,
  parsePostalCode,
  parseYear,
  requireText,
} from './input';
import {
  formatBranchChoices,
  formatBranchInfo,
  formatNearbyBranches,
  formatNeedsMenu,
  formatYearlySummary,
} from './formatters';
import type { OutputSink, Prompter } from './prompter';
import type { BranchHistory, BranchRecord, NearbyBranch } from '../types';

export type PortalState =
  | { kind: 'MainMenu' }
  | { kind: 'BranchSearch' }
  | { kind: 'LocatorSearch' }
  | { kind: 'LocatorResults'; results: readonly NearbyBranch[] }
  | { kind: 'ArchiveView' }
  | { kind: 'Exit' };

const MAIN_MENU: PortalState = { kind: 'MainMenu' };
const BRANCH_SEARCH: PortalState = { kind: 'BranchSearch' };
const LOCATOR_SEARCH: PortalState = { kind: 'LocatorSearch' };
const ARCHIVE_VIEW: PortalState = { kind: 'ArchiveView' };
const EXIT: PortalState = { kind: 'Exit' };

export interface LibraryPortalOptions {
  displayLimit: number;
}

export class LibraryPortal {
  constructor(
    private readonly catalog: LibraryCatalog,
    private readonly prompter: Prompter,
    private readonly output: OutputSink,
    private readonly options: LibraryPortalOptions
  ) {}

  async run(initial: PortalState = MAIN_MENU): Promise<void> {
    let state = initial;
    while (state.kind !== 'Exit') {
      logger.debug('Portal state', { state: state.kind });
      state = await this.step(state);
    }
    this.print('', 'Thank you for using the Ontario Public Library System Portal!');
  }

  step(state: PortalState): Promise<PortalState> {
    switch (state.kind) {
      case 'MainMenu':
        return this.mainMenu();
      case 'BranchSearch':
        return this.branchSearch();
      case 'LocatorSearch':
        return this.locatorSearch();
      case 'LocatorResults':
        return this.locatorResults(state);
      case 'ArchiveView':
        return this.archiveView();
      case 'Exit':
        return Promise.resolve(EXIT);
    }
  }

  private print(...lines: string[]): void {
    for (const line of lines) {
      this.output.print(line);
    }
  }

  /**
   * Asks until `parse` accepts the answer. Resolves null when input ends.
   * Errors that are not operational propagate to the caller.
   */
  private async promptUntil<T>(question: string, parse: (answer: string) => T): Promise<T | null> {
    for (;;) {
      const answer = await this.prompter.ask(question);
      if (answer === null) return null;
      try {
        return parse(answer);
      } catch (err) {
        if (!isOperationalError(err)) throw err;
        logger.debug('Input rejected', { kind: err.kind, answer });
        this.print(err.message);
      }
    }
  }

  private async nextAction(repeat: PortalState): Promise<PortalState> {
    const next = await this.promptUntil('\nEnter [m] to go to the Main Menu\nEnter [b] to go back: ', raw => {
      const choice = raw.trim().toLowerCase();
      if (choice === 'm') return MAIN_MENU;
      if (choice === 'b') return repeat;
      throw new MalformedInputError('Invalid input. Please enter again.');
    });
    return next ?? EXIT;
  }

  private async mainMenu(): Promise<PortalState> {
    this.print(
      '',
      '==========| MAIN MENU |==========',
      '',
      '1. Branch Information Search',
      '2. Library Locator',
      '3. Access Yearly Archives',
      '4. Quit'
    );

    const choice = await this.promptUntil('\nPlease select an option: ', raw => parseMenuChoice(raw, 4));
    switch (choice) {
      case 1:
        return BRANCH_SEARCH;
      case 2:
        return LOCATOR_SEARCH;
      case 3:
        return ARCHIVE_VIEW;
      default:
        return EXIT;
    }
  }

  private showBranch(history: BranchHistory): void {
    this.print('', ...formatBranchInfo(history));
  }

  private historyOf(record: BranchRecord): BranchHistory {
    const [history] = groupByBranch(this.catalog.findBranch(record.code));
    return history ?? { code: record.code, latest: record, records: [record] };
  }

  private async branchSearch(): Promise<PortalState> {
    this.print('', '==========| BRANCH INFORMATION SEARCH |==========', '');

    const matches = await this.promptUntil(
      'Please enter a library branch name or code (e.g. "Toronto" or "L0353"): ',
      raw => {
        const query = requireText(raw, 'library branch name or code');
        const histories = groupByBranch(this.catalog.findBranch(query));
        if (histories.length === 0) {
          throw new NotFoundError(`No library branch matches "${query}". Please enter again.`);
        }
        return histories;
      }
    );
    if (matches === null) return EXIT;

    let chosen = matches[0];
    if (matches.length > 1) {
      this.print('', `Found ${matches.length} library branches:`, ...formatBranchChoices(matches));
      const pick = await this.promptUntil('\nSelect a number to view its branch information: ', raw =>
        parseMenuChoice(raw, matches.length)
      );
      if (pick === null) return EXIT;
      chosen = matches[pick - 1];
    }

    this.showBranch(chosen);
    return this.nextAction(BRANCH_SEARCH);
  }

  private async locatorSearch(): Promise<PortalState> {
    this.print('', '==========| LIBRARY LOCATOR |==========', '');

    const postalCode = await this.promptUntil('Please enter a postal code (K1A1A1): ', raw => {
      const code = parsePostalCode(raw);
      this.catalog.locate(code);
      return code;
    });
    if (postalCode === null) return EXIT;

    this.print('', 'What are you looking for today?', ...formatNeedsMenu());
    const needs = await this.promptUntil(
      '\nSelect any needs by number, separated by commas (press Enter for none): ',
      parseNeedSelection
    );
    if (needs === null) return EXIT;

    const results = this.catalog.searchNearby(postalCode, needs);
    if (results.length === 0) {
      this.print('', 'Sorry! Could not find any libraries nearby.');
      return this.nextAction(LOCATOR_SEARCH);
    }
    return { kind: 'LocatorResults', results };
  }

  private async locatorResults(state: Extract<PortalState, { kind: 'LocatorResults' }>): Promise<PortalState> {
    const { results } = state;
    const shown = Math.min(this.options.displayLimit, results.length);

    this.print(
      '',
      'Here is a list of libraries we found for you:',
      ...formatNearbyBranches(results, this.options.displayLimit)
    );

    const pick = await this.promptUntil('\nSelect a number to view its branch information: ', raw =>
      parseMenuChoice(raw, shown)
    );
    if (pick === null) return EXIT;

    this.showBranch(this.historyOf(results[pick - 1].record));
    return this.nextAction(state);
  }

  private async archiveView(): Promise<PortalState> {
    this.print('', '==========| ACCESS LIBRARY ARCHIVES |==========', '');

    const years = this.catalog.supportedYears;
    const summary = await this.promptUntil(
      `Please enter a year between ${years[0]} and ${years[years.length - 1]}: `,
      raw => this.catalog.summarize(parseYear(raw))
    );
    if (summary === null) return EXIT;

    this.print('', ...formatYearlySummary(summary));
    return this.nextAction(ARCHIVE_VIEW);
  }
}
