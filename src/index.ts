#!/usr/bin/env node
/**
 * Cards deck exporter
 *
 * Logs in to the cards site, scrapes a deck or a whole collection and writes
 * the cards to an Anki package.
 *
 * Exit codes: 0 on success; 1 when nothing was extracted or login, discovery
 * or the run failed; 2 on a bad URL or bad arguments.
 */

import { join } from 'node:path';
import type { Target } from './auth/target_url';
import { PlaywrightSession } from './browser/playwright_session';
import { parseCliArgs, USAGE, type CliArgs } from './cli/args';
import { establishSession, initialCredentials } from './cli/login_flow';
import {
  createTerminalPrompter,
  packageFileName,
  promptOutputPath,
  withApkgExtension,
  type Prompter,
} from './cli/prompts';
import { promptForTarget, resolveTarget, targetPageUrl } from './cli/target_flow';
import { CredentialsStore } from './config/credentials_store';
import { loadSettings, type Settings } from './config/settings';
import { getKeywordTable, loadKeywordTableFile } from './content/keyword_tables';
import { AuthError, CardsError, DiscoveryError, NavigationError, errorMessage } from './errors';
import { planDecks, type ExportMode } from './export/deck_tree';
import { writePackage } from './export/package_writer';
import type { Card } from './extraction/types';
import { createBrowserFallback } from './fast/browser_fallback';
import { FetchHttpClient } from './fast/http_client';
import { getLogger } from './logging/logger';
import { scrapeCollection } from './scrape/collection_scraper';
import { scrapeDeck, type ScrapeDependencies } from './scrape/deck_scraper';

const logger = getLogger('main');

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_BAD_URL = 2;

interface ScrapeOutcome {
  mode: ExportMode;
  name: string;
  cards: Card[];
}

// ============================================================================
// Steps
// ============================================================================

async function scrapeTarget(deps: ScrapeDependencies, target: Target, limit?: number): Promise<ScrapeOutcome> {
  if (target.kind === 'deck') {
    const title = `Deck ${target.deckId}`;
    const result = await scrapeDeck(
      deps,
      { host: target.host, deckId: target.deckId, bagId: target.bagId, title },
      { limit }
    );
    return { mode: 'single', name: title, cards: result.cards };
  }

  const result = await scrapeCollection(deps, target.collectionId, { limit });
  return {
    mode: 'collection',
    name: result.title,
    cards: result.results.flatMap((deck) => deck.cards),
  };
}

// ============================================================================
// Main
// ============================================================================

export async function main(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  prompter: Prompter = createTerminalPrompter()
): Promise<number> {
  let args: CliArgs;
  let settings: Settings;
  try {
    args = parseCliArgs(argv);
    settings = loadSettings(env);
  } catch (error) {
    console.error(`${errorMessage(error)}\n\n${USAGE}`);
    return EXIT_BAD_URL;
  }

  if (args.help) {
    console.log(USAGE);
    return EXIT_OK;
  }

  let target: Target;
  let prompted: boolean;
  try {
    ({ target, prompted } = await resolveTarget(args.url, settings, prompter));
  } catch (error) {
    console.error(errorMessage(error));
    return EXIT_BAD_URL;
  }

  const keywords = settings.classifierKeywordsPath
    ? await loadKeywordTableFile(settings.classifierKeywordsPath)
    : getKeywordTable();

  const store = new CredentialsStore(settings.configPath);
  const initial = initialCredentials(settings, await store.load(), settings.host);

  const session = await PlaywrightSession.launch({
    headless: settings.headless,
    navigationTimeoutMs: settings.navigationTimeoutMs,
  });

  try {
    const { auth } = await establishSession(session, {
      host: settings.host,
      targetUrl: targetPageUrl(target),
      store,
      prompter,
      initial,
      timeoutMs: settings.navigationTimeoutMs,
      retarget: prompted
        ? async (error) => {
            console.error(`${error.message}\n`);
            target = await promptForTarget(prompter, settings);
            return targetPageUrl(target);
          }
        : undefined,
    });

    const deps: ScrapeDependencies = {
      session,
      http: new FetchHttpClient({ maxConnections: settings.maxConnections, timeoutMs: settings.navigationTimeoutMs }),
      auth,
      host: settings.host,
      fastPath: settings.fastPath && !args.slow,
      fallback: createBrowserFallback({
        host: settings.host,
        headless: settings.headless,
        navigationTimeoutMs: settings.navigationTimeoutMs,
        keywords,
      }),
      concurrency: settings.concurrency,
      waitTimeoutMs: settings.navigationTimeoutMs,
      keywords,
    };

    const outcome = await scrapeTarget(deps, target, args.limit);
    if (outcome.cards.length === 0) {
      console.error('No cards were extracted.');
      return EXIT_FAILURE;
    }

    const outputPath = args.out
      ? withApkgExtension(args.out)
      : await promptOutputPath(prompter, join(process.cwd(), packageFileName(outcome.name)));

    const decks = planDecks({ mode: outcome.mode, name: outcome.name, cards: outcome.cards });
    const summary = await writePackage(decks, outputPath);

    console.log(`Exported ${summary.notes} cards in ${summary.decks} decks to ${summary.path}`);
    return EXIT_OK;
  } catch (error) {
    if (error instanceof NavigationError) {
      console.error(error.message);
      return EXIT_BAD_URL;
    }
    if (error instanceof AuthError || error instanceof DiscoveryError) {
      console.error(error.message);
      return EXIT_FAILURE;
    }
    logger.error('Run failed', {
      error: errorMessage(error),
      code: error instanceof CardsError ? error.code : undefined,
    });
    return EXIT_FAILURE;
  } finally {
    await session.close();
  }
}

if (require.main === module) {
  process.on('SIGINT', () => {
    console.error('\nInterrupted.');
    process.exit(EXIT_FAILURE);
  });

  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.error('Fatal error', { error: errorMessage(error) });
      process.exitCode = EXIT_FAILURE;
    }
  );
}
