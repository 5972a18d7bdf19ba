/**
 * Deck or collection target for a run.
 *
 * A URL from the command line or the environment is final. A prompted URL
 * is asked again when it does not parse, up to MAX_URL_PROMPTS times.
 */

import { parseTargetUrl, type Target } from '../auth/target_url';
import type { Settings } from '../config/settings';
import { collectionUrl } from '../discovery';
import { NavigationError } from '../errors';
import { promptTargetUrl, type Prompter } from './prompts';

/** Prompted URLs tried before giving up */
export const MAX_URL_PROMPTS = 3;

export interface ResolvedTarget {
  target: Target;
  /** True when the user typed the URL, so it may be asked for again */
  prompted: boolean;
}

type TargetSettings = Pick<Settings, 'host' | 'defaultBagId' | 'defaultTargetUrl'>;

export async function promptForTarget(prompter: Prompter, settings: TargetSettings): Promise<Target> {
  for (let attempt = 1; ; attempt++) {
    try {
      return parseTargetUrl(await promptTargetUrl(prompter), settings.host, settings.defaultBagId);
    } catch (error) {
      if (!(error instanceof NavigationError) || attempt >= MAX_URL_PROMPTS) {
        throw error;
      }
      console.error(`${error.message}\n`);
    }
  }
}

export async function resolveTarget(
  url: string | undefined,
  settings: TargetSettings,
  prompter: Prompter
): Promise<ResolvedTarget> {
  const given = url ?? settings.defaultTargetUrl;
  if (given !== undefined) {
    return { target: parseTargetUrl(given, settings.host, settings.defaultBagId), prompted: false };
  }
  return { target: await promptForTarget(prompter, settings), prompted: true };
}

/** Page loaded after login to check the target */
export function targetPageUrl(target: Target): string {
  return target.kind === 'deck' ? target.detailsUrl : collectionUrl(target.host, target.collectionId);
}
