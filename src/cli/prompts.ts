/**
 * Interactive terminal input.
 */

import readline from 'node:readline';
import { Writable } from 'node:stream';
import type { Credentials } from '../config/credentials_store';

export interface Prompter {
  ask(question: string): Promise<string>;
  /** Like ask, without echoing what is typed */
  askSecret(question: string): Promise<string>;
}

export function createTerminalPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  return {
    ask(question) {
      const rl = readline.createInterface({ input, output });
      return new Promise((resolve) => {
        rl.question(question, (answer) => {
          rl.close();
          resolve(answer.trim());
        });
      });
    },

    askSecret(question) {
      let muted = false;
      const sink = new Writable({
        write(chunk: string | Uint8Array, _encoding, callback) {
          if (!muted) {
            output.write(chunk);
          }
          callback();
        },
      });
      const rl = readline.createInterface({ input, output: sink, terminal: true });
      return new Promise((resolve) => {
        rl.question(question, (answer) => {
          rl.close();
          output.write('\n');
          resolve(answer.trim());
        });
        muted = true;
      });
    },
  };
}

export async function promptTargetUrl(prompter: Prompter): Promise<string> {
  let url = '';
  while (!url) {
    url = await prompter.ask('Deck or collection URL: ');
  }
  return url;
}

export async function promptCredentials(prompter: Prompter): Promise<Pick<Credentials, 'email' | 'password'>> {
  let email = '';
  while (!email) {
    email = await prompter.ask('Email: ');
  }
  let password = '';
  while (!password) {
    password = await prompter.askSecret('Password: ');
  }
  return { email, password };
}

/**
 * Ask where to save the package. An empty answer takes the default; a path
 * without the .apkg extension gets one.
 */
export async function promptOutputPath(prompter: Prompter, defaultPath: string): Promise<string> {
  const answer = await prompter.ask(`Save package to [${defaultPath}]: `);
  return withApkgExtension(answer || defaultPath);
}

export function withApkgExtension(path: string): string {
  return path.toLowerCase().endsWith('.apkg') ? path : `${path}.apkg`;
}

/** File name for a deck or collection title */
export function packageFileName(title: string): string {
  const safe = title
    .trim()
    .replace(/[^\w\-. ]+/g, '')
    .replace(/\s+/g, '_');
  return `${safe || 'cards'}.apkg`;
}
