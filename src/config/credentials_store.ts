/**
 * Saved login credentials.
 *
 * The file is cleartext JSON of the shape `{ email, password, base_host }`.
 * It is read on startup, written once a login has been validated, and
 * cleared when the site rejects the stored credentials. A navigation error
 * never touches it.
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { errorMessage } from '../errors';
import { getLogger } from '../logging/logger';

const logger = getLogger('credentials');

const StoredFileSchema = z.object({
  email: z.string().min(1),
  password: z.string().min(1),
  base_host: z.string().optional(),
});

export interface Credentials {
  email: string;
  password: string;
  /** Host the credentials were last validated against */
  baseHost?: string;
}

export class CredentialsStore {
  constructor(readonly filePath: string) {}

  /**
   * Returns null when the file is missing, unreadable or incomplete.
   */
  async load(): Promise<Credentials | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      logger.warn('Could not read credentials file', { path: this.filePath, error: errorMessage(error) });
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logger.warn('Credentials file is not valid JSON', { path: this.filePath, error: errorMessage(error) });
      return null;
    }

    const parsed = StoredFileSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn('Credentials file is incomplete', { path: this.filePath });
      return null;
    }

    return {
      email: parsed.data.email,
      password: parsed.data.password,
      baseHost: parsed.data.base_host,
    };
  }

  async save(credentials: Credentials): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const body = {
      email: credentials.email,
      password: credentials.password,
      base_host: credentials.baseHost,
    };
    await writeFile(this.filePath, JSON.stringify(body, null, 2), { encoding: 'utf8', mode: 0o600 });
    logger.info('Credentials saved', { path: this.filePath, email: credentials.email });
  }

  async clear(): Promise<void> {
    await rm(this.filePath, { force: true });
    logger.info('Saved credentials cleared', { path: this.filePath });
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
