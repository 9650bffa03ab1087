/**
 * FsSessionStore - Filesystem implementation of SessionStore
 *
 * Keeps every user's session in one JSON file (default ~/.pkgdb_session.json)
 * readable and writable by the owner only.
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { SessionStore } from '../session_store';
import { getRecordEntry, withRecordEntry } from '../session_store';
import { SessionCredential } from '../../session_credential';
import { validateSessionRecord } from '../../schemas';
import type { SessionStoreRecord } from '../../schemas';
import { createLogger } from '../../logger';
import type { Logger } from '../../logger';
import { errorMessage } from '../../errors';

export const DEFAULT_SESSION_FILE = path.join(os.homedir(), '.pkgdb_session.json');

/**
 * Options for FsSessionStore.
 */
export interface FsSessionStoreOptions {
  /** Path of the shared session file (default: ~/.pkgdb_session.json) */
  sessionFile?: string;
  /** File permissions for the session file (default: 0o600 - owner read/write only) */
  fileMode?: number;
  logger?: Logger;
}

type RecordRead =
  | { status: 'missing' }
  | { status: 'unreadable'; reason: string }
  | { status: 'ok'; record: SessionStoreRecord };

/**
 * Filesystem-based SessionStore.
 *
 * Saving is a read-modify-write of the whole record. Concurrent processes
 * sharing the file race and the last writer wins.
 */
export class FsSessionStore implements SessionStore {
  readonly sessionFile: string;
  private readonly fileMode: number;
  private readonly logger: Logger;

  constructor(options: FsSessionStoreOptions = {}) {
    this.sessionFile = options.sessionFile ?? DEFAULT_SESSION_FILE;
    this.fileMode = options.fileMode ?? 0o600;
    this.logger = options.logger ?? createLogger('[SessionStore] ');
  }

  async load(username: string): Promise<SessionCredential | null> {
    const read = await this.readRecord();

    if (read.status === 'missing') {
      return null;
    }
    if (read.status === 'unreadable') {
      this.logger.warn(`Unable to load session from ${this.sessionFile}: ${read.reason}`);
      return null;
    }

    const entry = getRecordEntry(read.record, username);
    if (!entry) {
      this.logger.debug(`No stored session for ${username}`);
      return null;
    }

    const credential = SessionCredential.fromJSON(entry);
    this.logger.debug(`Loaded session for ${username} (cookies: ${credential.cookieNames().join(', ')})`);
    return credential;
  }

  async save(username: string, credential: SessionCredential): Promise<void> {
    const read = await this.readRecord();
    if (read.status === 'unreadable') {
      this.logger.warn(`Replacing unreadable session file ${this.sessionFile}: ${read.reason}`);
    }
    const record = withRecordEntry(read.status === 'ok' ? read.record : {}, username, credential.toJSON());

    try {
      await fs.mkdir(path.dirname(this.sessionFile), { recursive: true });
      await fs.writeFile(this.sessionFile, JSON.stringify(record, null, 2), {
        encoding: 'utf-8',
        mode: this.fileMode,
      });
      // writeFile only applies the mode when it creates the file
      await fs.chmod(this.sessionFile, this.fileMode);
    } catch (error) {
      this.logger.warn(`Unable to write to session file ${this.sessionFile}: ${errorMessage(error)}`);
    }
  }

  private async readRecord(): Promise<RecordRead> {
    let content: string;
    try {
      content = await fs.readFile(this.sessionFile, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return { status: 'missing' };
      }
      return { status: 'unreadable', reason: errorMessage(error) };
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      return { status: 'unreadable', reason: errorMessage(error) };
    }

    const result = validateSessionRecord(data);
    if (!result.valid) {
      return { status: 'unreadable', reason: result.errors.join('; ') };
    }
    return { status: 'ok', record: result.value };
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
