// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Per-target transcript storage.
 *
 * One record per identity key under ~/.dbgmate/sessions. Saves replace the
 * record atomically; a corrupt record is reported, never dropped.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Session, SessionInfo, TargetIdentity } from '../types.js';
import { DbgmatePaths, sanitizeKey } from '../paths.js';
import { writeFileAtomically } from '../utils/atomic-write.js';
import { StorageError, getErrorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { decodeSession, encodeSession } from './codec.js';

export interface SessionStore {
  /**
   * The stored transcript, or an empty one when none exists.
   * @throws StorageError when the record cannot be read or decoded
   */
  load(identity: TargetIdentity): Promise<Session>;
  /**
   * Replace the stored transcript for `session.identity`.
   * @throws StorageError when the write fails
   */
  save(session: Session): Promise<void>;
  /** Truncate to an empty transcript. Idempotent. */
  clear(identity: TargetIdentity): Promise<void>;
  /** Summaries of stored transcripts, most recently updated first. */
  list(): Promise<SessionInfo[]>;
}

export function emptySession(identity: TargetIdentity): Session {
  return { identity, turns: [] };
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export function summarizeSession(session: Session): SessionInfo {
  const last = session.turns[session.turns.length - 1];
  return {
    key: session.identity.key,
    executable: session.identity.executable,
    arch: session.identity.arch,
    turnCount: session.turns.length,
    updatedAt: last ? last.timestamp : null,
  };
}

export function byMostRecent(a: SessionInfo, b: SessionInfo): number {
  return (b.updatedAt ?? '').localeCompare(a.updatedAt ?? '') || a.key.localeCompare(b.key);
}

export class FileSessionStore implements SessionStore {
  private readonly dir: string;

  constructor(dir: string = DbgmatePaths.sessions()) {
    this.dir = dir;
  }

  getPath(identity: TargetIdentity): string {
    return path.join(this.dir, `${sanitizeKey(identity.key)}.json`);
  }

  async load(identity: TargetIdentity): Promise<Session> {
    const filePath = this.getPath(identity);
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        logger.debug(`No transcript for ${identity.key}`);
        return emptySession(identity);
      }
      throw new StorageError(`Failed to read ${filePath}: ${getErrorMessage(error)}`, { cause: error });
    }

    const session = decodeSession(text, filePath);
    logger.debug(`Loaded ${session.turns.length} turns for ${identity.key}`);
    return session;
  }

  async save(session: Session): Promise<void> {
    const filePath = this.getPath(session.identity);
    try {
      await writeFileAtomically(filePath, encodeSession(session));
    } catch (error) {
      throw new StorageError(`Failed to write ${filePath}: ${getErrorMessage(error)}`, { cause: error });
    }
    logger.debug(`Saved ${session.turns.length} turns for ${session.identity.key}`);
  }

  async clear(identity: TargetIdentity): Promise<void> {
    await this.save(emptySession(identity));
  }

  async list(): Promise<SessionInfo[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw new StorageError(`Failed to list ${this.dir}: ${getErrorMessage(error)}`, { cause: error });
    }

    const infos: SessionInfo[] = [];
    for (const name of names.filter((n) => n.endsWith('.json'))) {
      const filePath = path.join(this.dir, name);
      try {
        infos.push(summarizeSession(decodeSession(await fs.readFile(filePath, 'utf-8'), filePath)));
      } catch (error) {
        logger.warn(`Skipping ${name}: ${getErrorMessage(error)}`);
      }
    }
    return infos.sort(byMostRecent);
  }
}

