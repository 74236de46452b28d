// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import type { Session, SessionInfo, TargetIdentity } from '../../src/types.js';
import { byMostRecent, emptySession, summarizeSession, type SessionStore } from '../../src/session/store.js';
import { decodeSession, encodeSession } from '../../src/session/codec.js';
import { StorageError } from '../../src/errors.js';

/**
 * Session store kept in memory. Records are held encoded, so loads and saves
 * go through the same codec as the file store.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly records = new Map<string, string>();
  saveCount = 0;
  failNextSave: Error | null = null;

  async load(identity: TargetIdentity): Promise<Session> {
    const text = this.records.get(identity.key);
    return text === undefined ? emptySession(identity) : decodeSession(text, identity.key);
  }

  async save(session: Session): Promise<void> {
    this.saveCount++;
    if (this.failNextSave) {
      const error = this.failNextSave;
      this.failNextSave = null;
      throw new StorageError(`Failed to write ${session.identity.key}: ${error.message}`, { cause: error });
    }
    this.records.set(session.identity.key, encodeSession(session));
  }

  async clear(identity: TargetIdentity): Promise<void> {
    this.records.set(identity.key, encodeSession(emptySession(identity)));
  }

  async list(): Promise<SessionInfo[]> {
    return [...this.records.entries()]
      .map(([key, text]) => summarizeSession(decodeSession(text, key)))
      .sort(byMostRecent);
  }

  /** Raw record, for asserting on stored bytes. */
  getRecord(key: string): string | undefined {
    return this.records.get(key);
  }

  setRecord(key: string, text: string): void {
    this.records.set(key, text);
  }
}
