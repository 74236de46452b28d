// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Transcript record encoding.
 *
 * A record is `{ version, identity, turns }` as pretty-printed JSON with a
 * trailing newline. Encoding writes every object with a fixed key order, so
 * decoding a record and encoding it again reproduces the same bytes.
 */

import type { Session, TargetIdentity, ToolCall, ToolResult, Turn, TurnRole } from '../types.js';
import { StorageError } from '../errors.js';

export const SESSION_RECORD_VERSION = 1;

const TURN_ROLES: readonly TurnRole[] = ['user', 'agent', 'tool'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

function isTurnRole(value: unknown): value is TurnRole {
  return TURN_ROLES.some((role) => role === value);
}

/**
 * Freeze a turn and everything it holds.
 */
export function freezeTurn(turn: Turn): Turn {
  for (const call of turn.toolCalls) {
    if (call.result) Object.freeze(call.result);
    Object.freeze(call.arguments);
    Object.freeze(call);
  }
  Object.freeze(turn.toolCalls);
  return Object.freeze(turn);
}

function normalizeResult(result: ToolResult): ToolResult {
  return {
    output: result.output,
    error: result.error,
    succeeded: result.succeeded,
    interrupted: result.interrupted,
  };
}

function normalizeCall(call: ToolCall): ToolCall {
  return {
    id: call.id,
    name: call.name,
    arguments: call.arguments,
    ...(call.result && { result: normalizeResult(call.result) }),
  };
}

export function encodeSession(session: Session): string {
  const record = {
    version: SESSION_RECORD_VERSION,
    identity: {
      key: session.identity.key,
      executable: session.identity.executable,
      arch: session.identity.arch,
    },
    turns: session.turns.map((turn) => ({
      role: turn.role,
      content: turn.content,
      toolCalls: turn.toolCalls.map(normalizeCall),
      timestamp: turn.timestamp,
    })),
  };
  return JSON.stringify(record, null, 2) + '\n';
}

class RecordReader {
  constructor(private readonly source: string) {}

  invalid(path: string, expected: string): StorageError {
    return new StorageError(`Corrupt transcript record ${this.source}: ${path} must be ${expected}`);
  }

  identity(value: unknown): TargetIdentity {
    if (!isRecord(value)) throw this.invalid('identity', 'an object');
    if (typeof value.key !== 'string' || value.key === '') throw this.invalid('identity.key', 'a non-empty string');
    if (!isNullableString(value.executable)) throw this.invalid('identity.executable', 'a string or null');
    if (!isNullableString(value.arch)) throw this.invalid('identity.arch', 'a string or null');
    return { key: value.key, executable: value.executable, arch: value.arch };
  }

  result(value: unknown, path: string): ToolResult {
    if (!isRecord(value)) throw this.invalid(path, 'an object');
    if (typeof value.output !== 'string') throw this.invalid(`${path}.output`, 'a string');
    if (typeof value.error !== 'string') throw this.invalid(`${path}.error`, 'a string');
    if (typeof value.succeeded !== 'boolean') throw this.invalid(`${path}.succeeded`, 'a boolean');
    if (typeof value.interrupted !== 'boolean') throw this.invalid(`${path}.interrupted`, 'a boolean');
    return {
      output: value.output,
      error: value.error,
      succeeded: value.succeeded,
      interrupted: value.interrupted,
    };
  }

  call(value: unknown, path: string): ToolCall {
    if (!isRecord(value)) throw this.invalid(path, 'an object');
    if (typeof value.id !== 'string') throw this.invalid(`${path}.id`, 'a string');
    if (typeof value.name !== 'string') throw this.invalid(`${path}.name`, 'a string');
    if (!isRecord(value.arguments)) throw this.invalid(`${path}.arguments`, 'an object');
    const call: ToolCall = { id: value.id, name: value.name, arguments: value.arguments };
    if (value.result !== undefined) {
      call.result = this.result(value.result, `${path}.result`);
    }
    return call;
  }

  turn(value: unknown, path: string): Turn {
    if (!isRecord(value)) throw this.invalid(path, 'an object');
    if (!isTurnRole(value.role)) throw this.invalid(`${path}.role`, `one of ${TURN_ROLES.join(', ')}`);
    if (typeof value.content !== 'string') throw this.invalid(`${path}.content`, 'a string');
    if (!Array.isArray(value.toolCalls)) throw this.invalid(`${path}.toolCalls`, 'an array');
    if (typeof value.timestamp !== 'string') throw this.invalid(`${path}.timestamp`, 'a string');
    const toolCalls = value.toolCalls.map((call: unknown, index: number) =>
      this.call(call, `${path}.toolCalls[${index}]`)
    );
    return freezeTurn({
      role: value.role,
      content: value.content,
      toolCalls,
      timestamp: value.timestamp,
    });
  }
}

/**
 * Decode a transcript record. Turns come back frozen, in stored order.
 * @param source - file name or label used in error messages
 * @throws StorageError when the record is not valid JSON or has the wrong shape
 */
export function decodeSession(text: string, source: string): Session {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new StorageError(`Corrupt transcript record ${source}: not valid JSON`, { cause: error });
  }

  const reader = new RecordReader(source);
  if (!isRecord(data)) throw reader.invalid('record', 'an object');
  if (data.version !== SESSION_RECORD_VERSION) {
    throw new StorageError(
      `Unsupported transcript record ${source}: version ${String(data.version)} (expected ${SESSION_RECORD_VERSION})`
    );
  }
  if (!Array.isArray(data.turns)) throw reader.invalid('turns', 'an array');

  return {
    identity: reader.identity(data.identity),
    turns: data.turns.map((turn: unknown, index: number) => reader.turn(turn, `turns[${index}]`)),
  };
}
