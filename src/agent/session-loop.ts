// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Agent Session Loop
 *
 * One `run()` answers one question: it loads the target's transcript, lets
 * the model call the debugger through the dispatch engine until it answers,
 * and persists the transcript once at the end. Every run finishes with a
 * single RunOutcome; failures are reported there rather than thrown.
 */

import type { Session, TargetIdentity, ToolCall, ToolResult, Turn } from '../types.js';
import type { Settings } from '../config/types.js';
import type { BaseProvider } from '../providers/base.js';
import type { SessionStore } from '../session/store.js';
import type { ToolDispatchEngine } from '../dispatch/engine.js';
import { createProviderFromSettings } from '../providers/index.js';
import { getDebuggerCommandDefinition } from '../tools/debugger-command.js';
import { freezeTurn } from '../session/codec.js';
import {
  ConfigurationError,
  StorageError,
  getErrorMessage,
  isAuthenticationFailure,
} from '../errors.js';
import { logger } from '../logger.js';
import { EventChannel } from './channel.js';
import { generateSystemPrompt } from './system-prompt.js';
import { turnsToMessages } from './transcript.js';

export type RunOutcome =
  | { status: 'completed'; interrupted: false; answer: string; session: Session }
  | { status: 'interrupted'; interrupted: true; session: Session }
  | { status: 'limit_reached'; interrupted: false; session: Session; toolCalls: number }
  | { status: 'configuration_error'; interrupted: boolean; message: string }
  | { status: 'agent_error'; interrupted: boolean; message: string; session: Session }
  | { status: 'dispatch_error'; interrupted: boolean; message: string; session: Session }
  | { status: 'storage_error'; interrupted: boolean; message: string; session?: Session; answer?: string };

export type RunStatus = RunOutcome['status'];

export type AgentEvent =
  | { type: 'text'; text: string }
  | { type: 'tool_call_started'; call: ToolCall }
  | { type: 'tool_call_finished'; call: ToolCall; result: ToolResult }
  | { type: 'final'; text: string }
  | { type: 'outcome'; outcome: RunOutcome };

/**
 * Anything that hands out the current settings snapshot.
 */
export interface SettingsSource {
  get(): Readonly<Settings>;
}

export type ProviderResolver = (settings: Readonly<Settings>) => BaseProvider;

export interface AgentSessionLoopOptions {
  engine: ToolDispatchEngine;
  store: SessionStore;
  settings: SettingsSource;
  /** Builds the provider for a run (default: from the settings snapshot) */
  resolveProvider?: ProviderResolver;
  /** Clock for turn timestamps */
  now?: () => Date;
}

export type SaveResult = { ok: true } | { ok: false; message: string };

type ModelReply =
  | { ok: true; content: string; toolCalls: ToolCall[]; stopReason: string; outputTokens: number }
  | { ok: false; error: unknown };

export class AgentSessionLoop {
  private readonly engine: ToolDispatchEngine;
  private readonly store: SessionStore;
  private readonly settings: SettingsSource;
  private readonly resolveProvider: ProviderResolver;
  private readonly now: () => Date;

  constructor(options: AgentSessionLoopOptions) {
    this.engine = options.engine;
    this.store = options.store;
    this.settings = options.settings;
    this.resolveProvider = options.resolveProvider ?? createProviderFromSettings;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Raise the interrupt latch for the run in progress.
   */
  requestInterrupt(): void {
    this.engine.requestInterrupt();
  }

  /**
   * Write a session again after a storage_error outcome.
   */
  async retrySave(session: Session): Promise<SaveResult> {
    try {
      await this.store.save(session);
      return { ok: true };
    } catch (error) {
      return { ok: false, message: getErrorMessage(error) };
    }
  }

  /**
   * Answer one question. Yields streamed events; the last event is always
   * `outcome`, and the same outcome is the generator's return value.
   */
  async *run(userInput: string, identity: TargetIdentity): AsyncGenerator<AgentEvent, RunOutcome, undefined> {
    const outcome = yield* this.execute(userInput, identity);
    logger.verbose(`Run finished: ${outcome.status}`);
    yield { type: 'outcome', outcome };
    return outcome;
  }

  private async *execute(userInput: string, identity: TargetIdentity): AsyncGenerator<AgentEvent, RunOutcome, undefined> {
    this.engine.resetInterrupt();
    const settings = this.settings.get();

    let provider: BaseProvider;
    try {
      provider = this.resolveProvider(settings);
    } catch (error) {
      return { status: 'configuration_error', interrupted: false, message: getErrorMessage(error) };
    }

    let session: Session;
    try {
      const stored = await this.store.load(identity);
      session = { identity, turns: [...stored.turns] };
    } catch (error) {
      return { status: 'storage_error', interrupted: false, message: getErrorMessage(error) };
    }

    this.append(session, { role: 'user', content: userInput, toolCalls: [] });

    const tools = [getDebuggerCommandDefinition()];
    const systemPrompt = generateSystemPrompt(identity, settings.systemPrompt);
    let toolCallCount = 0;

    while (true) {
      if (this.engine.isInterrupted()) {
        return { status: 'interrupted', interrupted: true, session };
      }

      const messages = turnsToMessages(session.turns, settings.toolOutputLimit);
      logger.apiRequest(provider.getModel(), messages.length, true);
      logger.apiRequestFull(provider.getModel(), messages, tools, systemPrompt);
      const startTime = Date.now();

      const channel = new EventChannel<string>();
      const pending = this.callModel(provider, channel, () =>
        provider.streamChat(messages, tools, (chunk) => channel.push(chunk), systemPrompt)
      );
      for await (const text of channel.drain()) {
        yield { type: 'text', text };
      }
      const reply = await pending;

      if (!reply.ok) {
        return this.agentFailure(reply.error, session);
      }
      logger.apiResponse(reply.outputTokens, reply.stopReason, (Date.now() - startTime) / 1000, reply.toolCalls.length);

      if (reply.toolCalls.length === 0) {
        // An answer that arrives after an interrupt is dropped
        if (this.engine.isInterrupted()) {
          return { status: 'interrupted', interrupted: true, session };
        }
        this.append(session, { role: 'agent', content: reply.content, toolCalls: [] });
        yield { type: 'final', text: reply.content };
        return this.persist(session, {
          status: 'completed',
          interrupted: false,
          answer: reply.content,
          session,
        });
      }

      let limitReached = false;
      for (const call of reply.toolCalls) {
        // Once the latch is up the engine refuses the rest, so the budget no longer applies
        if (toolCallCount >= settings.maxToolCalls && !this.engine.isInterrupted()) {
          limitReached = true;
          break;
        }
        toolCallCount++;

        yield { type: 'tool_call_started', call: { ...call } };
        let result: ToolResult;
        try {
          result = await this.engine.dispatch(call);
        } catch (error) {
          // The engine only throws when the debugger itself is unusable
          this.append(session, { role: 'tool', content: reply.content, toolCalls: reply.toolCalls });
          return {
            status: 'dispatch_error',
            interrupted: this.engine.isInterrupted(),
            message: getErrorMessage(error),
            session,
          };
        }
        call.result = result;
        yield { type: 'tool_call_finished', call: { ...call }, result };
      }

      this.append(session, { role: 'tool', content: reply.content, toolCalls: reply.toolCalls });

      const wasInterrupted = reply.toolCalls.some((call) => call.result?.interrupted);
      if (wasInterrupted || this.engine.isInterrupted()) {
        return { status: 'interrupted', interrupted: true, session };
      }

      if (limitReached) {
        logger.verbose(`Tool-call limit of ${settings.maxToolCalls} reached`);
        return this.persist(session, {
          status: 'limit_reached',
          interrupted: false,
          session,
          toolCalls: toolCallCount,
        });
      }
    }
  }

  /**
   * Start a model request whose streamed chunks land in `channel`. The
   * returned promise never rejects; the channel is closed once it settles.
   */
  private callModel(
    provider: BaseProvider,
    channel: EventChannel<string>,
    request: () => ReturnType<BaseProvider['streamChat']>
  ): Promise<ModelReply> {
    return Promise.resolve()
      .then(request)
      .then(
        (response): ModelReply => ({
          ok: true,
          content: response.content,
          toolCalls: response.toolCalls.map((toolCall) => ({
            id: toolCall.id,
            name: toolCall.name,
            arguments: { ...toolCall.input },
          })),
          stopReason: response.stopReason,
          outputTokens: response.usage?.outputTokens ?? 0,
        }),
        (error: unknown): ModelReply => {
          logger.debug(`${provider.getName()} request failed: ${getErrorMessage(error)}`);
          return { ok: false, error };
        }
      )
      .finally(() => channel.close());
  }

  private agentFailure(error: unknown, session: Session): RunOutcome {
    if (error instanceof ConfigurationError || isAuthenticationFailure(error)) {
      return {
        status: 'configuration_error',
        interrupted: this.engine.isInterrupted(),
        message: getErrorMessage(error),
      };
    }
    return {
      status: 'agent_error',
      interrupted: this.engine.isInterrupted(),
      message: getErrorMessage(error),
      session,
    };
  }

  private async persist(
    session: Session,
    outcome: Extract<RunOutcome, { status: 'completed' | 'limit_reached' }>
  ): Promise<RunOutcome> {
    try {
      await this.store.save(session);
      return outcome;
    } catch (error) {
      const message = error instanceof StorageError ? error.message : `Failed to save transcript: ${getErrorMessage(error)}`;
      return {
        status: 'storage_error',
        interrupted: false,
        message,
        session,
        ...(outcome.status === 'completed' && { answer: outcome.answer }),
      };
    }
  }

  private append(session: Session, turn: Omit<Turn, 'timestamp'>): void {
    session.turns.push(freezeTurn({ ...turn, timestamp: this.now().toISOString() }));
  }
}
