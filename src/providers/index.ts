// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { BaseProvider } from './base.js';
import { AnthropicProvider } from './anthropic.js';
import { OpenAICompatibleProvider, createOllamaProvider } from './openai-compatible.js';
import { MockProvider } from './mock.js';
import { ConfigurationError } from '../errors.js';
import { PROVIDER_IDS, type ProviderId } from '../constants.js';
import type { Settings } from '../config/types.js';
import type { ProviderConfig } from '../types.js';

export { BaseProvider } from './base.js';
export { AnthropicProvider } from './anthropic.js';
export { OpenAICompatibleProvider, createOllamaProvider } from './openai-compatible.js';
export { MockProvider } from './mock.js';

export interface CreateProviderOptions extends ProviderConfig {
  type: ProviderId;
  /** Scripted responses for the mock provider */
  responsesFile?: string;
}

/** Provider factory function type */
export type ProviderFactory = (options: CreateProviderOptions, env: NodeJS.ProcessEnv) => BaseProvider;

function requireKey(label: string, key: string | undefined, envName: string): string {
  if (!key) {
    throw new ConfigurationError(
      `${label} needs an API key. Run: dbgmate config set providers.${label.toLowerCase()}.apiKey <key>, or set ${envName}`
    );
  }
  return key;
}

const providerFactories: Record<ProviderId, ProviderFactory> = {
  anthropic: (options, env) => new AnthropicProvider({
    ...options,
    apiKey: requireKey('Anthropic', options.apiKey || env.ANTHROPIC_API_KEY, 'ANTHROPIC_API_KEY'),
  }),
  // A custom baseUrl may point at a server that takes no key
  openai: (options, env) => new OpenAICompatibleProvider({
    ...options,
    apiKey: options.baseUrl
      ? options.apiKey || env.OPENAI_API_KEY
      : requireKey('OpenAI', options.apiKey || env.OPENAI_API_KEY, 'OPENAI_API_KEY'),
  }),
  ollama: (options) => createOllamaProvider(options),
  mock: (options) => options.responsesFile
    ? MockProvider.fromFile(options.responsesFile, options.model)
    : new MockProvider({ model: options.model }),
};

/**
 * Get list of provider types.
 */
export function getProviderTypes(): string[] {
  return [...PROVIDER_IDS];
}

/**
 * Factory function to create a provider based on type.
 * @throws ConfigurationError when required credentials are missing
 */
export function createProvider(options: CreateProviderOptions, env: NodeJS.ProcessEnv = process.env): BaseProvider {
  return providerFactories[options.type](options, env);
}

/**
 * Create the provider selected in a settings snapshot.
 * @throws ConfigurationError when no provider is selected or credentials are missing
 */
export function createProviderFromSettings(settings: Readonly<Settings>, env: NodeJS.ProcessEnv = process.env): BaseProvider {
  if (settings.provider === null) {
    throw new ConfigurationError(
      `No provider configured. Run: dbgmate config set provider <${PROVIDER_IDS.join('|')}>`
    );
  }
  const entry = settings.providers[settings.provider] ?? {};
  return createProvider({ type: settings.provider, ...entry }, env);
}
