import { describe, expect, it } from 'vitest';
import { getDefaultConfig } from '../config';
import { OpenAIClient } from './client';
import { ProviderRegistry, ProviderType, createProviderRegistry } from './registry';
import { ModelClientError, type ModelClient, type ModelRequest, type ModelTurn } from './types';

class NamedClient implements ModelClient {
  readonly models: string[] = [];

  constructor(private readonly name: string) {}

  async complete(request: ModelRequest): Promise<ModelTurn> {
    this.models.push(request.model);
    return { type: 'text', text: `${this.name} answered` };
  }
}

function request(model: string): ModelRequest {
  return { model, instructions: null, messages: [{ role: 'user', content: 'Hi' }], tools: [] };
}

describe('ProviderRegistry', () => {
  function registry(): { registry: ProviderRegistry; openai: NamedClient; anthropic: NamedClient } {
    const openai = new NamedClient('openai');
    const anthropic = new NamedClient('anthropic');
    const result = new ProviderRegistry(ProviderType.OPENAI);
    result.register({ type: ProviderType.OPENAI, client: openai, modelPrefixes: ['gpt-'], enabled: true });
    result.register({ type: ProviderType.ANTHROPIC, client: anthropic, modelPrefixes: ['claude'], enabled: true });
    return { registry: result, openai, anthropic };
  }

  it('routes a model to the provider registered for its prefix', async () => {
    const { registry: providers, openai, anthropic } = registry();

    expect(await providers.complete(request('claude-3-5-sonnet-latest'))).toEqual({ type: 'text', text: 'anthropic answered' });
    expect(await providers.complete(request('gpt-4o'))).toEqual({ type: 'text', text: 'openai answered' });

    expect(anthropic.models).toEqual(['claude-3-5-sonnet-latest']);
    expect(openai.models).toEqual(['gpt-4o']);
  });

  it('sends unmatched models to the default provider', () => {
    const { registry: providers } = registry();

    expect(providers.resolve('mistral-large')).toBe(ProviderType.OPENAI);
  });

  it('prefers the longest matching prefix', () => {
    const { registry: providers } = registry();
    providers.register({
      type: ProviderType.OPENAI,
      client: new NamedClient('openai'),
      modelPrefixes: ['claude-instant'],
      enabled: true,
    });

    expect(providers.resolve('claude-instant-1.2')).toBe(ProviderType.OPENAI);
    expect(providers.resolve('claude-2.1')).toBe(ProviderType.ANTHROPIC);
  });

  it('skips disabled providers', async () => {
    const { registry: providers } = registry();

    providers.disableProvider(ProviderType.ANTHROPIC);
    expect(providers.resolve('claude-2.1')).toBe(ProviderType.OPENAI);

    providers.disableProvider(ProviderType.OPENAI);
    await expect(providers.complete(request('claude-2.1'))).rejects.toThrow(
      new ModelClientError('fatal', "No model provider is configured for model 'claude-2.1'")
    );

    providers.enableProvider(ProviderType.ANTHROPIC);
    expect(providers.resolve('claude-2.1')).toBe(ProviderType.ANTHROPIC);
  });
});

describe('createProviderRegistry', () => {
  it('registers Anthropic only when a key is configured', () => {
    const without = createProviderRegistry(getDefaultConfig({ OPENAI_API_KEY: 'test-secret' }));
    expect(without.getProvider(ProviderType.OPENAI)).toBeInstanceOf(OpenAIClient);
    expect(without.getProvider(ProviderType.ANTHROPIC)).toBeNull();
    expect(without.resolve('claude-2.1')).toBe(ProviderType.OPENAI);

    const withKey = createProviderRegistry(getDefaultConfig({
      OPENAI_API_KEY: 'test-secret',
      ANTHROPIC_API_KEY: 'test-secret',
    }));
    expect(withKey.getProvider(ProviderType.ANTHROPIC)).toBeInstanceOf(OpenAIClient);
    expect(withKey.resolve('claude-2.1')).toBe(ProviderType.ANTHROPIC);
    expect(withKey.resolve('gpt-4o')).toBe(ProviderType.OPENAI);
  });
});
