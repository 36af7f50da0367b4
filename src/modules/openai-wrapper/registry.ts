import { ConfigUtils, type Config } from '../config';
import { OpenAIClient } from './client';
import { ModelClientError, type ModelClient, type ModelRequest, type ModelTurn } from './types';

export enum ProviderType {
  OPENAI = 'openai',
  ANTHROPIC = 'anthropic',
}

export interface ProviderRegistration {
  type: ProviderType;
  client: ModelClient;
  /** Models whose id starts with one of these are sent to this provider */
  modelPrefixes: string[];
  enabled: boolean;
}

export type ProviderSettings = Pick<
  Config,
  | 'OPENAI_API_KEY'
  | 'OPENAI_BASE_URL'
  | 'OPENAI_ORGANIZATION'
  | 'ANTHROPIC_API_KEY'
  | 'ANTHROPIC_BASE_URL'
  | 'ANTHROPIC_MODEL_PREFIXES'
  | 'MODEL_TIMEOUT_MS'
>;

/**
 * Provider Registry
 * Sends each request to the provider registered for the model's prefix. The
 * longest matching prefix wins; a model no prefix matches goes to the default provider.
 */
export class ProviderRegistry implements ModelClient {
  private providers: Map<ProviderType, ProviderRegistration> = new Map();
  private readonly defaultProvider: ProviderType;

  constructor(defaultProvider: ProviderType = ProviderType.OPENAI) {
    this.defaultProvider = defaultProvider;
  }

  /**
   * Register a provider, replacing an earlier registration of the same type
   */
  register(registration: ProviderRegistration): void {
    this.providers.set(registration.type, registration);
  }

  getProvider(providerType: ProviderType): ModelClient | null {
    const registration = this.providers.get(providerType);
    return registration?.enabled ? registration.client : null;
  }

  enableProvider(providerType: ProviderType): void {
    const registration = this.providers.get(providerType);
    if (registration) {
      registration.enabled = true;
    }
  }

  disableProvider(providerType: ProviderType): void {
    const registration = this.providers.get(providerType);
    if (registration) {
      registration.enabled = false;
    }
  }

  /**
   * Provider that serves the model
   */
  resolve(model: string): ProviderType {
    let match: ProviderRegistration | undefined;
    let matchLength = 0;
    for (const registration of this.providers.values()) {
      if (!registration.enabled) continue;
      for (const prefix of registration.modelPrefixes) {
        if (prefix.length > matchLength && model.startsWith(prefix)) {
          match = registration;
          matchLength = prefix.length;
        }
      }
    }
    if (match) {
      return match.type;
    }

    if (!this.getProvider(this.defaultProvider)) {
      throw new ModelClientError('fatal', `No model provider is configured for model '${model}'`);
    }
    return this.defaultProvider;
  }

  async complete(request: ModelRequest): Promise<ModelTurn> {
    const client = this.getProvider(this.resolve(request.model));
    if (!client) {
      throw new ModelClientError('fatal', `No model provider is configured for model '${request.model}'`);
    }
    return client.complete(request);
  }
}

/**
 * Registry with OpenAI as the default provider, plus Anthropic when a key is configured
 */
export function createProviderRegistry(config: ProviderSettings): ProviderRegistry {
  const registry = new ProviderRegistry(ProviderType.OPENAI);

  registry.register({
    type: ProviderType.OPENAI,
    client: new OpenAIClient({
      apiKey: config.OPENAI_API_KEY,
      baseUrl: config.OPENAI_BASE_URL,
      organization: config.OPENAI_ORGANIZATION,
      timeout: config.MODEL_TIMEOUT_MS,
    }),
    modelPrefixes: [],
    enabled: true,
  });

  if (config.ANTHROPIC_API_KEY) {
    registry.register({
      type: ProviderType.ANTHROPIC,
      client: new OpenAIClient({
        apiKey: config.ANTHROPIC_API_KEY,
        baseUrl: config.ANTHROPIC_BASE_URL,
        timeout: config.MODEL_TIMEOUT_MS,
      }),
      modelPrefixes: ConfigUtils.getAnthropicModelPrefixes(config),
      enabled: true,
    });
  }

  return registry;
}
