import { fetch, type Dispatcher } from 'undici';
import { requireApiKey, type AppConfigRequired } from '../../infra/config/config.js';
import type { Logger } from '../../infra/logger/logger.js';
import { ApiError, DecodeError, TransportError, errorMessage } from '../errors.js';
import {
  checkTrustSource,
  createTrustDispatcher,
  describeTrust,
  resolveTrust,
  type TrustConfig,
  type TrustSource,
} from './trust.js';
import type { ChatCompletionDocument, Conversation, LLMClient, RequestParameters } from './types.js';

export interface OpenAICompatibleClientOptions {
  /** Full chat-completions endpoint URL */
  url: string;
  apiKey: string;
  userAgent: string;
  trust: TrustConfig;
  /** Overrides trust resolution; tests pass an undici MockAgent here */
  dispatcher?: Dispatcher;
}

export interface ChatCompletionPayload {
  model: string;
  messages: Conversation;
  temperature: number;
  max_tokens?: number;
}

export function buildPayload(
  messages: Conversation,
  params: RequestParameters,
): ChatCompletionPayload {
  return {
    model: params.model,
    messages,
    temperature: params.temperature,
    ...(params.maxTokens !== undefined ? { max_tokens: params.maxTokens } : {}),
  };
}

function parseErrorBody(text: string, status: number, statusText: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text || `${status} ${statusText}`;
  }
}

/**
 * OpenAI-compatible chat-completion client (Groq by default).
 * One POST per call, no retries.
 */
export class OpenAICompatibleClient implements LLMClient {
  /** Resolved at construction, warned about there when the file is missing */
  readonly trustSource: TrustSource;
  private dispatcher?: Promise<Dispatcher | undefined>;

  constructor(
    private logger: Logger,
    private options: OpenAICompatibleClientOptions,
  ) {
    this.trustSource = resolveTrust(options.trust);
    if (!options.dispatcher) checkTrustSource(this.trustSource, logger);
    this.logger.debug(
      'llm-client',
      `Initialized for ${options.url}, TLS verification: ${describeTrust(this.trustSource)}`,
    );
  }

  private getDispatcher(): Promise<Dispatcher | undefined> {
    if (this.options.dispatcher) return Promise.resolve(this.options.dispatcher);
    if (!this.dispatcher) {
      this.dispatcher = createTrustDispatcher(this.trustSource);
      // a failed read is reported once, then retried on the next call
      this.dispatcher.catch(() => {
        this.dispatcher = undefined;
      });
    }
    return this.dispatcher;
  }

  async complete(
    messages: Conversation,
    params: RequestParameters,
  ): Promise<ChatCompletionDocument> {
    const startTime = Date.now();
    this.logger.debug(
      'llm-client',
      `Chat request: ${messages.length} messages, model=${params.model}, temp=${params.temperature}`,
    );

    const dispatcher = await this.getDispatcher();
    const body = JSON.stringify(buildPayload(messages, params));

    let status: number;
    let statusText: string;
    let ok: boolean;
    let text: string;
    try {
      const response = await fetch(this.options.url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          'Content-Type': 'application/json',
          'User-Agent': this.options.userAgent,
        },
        body,
        dispatcher,
        signal: AbortSignal.timeout(params.timeoutSeconds * 1000),
      });
      ({ status, statusText, ok } = response);
      text = await response.text();
    } catch (error) {
      const reason =
        error instanceof Error && error.name === 'TimeoutError'
          ? `timed out after ${params.timeoutSeconds}s`
          : describeFetchFailure(error);
      this.logger.error('llm-client', `Request to ${this.options.url} failed: ${reason}`);
      throw new TransportError(`Request to ${this.options.url} failed: ${reason}`, {
        cause: error,
      });
    }

    if (!ok) {
      this.logger.error('llm-client', `LLM API error (${status}): ${text.substring(0, 100)}`);
      throw new ApiError(status, parseErrorBody(text, status, statusText));
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new DecodeError(errorMessage(error), text);
    }

    this.logger.debug('llm-client', `Chat completed in ${Date.now() - startTime}ms`);
    return data;
  }

  /**
   * Release pooled connections held by a dispatcher this client created.
   */
  async close(): Promise<void> {
    if (this.options.dispatcher || !this.dispatcher) return;
    const dispatcher = await this.dispatcher.catch(() => undefined);
    this.dispatcher = undefined;
    await dispatcher?.close();
  }
}

// undici reports "fetch failed" and keeps the real reason in `cause`
function describeFetchFailure(error: unknown): string {
  const message = errorMessage(error);
  if (error instanceof Error && error.cause !== undefined) {
    return `${message}: ${errorMessage(error.cause)}`;
  }
  return message;
}

/**
 * Client wired from the loaded configuration.
 * @throws {ConfigurationError} GROQ_API_KEY is not set
 */
export function createClientFromConfig(
  cfg: AppConfigRequired,
  logger: Logger,
): OpenAICompatibleClient {
  return new OpenAICompatibleClient(logger, {
    url: cfg.api.url,
    apiKey: requireApiKey(cfg),
    userAgent: cfg.api.userAgent,
    trust: cfg.trust,
  });
}
