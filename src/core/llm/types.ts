/**
 * Chat message format (OpenAI-compatible)
 */
export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * Ordered conversation; never empty.
 */
export type Conversation = [ChatMessage, ...ChatMessage[]];

/**
 * Per-call request parameters. Ranges are left to the remote API.
 */
export interface RequestParameters {
  model: string;
  /** Sampling temperature, typically 0-2 */
  temperature: number;
  maxTokens?: number;
  timeoutSeconds: number;
}

/**
 * Parsed response document. The shape varies between providers, so consumers
 * probe it for the keys they need instead of relying on a fixed record type.
 */
export type ChatCompletionDocument = unknown;

/**
 * Client for a chat-completion endpoint
 */
export interface LLMClient {
  /**
   * Send one conversation and return the parsed response document
   * @throws {TransportError} the endpoint could not be reached
   * @throws {ApiError} non-2xx status
   * @throws {DecodeError} 2xx with a body that is not JSON
   */
  complete(messages: Conversation, params: RequestParameters): Promise<ChatCompletionDocument>;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
