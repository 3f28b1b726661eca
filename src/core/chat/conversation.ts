import type { Conversation } from '../llm/types.js';

export const SYSTEM_INSTRUCTION = 'You are a concise, professional assistant.';

export const DEFAULT_PROMPT =
  'Explain the importance of fast language models in 3 concise bullet points.';

/**
 * Fixed system instruction followed by the user's prompt.
 */
export function buildConversation(prompt: string): Conversation {
  return [
    { role: 'system', content: SYSTEM_INSTRUCTION },
    { role: 'user', content: prompt },
  ];
}
