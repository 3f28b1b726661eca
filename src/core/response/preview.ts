import { isRecord } from '../llm/types.js';

export const PREVIEW_MAX_CHARS = 400;
export const ELLIPSIS = '…';

/**
 * Returns the preview text for a choice, or undefined when the strategy does not apply.
 */
export type PreviewStrategy = (choice: unknown) => string | undefined;

/** OpenAI-style `{ message: { content } }` */
const fromMessageContent: PreviewStrategy = (choice) => {
  if (!isRecord(choice) || !isRecord(choice.message)) return undefined;
  const content = choice.message.content;
  return typeof content === 'string' ? content : '';
};

/** Completion-style `{ text }` */
const fromText: PreviewStrategy = (choice) => {
  if (!isRecord(choice) || !('text' in choice)) return undefined;
  return typeof choice.text === 'string' ? choice.text : '';
};

// non-ASCII as \uXXXX escapes, one per UTF-16 unit
function asciiString(text: string): string {
  return JSON.stringify(text).replace(
    /[\u0080-\uffff]/g,
    (unit) => `\\u${unit.charCodeAt(0).toString(16).padStart(4, '0')}`,
  );
}

/**
 * JSON with `", "` and `": "` separators and ASCII-only strings. `undefined` for
 * values JSON cannot represent.
 */
export function renderJson(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    return `[${value.map((item) => renderJson(item) ?? 'null').join(', ')}]`;
  }
  if (isRecord(value)) {
    const members: string[] = [];
    for (const [key, item] of Object.entries(value)) {
      const rendered = renderJson(item);
      if (rendered !== undefined) members.push(`${asciiString(key)}: ${rendered}`);
    }
    return `{${members.join(', ')}}`;
  }
  if (typeof value === 'string') return asciiString(value);
  return JSON.stringify(value);
}

function takeChars(text: string, count: number): string {
  return Array.from(text).slice(0, count).join('');
}

/** Anything else: the JSON rendering, cut short */
const fromJson: PreviewStrategy = (choice) =>
  takeChars(renderJson(choice) ?? String(choice), PREVIEW_MAX_CHARS);

export const PREVIEW_STRATEGIES: readonly PreviewStrategy[] = [
  fromMessageContent,
  fromText,
  fromJson,
];

/**
 * Lengths count code points, so a surrogate pair is one character and never split.
 */
export function truncatePreview(text: string, maxLen: number = PREVIEW_MAX_CHARS): string {
  const chars = Array.from(text);
  if (chars.length <= maxLen) return text;
  return chars.slice(0, maxLen).join('') + ELLIPSIS;
}

export function previewChoice(choice: unknown): string {
  for (const strategy of PREVIEW_STRATEGIES) {
    const content = strategy(choice);
    if (content !== undefined) return truncatePreview(content);
  }
  return '';
}
