import { describe, expect, it } from 'vitest';
import { previewChoice, renderJson, truncatePreview } from '../../../../src/core/response/preview.js';

describe('truncatePreview', () => {
  it('cuts content longer than 400 characters and appends an ellipsis', () => {
    const content = 'a'.repeat(401);
    expect(truncatePreview(content)).toBe('a'.repeat(400) + '…');
  });

  it('returns content of at most 400 characters unchanged', () => {
    const content = 'b'.repeat(400);
    expect(truncatePreview(content)).toBe(content);
    expect(truncatePreview(truncatePreview('short'))).toBe('short');
  });

  it('counts emoji as single characters', () => {
    const emoji = '😀'.repeat(300);
    expect(truncatePreview(emoji)).toBe(emoji);

    const preview = truncatePreview('a' + '😀'.repeat(450));
    expect(preview).toBe('a' + '😀'.repeat(399) + '…');
    expect(Array.from(preview)).toHaveLength(401);
  });
});

describe('renderJson', () => {
  it('spaces separators and escapes non-ASCII text', () => {
    expect(renderJson({ a: 1, b: [true, null], c: 'é😀' })).toBe(
      '{"a": 1, "b": [true, null], "c": "\\u00e9\\ud83d\\ude00"}',
    );
  });

  it('drops undefined members and nulls undefined array items', () => {
    expect(renderJson({ a: undefined, b: [undefined] })).toBe('{"b": [null]}');
    expect(renderJson(undefined)).toBeUndefined();
  });
});

describe('previewChoice', () => {
  it('prefers the nested message content', () => {
    expect(previewChoice({ message: { content: 'from message' }, text: 'from text' })).toBe(
      'from message',
    );
  });

  it('uses an empty preview when the message has no string content', () => {
    expect(previewChoice({ message: { role: 'assistant' }, text: 'ignored' })).toBe('');
  });

  it('falls back to the flat text field', () => {
    expect(previewChoice({ index: 0, text: 'plain completion' })).toBe('plain completion');
  });

  it('renders anything else as JSON cut to 400 characters', () => {
    expect(previewChoice({ index: 0, delta: { content: 'x' } })).toBe(
      '{"index": 0, "delta": {"content": "x"}}',
    );
    const preview = previewChoice({ data: 'z'.repeat(500) });
    expect(preview).toBe('{"data": "' + 'z'.repeat(390));
    expect(preview).toHaveLength(400);
  });

  it('treats a non-object message as absent', () => {
    expect(previewChoice({ message: 'hi', text: 'text wins' })).toBe('text wins');
  });

  it('keeps short emoji content whole', () => {
    const content = '😀'.repeat(300);
    expect(previewChoice({ message: { content } })).toBe(content);
  });

  it('truncates long message content', () => {
    const content = 'c'.repeat(450);
    expect(previewChoice({ message: { content } })).toBe('c'.repeat(400) + '…');
  });
});
