import fs from 'node:fs/promises';
import { homedir } from 'node:os';
import path from 'node:path';
import type { ChatCompletionDocument } from '../llm/types.js';
import { isRecord } from '../llm/types.js';
import { previewChoice } from './preview.js';

export const SUMMARY_HEADER = '=== GROQ Response Summary ===';
export const SUMMARY_FOOTER = '=== End summary ===';
const MAX_PREVIEWED_CHOICES = 3;

export interface OutputStream {
  write(chunk: string): unknown;
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

// empty objects/arrays, 0, '' and null count as absent
function hasContent(value: unknown): boolean {
  if (value === undefined || value === null || value === false || value === 0 || value === '') {
    return false;
  }
  if (Array.isArray(value)) return value.length > 0;
  if (isRecord(value)) return Object.keys(value).length > 0;
  return true;
}

/**
 * Console summary of a response document, one entry per output line.
 */
export function summarizeResponse(response: ChatCompletionDocument): string[] {
  const lines: string[] = ['', SUMMARY_HEADER];

  if (!isRecord(response)) {
    lines.push(`Top-level response is not an object. Type: ${describeType(response)}`);
    return lines;
  }

  lines.push(`Top-level keys: ${Object.keys(response).join(', ')}`);

  const { choices } = response;
  if (Array.isArray(choices)) {
    lines.push(`Choices: ${choices.length}`);
    choices.slice(0, MAX_PREVIEWED_CHOICES).forEach((choice, index) => {
      lines.push('', `[Choice ${index + 1}] Preview:`, previewChoice(choice));
    });
  }

  if (hasContent(response.usage)) {
    lines.push('', 'Usage:', JSON.stringify(response.usage, null, 2));
  }

  if ('output' in response) {
    lines.push('', "Has 'output' key");
  }
  if ('outputs' in response) {
    const { outputs } = response;
    lines.push('', `Has 'outputs' key (len=${Array.isArray(outputs) ? outputs.length : '?'})`);
  }

  return lines;
}

export function expandOutputPath(outPath: string): string {
  const expanded =
    outPath === '~' || outPath.startsWith('~/') ? path.join(homedir(), outPath.slice(1)) : outPath;
  return path.resolve(expanded);
}

/**
 * Write the full, unmodified document as indented JSON. Returns the absolute path.
 */
export async function saveResponse(
  response: ChatCompletionDocument,
  outPath: string,
): Promise<string> {
  const outFile = expandOutputPath(outPath);
  await fs.mkdir(path.dirname(outFile), { recursive: true });
  await fs.writeFile(outFile, JSON.stringify(response, null, 2) + '\n', 'utf-8');
  return outFile;
}

/**
 * Print the summary, persist the document, print where it went.
 */
export async function processAndSave(
  response: ChatCompletionDocument,
  outPath: string,
  stdout: OutputStream = process.stdout,
): Promise<string> {
  const lines = summarizeResponse(response);
  stdout.write(lines.join('\n') + '\n');

  const outFile = await saveResponse(response, outPath);
  stdout.write(`\nFull response written to: ${outFile}\n${SUMMARY_FOOTER}\n\n`);
  return outFile;
}
