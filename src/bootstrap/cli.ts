import fs from 'node:fs/promises';
import path from 'node:path';
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { loadConfig, type AppConfigRequired } from '../infra/config/config.js';
import { createLogger, type Logger } from '../infra/logger/logger.js';
import { buildConversation, DEFAULT_PROMPT } from '../core/chat/conversation.js';
import { errorMessage } from '../core/errors.js';
import { createClientFromConfig } from '../core/llm/openaiClient.js';
import type { LLMClient } from '../core/llm/types.js';
import { processAndSave, type OutputStream } from '../core/response/ResponseProcessor.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 2;

export interface CliDeps {
  config?: AppConfigRequired;
  logger?: Logger;
  /** Defaults to a client built from the config */
  client?: LLMClient & { close?: () => Promise<void> };
  stdout?: OutputStream;
  stderr?: OutputStream;
  now?: () => Date;
}

interface CliOptions {
  prompt?: string;
  file?: string;
  out?: string;
  temperature?: number;
  maxTokens?: number;
  model?: string;
}

function parseFloatArg(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) throw new InvalidArgumentError('Not a number.');
  return parsed;
}

function parseIntArg(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) throw new InvalidArgumentError('Not an integer.');
  return parsed;
}

/**
 * `<dir>/groq-response-<UTC timestamp, seconds, no colons>.json`
 */
export function defaultOutputPath(outputDir: string, now: Date = new Date()): string {
  const ts = now.toISOString().slice(0, 19).replace(/:/g, '-');
  return path.join(outputDir, `groq-response-${ts}.json`);
}

function buildProgram(stdout: OutputStream, stderr: OutputStream): Command {
  return new Command()
    .name('groq-gist')
    .description('Minimal chat-completion client')
    .addOption(new Option('-p, --prompt <text>', 'Prompt text to send').conflicts('file'))
    .addOption(new Option('-f, --file <path>', 'Path to a file containing prompt text'))
    .option('-o, --out <path>', 'Output file path (optional)')
    .option('-t, --temperature <number>', 'Sampling temperature', parseFloatArg)
    .option('--max-tokens <n>', 'Max tokens for generation', parseIntArg)
    .option('--model <id>', 'Model to use (overrides GROQ_MODEL)')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => stdout.write(str),
      writeErr: (str) => stderr.write(str),
    });
}

/**
 * Parse the arguments, send one request, summarize and save the response.
 * Resolves with the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;

  const program = buildProgram(stdout, stderr);
  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_FAILURE;
    }
    throw error;
  }
  const opts = program.opts<CliOptions>();

  let client: CliDeps['client'];
  try {
    const config = deps.config ?? loadConfig();
    const logger = deps.logger ?? createLogger(config);
    client = deps.client ?? createClientFromConfig(config, logger);

    const prompt = opts.file
      ? (await fs.readFile(opts.file, 'utf-8')).trim()
      : (opts.prompt ?? DEFAULT_PROMPT);

    stdout.write('Sending request to Groq...\n');
    const response = await client.complete(buildConversation(prompt), {
      model: opts.model ?? config.api.model,
      temperature: opts.temperature ?? config.defaults.temperature,
      maxTokens: opts.maxTokens ?? config.defaults.maxTokens,
      timeoutSeconds: config.api.timeoutSeconds,
    });

    const outPath = opts.out ?? defaultOutputPath(config.output.dir, deps.now?.() ?? new Date());
    await processAndSave(response, outPath, stdout);
    return EXIT_OK;
  } catch (error) {
    stderr.write(`Error: ${errorMessage(error)}\n`);
    return EXIT_FAILURE;
  } finally {
    if (!deps.client) await client?.close?.();
  }
}
