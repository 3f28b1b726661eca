import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { z } from 'zod';
import type { Logger } from '../../infra/logger/logger.js';
import { buildConversation } from '../../core/chat/conversation.js';
import { errorMessage } from '../../core/errors.js';
import type { ChatCompletionDocument, LLMClient } from '../../core/llm/types.js';
import { isRecord } from '../../core/llm/types.js';

export interface HttpResult {
  status: number;
  /** undefined means an empty body */
  body?: unknown;
}

export interface HttpRequestLike {
  method: string;
  path: string;
  rawBody: string;
}

export interface SummarizeDefaults {
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutSeconds: number;
}

const MAX_BODY_BYTES = 1024 * 1024;

const SummarizeBodySchema = z.object({
  prompt: z.string().optional(),
  temperature: z.number().nullish(),
  max_tokens: z.number().int().positive().nullish(),
  model: z.string().nullish(),
});

/**
 * `choices[0].message.content` when it is a non-empty string, else the whole document.
 */
export function extractGist(response: ChatCompletionDocument): unknown {
  if (isRecord(response) && Array.isArray(response.choices)) {
    const [first] = response.choices;
    if (isRecord(first) && isRecord(first.message)) {
      const { content } = first.message;
      if (typeof content === 'string' && content) return content;
    }
  }
  return response;
}

// invalid JSON is treated as an empty body
function parseJsonBody(rawBody: string): unknown {
  if (!rawBody.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(rawBody);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

/**
 * HTTP front-end: status, health check and one-shot summarize.
 */
export class HttpFrontEnd {
  private server: Server | null = null;

  constructor(
    private client: LLMClient,
    private logger: Logger,
    private defaults: SummarizeDefaults,
    private serviceName: string = 'groq-gist',
  ) {}

  async handle(request: HttpRequestLike): Promise<HttpResult> {
    const { method, path } = request;

    if (path === '/') {
      if (method !== 'GET') return methodNotAllowed();
      return {
        status: 200,
        body: {
          service: this.serviceName,
          status: 'ok',
          message: 'The service is running and listening on the expected port.',
        },
      };
    }

    if (path === '/health') {
      if (method !== 'GET') return methodNotAllowed();
      return { status: 200 };
    }

    if (path === '/summarize') {
      if (method !== 'POST') return methodNotAllowed();
      return this.summarize(request.rawBody);
    }

    return { status: 404, body: { error: 'Not found' } };
  }

  private async summarize(rawBody: string): Promise<HttpResult> {
    const parsed = SummarizeBodySchema.safeParse(parseJsonBody(rawBody));
    if (!parsed.success) {
      return {
        status: 400,
        body: {
          error: 'Invalid request body',
          details: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        },
      };
    }

    const body = parsed.data;
    const prompt = body.prompt ?? 'No prompt provided';

    try {
      const response = await this.client.complete(buildConversation(prompt), {
        model: body.model || this.defaults.model,
        temperature: body.temperature ?? this.defaults.temperature,
        maxTokens: body.max_tokens ?? this.defaults.maxTokens,
        timeoutSeconds: this.defaults.timeoutSeconds,
      });
      return { status: 200, body: { prompt, gist: extractGist(response) } };
    } catch (error) {
      this.logger.error('http', `Summarize failed: ${errorMessage(error)}`);
      return {
        status: 500,
        body: { error: 'Failed to call chat completion API', details: errorMessage(error) },
      };
    }
  }

  private async onRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method ?? 'GET';
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;

    let result: HttpResult;
    try {
      result = await this.handle({ method, path, rawBody: await readBody(req) });
    } catch (error) {
      this.logger.error('http', `${method} ${path} failed: ${errorMessage(error)}`);
      result = { status: 400, body: { error: 'Bad request', details: errorMessage(error) } };
    }

    this.logger.info('http', `${method} ${path} -> ${result.status}`);
    if (result.body === undefined) {
      res.writeHead(result.status).end();
      return;
    }
    const payload = JSON.stringify(result.body);
    res
      .writeHead(result.status, {
        'Content-Type': 'application/json',
        'Content-Length': Buffer.byteLength(payload),
      })
      .end(payload);
  }

  /**
   * Listen on all interfaces. Resolves with the bound port.
   */
  start(port: number): Promise<number> {
    const server = createServer((req, res) => {
      this.onRequest(req, res).catch((error: unknown) => {
        this.logger.error('http', `Unhandled request error: ${errorMessage(error)}`);
        if (!res.headersSent) res.writeHead(500);
        res.end();
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, '0.0.0.0', () => {
        server.off('error', reject);
        const address = server.address();
        const bound = address && typeof address === 'object' ? address.port : port;
        this.logger.info('http', `Listening on http://0.0.0.0:${bound}`);
        resolve(bound);
      });
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();
    this.server = null;
    return new Promise((resolve, reject) => {
      server.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        this.logger.info('http', 'Server stopped');
        resolve();
      });
    });
  }
}

function methodNotAllowed(): HttpResult {
  return { status: 405, body: { error: 'Method not allowed' } };
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new Error(`Request body exceeds ${MAX_BODY_BYTES} bytes`));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    req.on('error', reject);
  });
}
