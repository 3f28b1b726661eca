import { loadConfig } from '../infra/config/config.js';
import { createLogger } from '../infra/logger/logger.js';
import { HttpFrontEnd } from '../adapter/http/HttpFrontEnd.js';
import { describeTrust } from '../core/llm/trust.js';
import { createClientFromConfig } from '../core/llm/openaiClient.js';

/**
 * Load config, wire the client and start listening. Config errors (missing
 * GROQ_API_KEY included) are thrown before the port is bound.
 */
export async function start(): Promise<HttpFrontEnd> {
  const cfg = loadConfig();
  const logger = createLogger(cfg);
  logger.info('bootstrap', `Starting ${cfg.app.name} in ${cfg.app.env}`);

  const client = createClientFromConfig(cfg, logger);
  logger.info('bootstrap', `TLS verification: ${describeTrust(client.trustSource)}`);

  const frontEnd = new HttpFrontEnd(
    client,
    logger,
    {
      model: cfg.api.model,
      temperature: cfg.defaults.temperature,
      maxTokens: cfg.defaults.maxTokens,
      timeoutSeconds: cfg.api.timeoutSeconds,
    },
    cfg.app.name,
  );
  await frontEnd.start(cfg.server.port);

  const shutdown = (signal: string) => {
    logger.info('bootstrap', `Received ${signal}, shutting down`);
    frontEnd
      .stop()
      .then(() => client.close())
      .catch((error: unknown) => {
        logger.error('bootstrap', `Shutdown failed: ${String(error)}`);
        process.exitCode = 1;
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  return frontEnd;
}
