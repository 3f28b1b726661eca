import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { Agent, type Dispatcher } from 'undici';
import type { AppConfigRequired } from '../../infra/config/config.js';
import type { Logger } from '../../infra/logger/logger.js';
import { TransportError, errorMessage } from '../errors.js';

export type TrustSource =
  | { kind: 'env'; path: string }
  | { kind: 'project-local'; path: string }
  | { kind: 'system' };

export type TrustConfig = AppConfigRequired['trust'];

/**
 * Pick the CA bundle used to verify the API's certificate, in order:
 * the path from SSL_CERT_FILE / REQUESTS_CA_BUNDLE, the project-local combined
 * bundle if it exists, the platform default store.
 */
export function resolveTrust(
  trust: TrustConfig,
  exists: (path: string) => boolean = existsSync,
): TrustSource {
  if (trust.caBundlePath) {
    return { kind: 'env', path: trust.caBundlePath };
  }
  if (exists(trust.localBundlePath)) {
    return { kind: 'project-local', path: trust.localBundlePath };
  }
  return { kind: 'system' };
}

export function describeTrust(source: TrustSource): string {
  switch (source.kind) {
    case 'env':
      return `CA bundle from environment: ${source.path}`;
    case 'project-local':
      return `project-local CA bundle: ${source.path}`;
    case 'system':
      return 'system default trust store';
  }
}

/**
 * Warn when the bundle named in the environment does not exist; requests will fail.
 */
export function checkTrustSource(
  source: TrustSource,
  logger: Logger,
  exists: (path: string) => boolean = existsSync,
): void {
  if (source.kind === 'env' && !exists(source.path)) {
    logger.warn('trust', `SSL_CERT_FILE set to '${source.path}' but file not found.`);
  }
}

/**
 * Build the undici dispatcher for a trust source. `undefined` means the global
 * dispatcher, which verifies against Node's bundled root store.
 */
export async function createTrustDispatcher(source: TrustSource): Promise<Dispatcher | undefined> {
  if (source.kind === 'system') return undefined;

  let ca: Buffer;
  try {
    ca = await readFile(source.path);
  } catch (error) {
    throw new TransportError(`Cannot read CA bundle ${source.path}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return new Agent({ connect: { ca } });
}
