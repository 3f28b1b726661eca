import path from 'node:path';
import { Command, CommanderError } from 'commander';
import { loadConfig } from '../infra/config/config.js';
import { createLogger, type Logger } from '../infra/logger/logger.js';
import { readPublicBundle, writeCombinedBundle } from '../core/certs/bundle.js';
import { discoverCustomRoot, type DiscoveryOptions } from '../core/certs/discovery.js';
import { updateEnvFile } from '../core/certs/envFile.js';
import { errorMessage } from '../core/errors.js';
import type { OutputStream } from '../core/response/ResponseProcessor.js';
import { EXIT_FAILURE, EXIT_OK } from './cli.js';

export interface SetupCertsOptions {
  /** Explicit custom root certificate; discovered when omitted */
  rootCert?: string;
  /** Combined bundle destination */
  out: string;
  /** Public CA bundle; Node's root store when omitted */
  publicBundle?: string;
  envFile: string;
}

export interface SetupCertsResult {
  certPath: string;
  bundlePath: string;
}

/**
 * Discover the custom root, write the combined bundle, merge the env file.
 * @throws {NotFoundError} no usable custom root certificate
 */
export async function setupCerts(
  options: SetupCertsOptions,
  logger: Logger,
  discovery: DiscoveryOptions = {},
): Promise<SetupCertsResult> {
  const certPath = discoverCustomRoot(options.rootCert, discovery);
  logger.info('certs', `Using custom root certificate: ${certPath}`);

  const publicBundle = await readPublicBundle(options.publicBundle);
  const bundlePath = await writeCombinedBundle(certPath, options.out, publicBundle);
  logger.info('certs', `Combined bundle written to: ${bundlePath}`);

  await updateEnvFile(options.envFile, bundlePath, logger);
  return { certPath, bundlePath };
}

export interface SetupCertsCliDeps {
  logger?: Logger;
  stderr?: OutputStream;
  discovery?: DiscoveryOptions;
  cwd?: string;
}

export async function runSetupCerts(argv: string[], deps: SetupCertsCliDeps = {}): Promise<number> {
  const stderr = deps.stderr ?? process.stderr;
  const cwd = deps.cwd ?? process.cwd();

  const program = new Command()
    .name('groq-gist-setup-certs')
    .description('Merge a custom root certificate into a public CA bundle and point .env at it')
    .option('--root-cert <path>', 'Path to the custom root certificate (discovered when omitted)')
    .option('--out <path>', 'Combined bundle path (default ./.certs/combined-ca-bundle.pem)')
    .option('--public-bundle <path>', "Public CA bundle (default: Node's bundled root store)")
    .option('--env-file <path>', 'Env file to update (default ./.env)')
    .exitOverride()
    .configureOutput({ writeErr: (str) => stderr.write(str) });

  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_FAILURE;
    }
    throw error;
  }
  const opts = program.opts<Partial<SetupCertsOptions>>();

  try {
    const cfg = loadConfig({ env: process.env, cwd });
    const logger = deps.logger ?? createLogger(cfg);
    await setupCerts(
      {
        rootCert: opts.rootCert,
        out: opts.out ? path.resolve(cwd, opts.out) : cfg.trust.localBundlePath,
        publicBundle: opts.publicBundle,
        envFile: opts.envFile ? path.resolve(cwd, opts.envFile) : cfg.certs.envFile,
      },
      logger,
      deps.discovery,
    );
    logger.info('certs', 'Done. The env file was backed up (if it existed) and merged.');
    return EXIT_OK;
  } catch (error) {
    stderr.write(`Error: ${errorMessage(error)}\n`);
    return EXIT_FAILURE;
  }
}
