import { existsSync } from 'node:fs';
import fs from 'node:fs/promises';
import type { Logger } from '../../infra/logger/logger.js';

export const BACKUP_SUFFIX = '.bak';
export const MANAGED_KEYS = ['SSL_CERT_FILE', 'REQUESTS_CA_BUNDLE'] as const;

export type ManagedKey = (typeof MANAGED_KEYS)[number];

export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Merge `updates` into env-file lines.
 *
 * Blank, `#` and `=`-less lines pass through verbatim. The first line carrying a
 * managed key gets the new value; later duplicates of that key are kept as they
 * are. Keys not present are appended in `updates` order.
 */
export function mergeEnvLines(lines: readonly string[], updates: Readonly<Record<string, string>>): string[] {
  const found = new Set<string>();
  const merged = lines.map((line) => {
    const stripped = line.trim();
    if (!stripped || stripped.startsWith('#') || !line.includes('=')) return line;

    const key = line.slice(0, line.indexOf('=')).trim();
    if (Object.hasOwn(updates, key) && !found.has(key)) {
      found.add(key);
      return `${key}=${updates[key]}`;
    }
    return line;
  });

  for (const [key, value] of Object.entries(updates)) {
    if (!found.has(key)) merged.push(`${key}=${value}`);
  }
  return merged;
}

export type BackupResult =
  | { status: 'created'; path: string }
  | { status: 'exists'; path: string }
  | { status: 'no-source' };

/**
 * Copy the env file to `<envPath>.bak` unless that backup already exists, so the
 * backup always holds the state from before the first update.
 */
export async function backupEnvFile(envPath: string, logger: Logger): Promise<BackupResult> {
  if (!existsSync(envPath)) {
    logger.info('certs', `No existing ${envPath} to back up.`);
    return { status: 'no-source' };
  }

  const backupPath = envPath + BACKUP_SUFFIX;
  if (existsSync(backupPath)) {
    logger.info('certs', `Backup already exists: ${backupPath}`);
    return { status: 'exists', path: backupPath };
  }

  await fs.copyFile(envPath, backupPath);
  logger.info('certs', `Backup created: ${backupPath}`);
  return { status: 'created', path: backupPath };
}

/**
 * Point SSL_CERT_FILE and REQUESTS_CA_BUNDLE at `bundlePath`, keeping every
 * other line of the env file.
 */
export async function updateEnvFile(
  envPath: string,
  bundlePath: string,
  logger: Logger,
): Promise<BackupResult> {
  const backup = await backupEnvFile(envPath, logger);

  const updates: Record<ManagedKey, string> = {
    SSL_CERT_FILE: bundlePath,
    REQUESTS_CA_BUNDLE: bundlePath,
  };

  const original = existsSync(envPath) ? splitLines(await fs.readFile(envPath, 'utf-8')) : [];
  const merged = mergeEnvLines(original, updates);

  await fs.writeFile(envPath, merged.join('\n') + '\n', 'utf-8');
  logger.info('certs', `${envPath} updated (merged) with keys: ${MANAGED_KEYS.join(', ')}`);
  return backup;
}
