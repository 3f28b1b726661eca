import { existsSync, readdirSync } from 'node:fs';
import path from 'node:path';
import { NotFoundError } from '../errors.js';

/**
 * Well-known install locations of the corporate root certificate, in priority order.
 */
export const DEFAULT_CERT_CANDIDATES: readonly string[] = [
  '/etc/ssl/certs/zscaler_root.pem',
  '/usr/local/share/ca-certificates/zscaler_root.crt',
  '/usr/local/share/ca-certificates/zscaler_root.pem',
];

/** Windows user profiles as seen from WSL */
export const WSL_USERS_DIR = '/mnt/c/Users';
const DOWNLOAD_NAMES = ['zscaler_root.cer', 'zscaler_root.crt'];

export interface DiscoveryOptions {
  candidates?: readonly string[];
  usersDir?: string;
  exists?: (p: string) => boolean;
  listDir?: (p: string) => string[];
}

function searchedLocations(options: DiscoveryOptions): string[] {
  const candidates = options.candidates ?? DEFAULT_CERT_CANDIDATES;
  const usersDir = options.usersDir ?? WSL_USERS_DIR;
  return [...candidates, `${usersDir}/*/Downloads/{${DOWNLOAD_NAMES.join(',')}}`];
}

/**
 * All existing candidate certificates, fixed locations first, then each WSL
 * user's Downloads folder.
 */
export function findCustomRootCandidates(options: DiscoveryOptions = {}): string[] {
  const exists = options.exists ?? existsSync;
  const listDir = options.listDir ?? ((dir: string) => readdirSync(dir));
  const usersDir = options.usersDir ?? WSL_USERS_DIR;

  const candidates = [...(options.candidates ?? DEFAULT_CERT_CANDIDATES)];
  if (exists(usersDir)) {
    for (const user of listDir(usersDir)) {
      for (const name of DOWNLOAD_NAMES) {
        candidates.push(path.join(usersDir, user, 'Downloads', name));
      }
    }
  }
  return candidates.filter((candidate) => exists(candidate));
}

/**
 * Path of the custom root certificate to merge.
 * @throws {NotFoundError} explicit path missing, or nothing found in the known locations
 */
export function discoverCustomRoot(explicit?: string, options: DiscoveryOptions = {}): string {
  const exists = options.exists ?? existsSync;

  if (explicit) {
    if (!exists(explicit)) {
      throw new NotFoundError(`Provided root certificate does not exist: ${explicit}`, [explicit]);
    }
    return explicit;
  }

  const [first] = findCustomRootCandidates(options);
  if (!first) {
    const searched = searchedLocations(options);
    throw new NotFoundError(
      `No custom root certificate found in known locations. Re-run with --root-cert /path/to/root.cer (searched: ${searched.join(', ')})`,
      searched,
    );
  }
  return first;
}
