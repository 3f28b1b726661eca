import fs from 'node:fs/promises';
import path from 'node:path';
import { rootCertificates } from 'node:tls';

/**
 * Public CA bundle bytes: the given PEM file, or Node's bundled Mozilla root store.
 */
export async function readPublicBundle(bundlePath?: string): Promise<Buffer> {
  if (bundlePath) return fs.readFile(bundlePath);
  return Buffer.from(rootCertificates.join('\n') + '\n', 'utf-8');
}

/**
 * public bundle + "\n" + custom certificate, byte for byte. Nothing is parsed or
 * deduplicated; a broken certificate only surfaces at TLS handshake time.
 */
export function combineBundle(publicBundle: Buffer, customCert: Buffer): Buffer {
  return Buffer.concat([publicBundle, Buffer.from('\n'), customCert]);
}

/**
 * Write the combined bundle to `outPath` via a sibling temp file and rename.
 */
export async function writeCombinedBundle(
  customCertPath: string,
  outPath: string,
  publicBundle: Buffer,
): Promise<string> {
  const target = path.resolve(outPath);
  const customCert = await fs.readFile(customCertPath);

  await fs.mkdir(path.dirname(target), { recursive: true });
  const tmp = `${target}.${process.pid}.tmp`;
  try {
    await fs.writeFile(tmp, combineBundle(publicBundle, customCert));
    await fs.rename(tmp, target);
  } catch (error) {
    await fs.rm(tmp, { force: true });
    throw error;
  }
  return target;
}
