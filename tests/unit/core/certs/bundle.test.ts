import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { readdir, readFile, writeFile } from 'node:fs/promises';
import { rootCertificates } from 'node:tls';
import path from 'node:path';
import {
  combineBundle,
  readPublicBundle,
  writeCombinedBundle,
} from '../../../../src/core/certs/bundle.js';
import { makeTempDir, removeTempDir } from '../../../helpers/testIo.js';

describe('combineBundle', () => {
  it('puts the public bundle first, then a newline, then the custom certificate', () => {
    const combined = combineBundle(Buffer.from('PUBLIC'), Buffer.from('CUSTOM'));
    expect(combined.toString()).toBe('PUBLIC\nCUSTOM');
  });
});

describe('readPublicBundle', () => {
  it("defaults to Node's bundled root store", async () => {
    const bundle = await readPublicBundle();
    expect(bundle.toString('utf-8')).toBe(rootCertificates.join('\n') + '\n');
  });
});

describe('writeCombinedBundle', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('writes public + "\\n" + custom byte for byte, creating directories', async () => {
    const publicBytes = Buffer.from([0x2d, 0x2d, 0x0a, 0xff, 0x00]);
    const customBytes = Buffer.from('-----BEGIN CERTIFICATE-----\nnot really\n-----END CERTIFICATE-----\n');
    const certPath = path.join(dir, 'root.cer');
    await writeFile(certPath, customBytes);

    const out = await writeCombinedBundle(certPath, path.join(dir, '.certs', 'bundle.pem'), publicBytes);

    expect(out).toBe(path.join(dir, '.certs', 'bundle.pem'));
    const written = await readFile(out);
    expect(written.equals(Buffer.concat([publicBytes, Buffer.from('\n'), customBytes]))).toBe(true);
    expect(await readdir(path.join(dir, '.certs'))).toEqual(['bundle.pem']);
  });

  it('replaces an existing bundle', async () => {
    const certPath = path.join(dir, 'root.cer');
    const out = path.join(dir, 'bundle.pem');
    await writeFile(certPath, 'NEW');
    await writeFile(out, 'OLD');

    await writeCombinedBundle(certPath, out, Buffer.from('PUB'));

    expect(await readFile(out, 'utf-8')).toBe('PUB\nNEW');
  });
});
