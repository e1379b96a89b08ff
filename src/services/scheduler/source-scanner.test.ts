import os from 'node:os';
import path from 'node:path';
import fse from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { computeContentHash, computeContentHashFromBuffer } from './content-hash';
import { SourceScanner } from './source-scanner';

const HELLO_SHA256 = '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824';
const FIXED_TIME = new Date('2024-01-01T00:00:00Z');

let dir: string;

beforeEach(async () => {
  dir = await fse.mkdtemp(path.join(os.tmpdir(), 'pixelcast-scan-'));
});

afterEach(async () => {
  await fse.remove(dir);
});

describe('computeContentHash', () => {
  it('hashes file bytes as lowercase hex SHA-256', async () => {
    const file = path.join(dir, 'hello.txt');
    await fse.writeFile(file, 'hello');

    expect(await computeContentHash(file)).toBe(HELLO_SHA256);
    expect(computeContentHashFromBuffer(Buffer.from('hello'))).toBe(HELLO_SHA256);
  });
});

describe('SourceScanner', () => {
  it('lists supported media sorted by name and skips everything else', async () => {
    await fse.writeFile(path.join(dir, 'zebra.png'), 'zebra');
    await fse.writeFile(path.join(dir, 'Alpha.gif'), 'alpha');
    await fse.writeFile(path.join(dir, 'notes.txt'), 'ignored');
    await fse.writeFile(path.join(dir, '.hidden.png'), 'ignored');
    await fse.writeFile(path.join(dir, 'upload.tmp-123.png'), 'ignored');
    await fse.ensureDir(path.join(dir, 'folder.png'));

    const { files, skipped } = await new SourceScanner(dir).scan();

    expect(files.map((file) => file.filename)).toEqual(['Alpha.gif', 'zebra.png']);
    expect(skipped).toEqual([]);
    expect(files[1]).toMatchObject({
      path: path.join(dir, 'zebra.png'),
      byteSize: 5,
      kind: 'still',
    });
  });

  it('gives identical content the same id', async () => {
    await fse.writeFile(path.join(dir, 'a.png'), 'hello');
    await fse.writeFile(path.join(dir, 'b.png'), 'hello');

    const { files } = await new SourceScanner(dir).scan();

    expect(files.map((file) => file.id)).toEqual([HELLO_SHA256, HELLO_SHA256]);
  });

  it('reuses the hash while size and mtime are unchanged', async () => {
    const file = path.join(dir, 'clip.png');
    const scanner = new SourceScanner(dir);

    await fse.writeFile(file, 'hello');
    await fse.utimes(file, FIXED_TIME, FIXED_TIME);
    const [first] = (await scanner.scan()).files;

    // Same size and mtime, different bytes: memoized hash wins.
    await fse.writeFile(file, 'jello');
    await fse.utimes(file, FIXED_TIME, FIXED_TIME);
    const [second] = (await scanner.scan()).files;
    expect(second.id).toBe(first.id);

    scanner.forget(file);
    const [third] = (await scanner.scan()).files;
    expect(third.id).toBe(computeContentHashFromBuffer(Buffer.from('jello')));
  });

  it('reports files it cannot read as skipped', async () => {
    await fse.writeFile(path.join(dir, 'good.png'), 'hello');
    await fse.symlink(path.join(dir, 'nowhere.png'), path.join(dir, 'dangling.png'));

    const { files, skipped } = await new SourceScanner(dir).scan();

    expect(files.map((file) => file.filename)).toEqual(['good.png']);
    expect(skipped).toEqual([path.join(dir, 'dangling.png')]);
  });

  it('creates a missing source directory', async () => {
    const missing = path.join(dir, 'incoming');

    expect(await new SourceScanner(missing).scan()).toEqual({ files: [], skipped: [] });
    expect(await fse.pathExists(missing)).toBe(true);
  });
});
