import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { PackageError } from '../shared/errors.js';
import { packageArtifacts } from './package-service.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'sd-package-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('packageArtifacts', () => {
  it('should bundle every entry in sorted order into a gzipped tarball', async () => {
    await writeFile(join(dir, 'run.json'), '{}');
    await writeFile(join(dir, 'artifact-b.md'), 'b');
    await writeFile(join(dir, 'artifact-a.md'), 'a');

    const result = await packageArtifacts(dir);

    expect(result.packagePath).toBe(join(dir, 'artifacts.tar.gz'));
    expect(result.entries).toEqual(['artifact-a.md', 'artifact-b.md', 'run.json']);
    const bytes = await readFile(result.packagePath);
    expect([bytes[0], bytes[1]]).toEqual([0x1f, 0x8b]);
  });

  it('should leave an existing tarball out of the next one', async () => {
    await writeFile(join(dir, 'artifact-a.md'), 'a');

    await packageArtifacts(dir);
    const second = await packageArtifacts(dir);

    expect(second.entries).toEqual(['artifact-a.md']);
  });

  it('should write to a custom path', async () => {
    await writeFile(join(dir, 'artifact-a.md'), 'a');
    const output = join(dir, 'out', 'bundle.tgz');

    const result = await packageArtifacts(dir, output);

    expect(result.packagePath).toBe(output);
    expect((await readFile(output)).length).toBeGreaterThan(0);
  });

  it('should refuse an empty directory', async () => {
    await mkdir(join(dir, 'empty'));
    await expect(packageArtifacts(join(dir, 'empty'))).rejects.toThrow(PackageError);
  });
});
