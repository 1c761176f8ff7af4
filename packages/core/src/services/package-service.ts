import { mkdir, readdir } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { create } from 'tar';
import { PackageError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('package-service');

export const DEFAULT_PACKAGE_NAME = 'artifacts.tar.gz';

export interface PackageResult {
  artifactsDir: string;
  packagePath: string;
  entries: string[];
}

/** Gzipped tarball of every entry in the artifacts directory, in sorted order. */
export async function packageArtifacts(artifactsDir: string, packagePath?: string): Promise<PackageResult> {
  const root = resolve(artifactsDir);
  const target = resolve(packagePath ?? join(root, DEFAULT_PACKAGE_NAME));

  const entries = (await readdir(root))
    .filter((name) => resolve(root, name) !== target)
    .sort();
  if (entries.length === 0) {
    throw new PackageError(`nothing to package in ${root}`);
  }

  await mkdir(dirname(target), { recursive: true });
  await create({ gzip: true, portable: true, cwd: root, file: target }, entries);
  log.info(`packageArtifacts: ${entries.length} entries -> ${target}`);

  return { artifactsDir: root, packagePath: target, entries };
}
