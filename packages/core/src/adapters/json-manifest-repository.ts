import { access, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { manifestSchema, type Manifest } from '../domain/artifact/artifact-record.js';
import type { ManifestRepository } from '../ports/manifest-repository.js';
import { UploadError } from '../shared/errors.js';

export const MANIFEST_FILENAME = 'run.json';

/** `run.json` inside an artifacts directory; each save replaces the file. */
export class JsonManifestRepository implements ManifestRepository {
  constructor(private readonly artifactsDir: string) {}

  get path(): string {
    return join(this.artifactsDir, MANIFEST_FILENAME);
  }

  async exists(): Promise<boolean> {
    try {
      await access(this.path);
      return true;
    } catch {
      return false;
    }
  }

  async save(manifest: Manifest): Promise<string> {
    await writeFile(this.path, JSON.stringify(manifest, null, 2), 'utf-8');
    return this.path;
  }

  async load(): Promise<Manifest> {
    if (!(await this.exists())) {
      throw new UploadError(`${MANIFEST_FILENAME} manifest is required in ${this.artifactsDir}`);
    }
    let data: unknown;
    try {
      data = JSON.parse(await readFile(this.path, 'utf-8'));
    } catch (err) {
      throw new UploadError(`${MANIFEST_FILENAME} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    const parsed = manifestSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new UploadError(`${MANIFEST_FILENAME} is malformed: ${issues}`);
    }
    return parsed.data;
  }
}
