import type { Manifest } from '../domain/artifact/artifact-record.js';

export interface ManifestRepository {
  readonly path: string;
  save(manifest: Manifest): Promise<string>;
  load(): Promise<Manifest>;
  exists(): Promise<boolean>;
}
