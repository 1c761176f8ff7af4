import * as z from 'zod';

export interface ArtifactRecord {
  filename: string;
  step: string;
  status: string | null;
  hash: string;
}

export const artifactRecordSchema = z.object({
  filename: z.string().min(1),
  step: z.coerce.string(),
  status: z.string().nullable().optional().transform((status) => status ?? null),
  hash: z.string().min(1),
});

export const manifestSchema = z.object({
  session: z.string(),
  project: z.string(),
  branch: z.string().nullable().optional().transform((branch) => branch ?? null),
  generated_at: z.string(),
  version: z.string(),
  artifact_count: z.number().int().nonnegative(),
  artifacts: z.array(artifactRecordSchema),
});

export type Manifest = z.infer<typeof manifestSchema>;

export type DistillStrategy = 'per-step' | 'transcript';

export const DISTILL_STRATEGIES: readonly DistillStrategy[] = ['per-step', 'transcript'];

export function isDistillStrategy(value: string): value is DistillStrategy {
  return DISTILL_STRATEGIES.some((strategy) => strategy === value);
}

export interface DistillationResult {
  sessionId: string;
  strategy: DistillStrategy;
  artifacts: ArtifactRecord[];
  artifactsDir: string;
  manifestPath: string;
  ingestLog: string;
  deduplicated: number;
}
