import { z } from 'zod';
import { parseWithSchema, readStructuredFile } from '../config/loader.js';
import type { ComputeResource } from '../domain/types.js';
import { silentLogger, type Logger } from '../logger.js';
import type { ComputeProvider } from './types.js';

const ResourceSchema = z.object({
  id: z.string().min(1),
  name: z.string().default(''),
  region: z.string().min(1),
  size: z.string().min(1),
  osType: z.string().default('unknown'),
  resourceGroupOrAccount: z.string().default(''),
  tags: z.record(z.string(), z.string()).default({}),
  powerState: z.enum(['running', 'stopped', 'deallocated', 'unknown']).default('unknown'),
  ownerScope: z.string().min(1),
  provider: z.enum(['aws', 'azure']),
  launchedAt: z.string().datetime({ offset: true }).optional(),
});

export const SnapshotFileSchema = z.object({
  resources: z.array(ResourceSchema).default([]),
  utilization: z.record(z.string().min(1), z.number().min(0).max(100)).default({}),
});

/**
 * Deterministic provider over a fixed list of resources and utilization samples.
 * Serves snapshot files exported from other tooling, and tests.
 */
export class SnapshotProvider implements ComputeProvider {
  readonly name = 'snapshot';
  private readonly samples: ReadonlyMap<string, number>;

  constructor(
    private readonly resources: readonly ComputeResource[],
    samples: Iterable<readonly [string, number]> = [],
    private readonly scopes?: readonly string[],
  ) {
    this.samples = new Map(samples);
  }

  async listScopes(): Promise<string[]> {
    const seen = [...new Set(this.resources.map((resource) => resource.ownerScope))];
    const { scopes } = this;
    return scopes ? seen.filter((scope) => scopes.includes(scope)) : seen;
  }

  async listResources(ownerScope: string): Promise<ComputeResource[]> {
    return this.resources.filter((resource) => resource.ownerScope === ownerScope).map((resource) => ({ ...resource }));
  }

  async averageUtilization(resourceId: string, _windowDays: number): Promise<number | undefined> {
    return this.samples.get(resourceId);
  }
}

export const loadSnapshotProvider = async (
  path: string,
  scopes?: readonly string[],
  logger: Logger = silentLogger,
): Promise<SnapshotProvider> => {
  logger.debug('loadSnapshotProvider start', { path });
  const { absPath, parsed } = await readStructuredFile(path, 'Snapshot', logger);
  const snapshot = parseWithSchema(SnapshotFileSchema, parsed, absPath);
  logger.debug('loadSnapshotProvider end', {
    resources: snapshot.resources.length,
    samples: Object.keys(snapshot.utilization).length,
  });
  return new SnapshotProvider(snapshot.resources, Object.entries(snapshot.utilization), scopes);
};
