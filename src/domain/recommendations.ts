import { resolveContext, type EngineContext, type GeneratorContext } from './context.js';
import { findIdleResources } from './idleResources.js';
import { findReservedCapacityOpportunities } from './reservedCapacity.js';
import { findRightsizingOpportunities } from './rightsizing.js';
import type { ComputeResource, OwnerScopeSummary, Recommendation, ResourceSnapshot } from './types.js';

type Generator = (snapshot: ResourceSnapshot, ctx: GeneratorContext) => Recommendation[];

const GENERATORS: ReadonlyArray<readonly [string, Generator]> = [
  ['rightsizing', findRightsizingOpportunities],
  ['idle-resources', findIdleResources],
  ['reserved-capacity', findReservedCapacityOpportunities],
];

const toKey = (ownerScope: string, id: string): string => `${ownerScope}::${id}`;

const dedupeResources = (resources: readonly ComputeResource[], ctx: GeneratorContext): ComputeResource[] => {
  const seen = new Set<string>();
  const out: ComputeResource[] = [];
  for (const resource of resources) {
    const key = toKey(resource.ownerScope, resource.id);
    if (seen.has(key)) {
      ctx.logger.warn('duplicate resource ignored', { ownerScope: resource.ownerScope, resourceId: resource.id });
      continue;
    }
    seen.add(key);
    out.push(resource);
  }
  return out;
};

export const generateRecommendations = (snapshot: ResourceSnapshot, context: EngineContext): Recommendation[] => {
  const ctx = resolveContext(context);
  ctx.logger.debug('generateRecommendations start', {
    resources: snapshot.resources.length,
    samples: snapshot.utilization.size,
  });

  const unique: ResourceSnapshot = {
    resources: dedupeResources(snapshot.resources, ctx),
    utilization: snapshot.utilization,
  };

  const batches = GENERATORS.map(([name, generate]) => {
    const batch = generate(unique, ctx);
    ctx.logger.debug('generator complete', { generator: name, recommendations: batch.length });
    return batch;
  });

  // Array.prototype.sort is stable, so ties keep generator-then-discovery order.
  const results = batches.flat().sort((a, b) => b.estimatedMonthlySavings - a.estimatedMonthlySavings);

  ctx.logger.debug('generateRecommendations end', { recommendations: results.length });
  return results;
};

export const totalMonthlySavings = (rows: readonly Recommendation[]): number =>
  rows.reduce((sum, row) => sum + row.estimatedMonthlySavings, 0);

export const summarizeByOwnerScope = (rows: readonly Recommendation[]): OwnerScopeSummary[] => {
  const map = new Map<string, OwnerScopeSummary>();

  for (const row of rows) {
    const entry = map.get(row.ownerScope) ?? {
      ownerScope: row.ownerScope,
      recommendationCount: 0,
      rightsizeCount: 0,
      stopIdleCount: 0,
      reservedCapacityCount: 0,
      totalMonthlySavings: 0,
    };

    entry.recommendationCount += 1;
    if (row.recommendationType === 'Rightsize') entry.rightsizeCount += 1;
    if (row.recommendationType === 'StopIdle') entry.stopIdleCount += 1;
    if (row.recommendationType === 'PurchaseReservedCapacity') entry.reservedCapacityCount += 1;
    entry.totalMonthlySavings += row.estimatedMonthlySavings;

    map.set(row.ownerScope, entry);
  }

  return [...map.values()].sort(
    (a, b) => b.totalMonthlySavings - a.totalMonthlySavings || a.ownerScope.localeCompare(b.ownerScope),
  );
};
