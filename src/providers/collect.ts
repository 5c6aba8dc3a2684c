import type { ComputeResource, ResourceSnapshot } from '../domain/types.js';
import { describeError, silentLogger, type Logger } from '../logger.js';
import type { ComputeProvider } from './types.js';

export interface CollectOptions {
  providers: readonly ComputeProvider[];
  lookbackDays: number;
  logger?: Logger;
}

interface ScopedResources {
  provider: ComputeProvider;
  resources: ComputeResource[];
}

const listProviderResources = async (provider: ComputeProvider, logger: Logger): Promise<ScopedResources[]> => {
  const scopes = await provider.listScopes();
  logger.debug('collect scopes listed', { provider: provider.name, scopes: scopes.length });

  const settled = await Promise.allSettled(scopes.map((scope) => provider.listResources(scope)));
  const out: ScopedResources[] = [];
  settled.forEach((result, index) => {
    const scope = scopes[index];
    if (result.status === 'rejected') {
      logger.warn('owner scope skipped', { provider: provider.name, scope, error: describeError(result.reason) });
      return;
    }
    logger.debug('owner scope collected', { provider: provider.name, scope, resources: result.value.length });
    out.push({ provider, resources: result.value });
  });
  return out;
};

const sampleUtilization = async (
  batches: ScopedResources[],
  lookbackDays: number,
  logger: Logger,
): Promise<Map<string, number>> => {
  const lookups = batches.flatMap(({ provider, resources }) =>
    resources
      .filter((resource) => resource.powerState === 'running')
      .map(async (resource) => {
        try {
          const value = await provider.averageUtilization(resource.id, lookbackDays);
          return [resource.id, value] as const;
        } catch (error) {
          logger.warn('utilization lookup failed', { resourceId: resource.id, error: describeError(error) });
          return [resource.id, undefined] as const;
        }
      }),
  );

  const samples = new Map<string, number>();
  for (const [resourceId, value] of await Promise.all(lookups)) {
    if (value !== undefined) samples.set(resourceId, value);
  }
  return samples;
};

/**
 * Fetches every scope of every provider concurrently, then the utilization of each
 * running resource. Failing scopes and lookups are logged and left out.
 */
export const collectSnapshot = async (options: CollectOptions): Promise<ResourceSnapshot> => {
  const logger = options.logger ?? silentLogger;
  logger.debug('collectSnapshot start', { providers: options.providers.length, lookbackDays: options.lookbackDays });

  const perProvider = await Promise.allSettled(options.providers.map((provider) => listProviderResources(provider, logger)));
  const batches: ScopedResources[] = [];
  perProvider.forEach((result, index) => {
    if (result.status === 'rejected') {
      logger.warn('provider skipped', { provider: options.providers[index]?.name, error: describeError(result.reason) });
      return;
    }
    batches.push(...result.value);
  });

  const utilization = await sampleUtilization(batches, options.lookbackDays, logger);
  const resources = batches.flatMap((batch) => batch.resources);

  logger.debug('collectSnapshot end', { resources: resources.length, samples: utilization.size });
  return Object.freeze({
    resources: Object.freeze(resources.map((resource) => Object.freeze(resource))),
    utilization,
  });
};
