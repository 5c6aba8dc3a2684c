import { evaluateEach, formatPct, formatUsd, type GeneratorContext } from './context.js';
import { monthlyCost } from './pricing.js';
import type { ComputeResource, PowerState, Recommendation, ResourceSnapshot } from './types.js';
import { classifyUtilization, confidenceFor, isEligibleForUtilizationAnalysis } from './utilization.js';

// Azure keeps billing a VM that is only stopped; it has to be deallocated.
const stoppedStateFor = (resource: ComputeResource): PowerState =>
  resource.provider === 'azure' ? 'deallocated' : 'stopped';

export const findIdleResources = (snapshot: ResourceSnapshot, ctx: GeneratorContext): Recommendation[] => {
  const { settings, pricing, logger, now } = ctx;
  const idleThreshold = Math.min(settings.thresholds.idle, settings.thresholds.underutilized);
  logger.debug('findIdleResources start', { resources: snapshot.resources.length, idleThreshold });

  const out = evaluateEach(
    snapshot.resources,
    'idle-resources',
    logger,
    (resource) => resource.id,
    (resource) => {
      if (!isEligibleForUtilizationAnalysis(resource, now, settings.minUptimeHours)) return undefined;
      const avgCpu = snapshot.utilization.get(resource.id);
      if (avgCpu === undefined) return undefined;
      if (classifyUtilization(avgCpu, settings.thresholds) !== 'Idle') return undefined;

      const hourly = pricing.hourlyCost(resource.size, resource.region);
      if (hourly === undefined) {
        logger.debug('idle check skipped: missing price', { resourceId: resource.id, size: resource.size });
        return undefined;
      }

      const savings = monthlyCost(hourly);
      if (!(savings > 0)) return undefined;

      const target = stoppedStateFor(resource);
      return {
        resourceId: resource.id,
        resourceName: resource.name,
        ownerScope: resource.ownerScope,
        resourceGroupOrAccount: resource.resourceGroupOrAccount,
        region: resource.region,
        recommendationType: 'StopIdle',
        currentState: {
          size: resource.size,
          avgCpuUtilization: avgCpu,
          powerState: resource.powerState,
          hourlyCost: hourly,
        },
        recommendedState: {
          powerState: target,
        },
        estimatedMonthlySavings: savings,
        confidence: confidenceFor(avgCpu, idleThreshold, settings.highConfidenceFraction),
        details:
          `Average CPU utilization of ${formatPct(avgCpu)} over ${settings.lookbackDays} days is below the ` +
          `${idleThreshold}% idle threshold. Set ${resource.name} to ${target} if it is not needed to save ` +
          `${formatUsd(savings)}/month in compute charges.`,
      } satisfies Recommendation;
    },
  );

  logger.debug('findIdleResources end', { recommendations: out.length });
  return out;
};
