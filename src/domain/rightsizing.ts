import { evaluateEach, formatPct, formatUsd, type GeneratorContext } from './context.js';
import { monthlyCost } from './pricing.js';
import type { Recommendation, ResourceSnapshot } from './types.js';
import { classifyUtilization, confidenceFor, isEligibleForUtilizationAnalysis } from './utilization.js';

export const findRightsizingOpportunities = (snapshot: ResourceSnapshot, ctx: GeneratorContext): Recommendation[] => {
  const { settings, pricing, sizeAdvisor, logger, now } = ctx;
  const threshold = settings.thresholds.underutilized;
  logger.debug('findRightsizingOpportunities start', { resources: snapshot.resources.length });

  const out = evaluateEach(
    snapshot.resources,
    'rightsizing',
    logger,
    (resource) => resource.id,
    (resource) => {
      if (!isEligibleForUtilizationAnalysis(resource, now, settings.minUptimeHours)) return undefined;
      const avgCpu = snapshot.utilization.get(resource.id);
      if (avgCpu === undefined) {
        logger.debug('rightsizing skipped: no utilization sample', { resourceId: resource.id });
        return undefined;
      }

      if (classifyUtilization(avgCpu, settings.thresholds) === 'RightSized') return undefined;

      const recommendedSize = sizeAdvisor.recommendSize(resource.size, avgCpu);
      if (!recommendedSize || recommendedSize === resource.size) {
        logger.debug('rightsizing skipped: no smaller size', { resourceId: resource.id, size: resource.size });
        return undefined;
      }

      const currentHourly = pricing.hourlyCost(resource.size, resource.region);
      const recommendedHourly = pricing.hourlyCost(recommendedSize, resource.region);
      if (currentHourly === undefined || recommendedHourly === undefined) {
        logger.debug('rightsizing skipped: missing price', {
          resourceId: resource.id,
          size: resource.size,
          recommendedSize,
          region: resource.region,
        });
        return undefined;
      }

      const savings = monthlyCost(currentHourly - recommendedHourly);
      if (!(savings > 0)) return undefined;

      return {
        resourceId: resource.id,
        resourceName: resource.name,
        ownerScope: resource.ownerScope,
        resourceGroupOrAccount: resource.resourceGroupOrAccount,
        region: resource.region,
        recommendationType: 'Rightsize',
        currentState: {
          size: resource.size,
          avgCpuUtilization: avgCpu,
          powerState: resource.powerState,
          hourlyCost: currentHourly,
        },
        recommendedState: {
          size: recommendedSize,
          hourlyCost: recommendedHourly,
        },
        estimatedMonthlySavings: savings,
        confidence: confidenceFor(avgCpu, threshold, settings.highConfidenceFraction),
        details:
          `Average CPU utilization of ${formatPct(avgCpu)} over ${settings.lookbackDays} days is below the ` +
          `${threshold}% threshold. Downsize ${resource.size} to ${recommendedSize} to save ${formatUsd(savings)}/month.`,
      } satisfies Recommendation;
    },
  );

  logger.debug('findRightsizingOpportunities end', { recommendations: out.length });
  return out;
};
