import { evaluateEach, formatUsd, type GeneratorContext } from './context.js';
import { monthlyCost, termDiscount, type ReservedTerm } from './pricing.js';
import type { ComputeResource, Recommendation, ResourceSnapshot } from './types.js';

interface FleetGroup {
  ownerScope: string;
  region: string;
  size: string;
  members: ComputeResource[];
}

const MEMBER_PREVIEW = 3;

const toKey = (item: Pick<ComputeResource, 'ownerScope' | 'region' | 'size'>): string =>
  `${item.ownerScope}::${item.region}::${item.size}`;

export const groupRunningFleets = (resources: readonly ComputeResource[]): FleetGroup[] => {
  const groups = new Map<string, FleetGroup>();
  for (const resource of resources) {
    if (resource.powerState !== 'running') continue;
    const key = toKey(resource);
    const group = groups.get(key) ?? {
      ownerScope: resource.ownerScope,
      region: resource.region,
      size: resource.size,
      members: [],
    };
    group.members.push(resource);
    groups.set(key, group);
  }
  return [...groups.values()];
};

const previewMembers = (members: ComputeResource[]): string => {
  const ids = members.slice(0, MEMBER_PREVIEW).map((member) => member.id).join(', ');
  const rest = members.length - MEMBER_PREVIEW;
  return rest > 0 ? `${ids} (+${rest} more)` : ids;
};

const sharedResourceGroup = (members: ComputeResource[]): string => {
  const groups = new Set(members.map((member) => member.resourceGroupOrAccount));
  const [only] = groups;
  return groups.size === 1 && only !== undefined ? only : 'multiple';
};

export const findReservedCapacityOpportunities = (snapshot: ResourceSnapshot, ctx: GeneratorContext): Recommendation[] => {
  const { settings, pricing, logger } = ctx;
  const { minFleetSize, longTermFleetSize, discounts } = settings.reservedCapacity;
  const fleets = groupRunningFleets(snapshot.resources);
  logger.debug('findReservedCapacityOpportunities start', { fleets: fleets.length, minFleetSize });

  const out = evaluateEach(
    fleets,
    'reserved-capacity',
    logger,
    toKey,
    (fleet) => {
      const count = fleet.members.length;
      if (count < minFleetSize) return undefined;

      const hourly = pricing.hourlyCost(fleet.size, fleet.region);
      if (hourly === undefined) {
        logger.debug('reserved capacity skipped: missing price', { size: fleet.size, region: fleet.region, count });
        return undefined;
      }

      const onDemandMonthlyTotal = monthlyCost(hourly) * count;
      const longTerm = count > longTermFleetSize;
      const term: ReservedTerm = longTerm ? '3-year' : '1-year';
      const discount = termDiscount(term, discounts);
      const savings = onDemandMonthlyTotal * discount;
      if (!(savings > 0)) return undefined;

      const discountPct = Math.round(discount * 100);
      return {
        resourceId: `reserved:${fleet.ownerScope}:${fleet.region}:${fleet.size}`,
        resourceName: `${count} x ${fleet.size}`,
        ownerScope: fleet.ownerScope,
        resourceGroupOrAccount: sharedResourceGroup(fleet.members),
        region: fleet.region,
        recommendationType: 'PurchaseReservedCapacity',
        currentState: {
          size: fleet.size,
          count,
          pricingModel: 'On-Demand',
          onDemandMonthlyCost: onDemandMonthlyTotal,
          resources: previewMembers(fleet.members),
        },
        recommendedState: {
          size: fleet.size,
          count,
          pricingModel: `Reserved (${term})`,
          term,
          discountPct,
        },
        estimatedMonthlySavings: savings,
        confidence: longTerm ? 'High' : 'Medium',
        details:
          `Found ${count} running ${fleet.size} resources in ${fleet.region}. A ${term} reserved capacity purchase ` +
          `saves about ${discountPct}% of the ${formatUsd(onDemandMonthlyTotal)}/month on-demand cost.`,
      } satisfies Recommendation;
    },
  );

  logger.debug('findReservedCapacityOpportunities end', { recommendations: out.length });
  return out;
};
