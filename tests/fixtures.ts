import type { EngineContext, EngineSettings } from '../src/domain/context.js';
import { CatalogPricingTable } from '../src/domain/pricing.js';
import { SizeAdvisor } from '../src/domain/sizeAdvisor.js';
import type { ComputeResource, ResourceSnapshot } from '../src/domain/types.js';

export const NOW = new Date('2026-01-31T00:00:00Z');

export const settings: EngineSettings = {
  lookbackDays: 30,
  thresholds: { idle: 1, underutilized: 5 },
  minUptimeHours: 168,
  highConfidenceFraction: 0.5,
  reservedCapacity: {
    minFleetSize: 2,
    longTermFleetSize: 5,
    discounts: { oneYear: 0.35, threeYear: 0.6 },
  },
};

export const prices: Record<string, number> = {
  Standard_D2s_v3: 0.1536,
  Standard_D4s_v3: 0.3072,
  Standard_E2s_v3: 0.1536,
  Standard_E4s_v3: 0.3072,
  Standard_B1s: 0.012,
  Standard_B2s: 0.0436,
};

export const ladders = [
  { family: 'azure-dsv3', sizes: ['Standard_D2s_v3', 'Standard_D4s_v3', 'Standard_D8s_v3'] },
  { family: 'azure-esv3', sizes: ['Standard_E2s_v3', 'Standard_E4s_v3'] },
  { family: 'azure-bs', sizes: ['Standard_B1s', 'Standard_B2s'] },
];

export const pricing = new CatalogPricingTable(prices);

export const context = (overrides: Partial<EngineContext> = {}): EngineContext => ({
  settings,
  pricing,
  sizeAdvisor: new SizeAdvisor(ladders, settings.thresholds.underutilized),
  now: NOW,
  ...overrides,
});

export const vm = (name: string, overrides: Partial<ComputeResource> = {}): ComputeResource => ({
  id: `/subscriptions/sub-1/resourceGroups/rg-app/providers/Microsoft.Compute/virtualMachines/${name}`,
  name,
  region: 'eastus',
  size: 'Standard_D4s_v3',
  osType: 'Linux',
  resourceGroupOrAccount: 'rg-app',
  tags: {},
  powerState: 'running',
  ownerScope: 'sub-1',
  provider: 'azure',
  ...overrides,
});

export const snapshotOf = (entries: ReadonlyArray<readonly [ComputeResource, number | undefined]>): ResourceSnapshot => {
  const utilization = new Map<string, number>();
  for (const [resource, sample] of entries) {
    if (sample !== undefined) utilization.set(resource.id, sample);
  }
  return { resources: entries.map(([resource]) => resource), utilization };
};
