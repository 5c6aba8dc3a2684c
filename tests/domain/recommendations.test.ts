import { describe, expect, it, vi } from 'vitest';
import type { PricingTable } from '../../src/domain/pricing.js';
import {
  generateRecommendations,
  summarizeByOwnerScope,
  totalMonthlySavings,
} from '../../src/domain/recommendations.js';
import type { Logger } from '../../src/logger.js';
import { context, pricing, snapshotOf, vm } from '../fixtures.js';

const fleet = (count: number) =>
  Array.from({ length: count }, (_, index) => vm(`batch-${index + 1}`, { size: 'Standard_E2s_v3' }));

const mixedSnapshot = () =>
  snapshotOf([
    [vm('web-01'), 2],
    [vm('web-02'), 0.5],
    [vm('tiny', { size: 'Standard_B2s' }), 0.2],
    [vm('busy', { size: 'Standard_E4s_v3' }), 65],
    [vm('off', { powerState: 'deallocated' }), 0.1],
    ...fleet(3).map((resource) => [resource, 40] as const),
    [vm('aws-1', { provider: 'aws', ownerScope: '111111111111', resourceGroupOrAccount: '111111111111' }), 0.3],
  ]);

describe('generateRecommendations', () => {
  it('rightsizes an underutilized VM without flagging it idle', () => {
    const rows = generateRecommendations(snapshotOf([[vm('web-01'), 2]]), context());
    expect(rows.map((row) => [row.recommendationType, row.confidence])).toEqual([['Rightsize', 'High']]);
    expect(rows[0]?.recommendedState.size).toBe('Standard_D2s_v3');
  });

  it('surfaces both downsizing and stopping for an idle VM', () => {
    const rows = generateRecommendations(snapshotOf([[vm('web-01'), 0.5]]), context());
    expect(rows.map((row) => [row.recommendationType, row.confidence])).toEqual([
      ['StopIdle', 'Medium'],
      ['Rightsize', 'High'],
    ]);
    expect(rows[0]?.estimatedMonthlySavings).toBeCloseTo(221.184, 6);
    expect(rows[1]?.estimatedMonthlySavings).toBeCloseTo(110.592, 6);
  });

  it('recommends a 1-year term for a fleet of five', () => {
    const rows = generateRecommendations(snapshotOf(fleet(5).map((resource) => [resource, 40] as const)), context());
    expect(rows).toHaveLength(1);
    const [row] = rows;
    expect(row?.recommendationType).toBe('PurchaseReservedCapacity');
    expect(row?.recommendedState.term).toBe('1-year');
    expect(row?.confidence).toBe('Medium');
    expect(row?.estimatedMonthlySavings).toBeCloseTo(193.536, 6);
  });

  it('recommends a 3-year term for a fleet of six', () => {
    const rows = generateRecommendations(snapshotOf(fleet(6).map((resource) => [resource, 40] as const)), context());
    expect(rows).toHaveLength(1);
    const [row] = rows;
    expect(row?.recommendedState.term).toBe('3-year');
    expect(row?.confidence).toBe('High');
    expect(row?.estimatedMonthlySavings).toBeCloseTo(0.6 * 6 * 0.1536 * 720, 6);
    expect(row?.details).toBe(
      'Found 6 running Standard_E2s_v3 resources in eastus. A 3-year reserved capacity purchase ' +
        'saves about 60% of the $663.55/month on-demand cost.',
    );
  });

  it('emits nothing for an idle VM whose size has no price', () => {
    const rows = generateRecommendations(snapshotOf([[vm('odd', { size: 'Standard_Z9' }), 0.2]]), context());
    expect(rows).toEqual([]);
  });

  it('returns an empty list for an empty snapshot', () => {
    expect(generateRecommendations(snapshotOf([]), context())).toEqual([]);
  });

  it('is deterministic across runs', () => {
    const first = generateRecommendations(mixedSnapshot(), context());
    const second = generateRecommendations(mixedSnapshot(), context());
    expect(second).toEqual(first);
  });

  it('orders by savings descending with non-negative savings', () => {
    const rows = generateRecommendations(mixedSnapshot(), context());
    expect(rows.length).toBeGreaterThan(3);
    for (let i = 1; i < rows.length; i += 1) {
      const previous = rows[i - 1]?.estimatedMonthlySavings ?? Number.NaN;
      const current = rows[i]?.estimatedMonthlySavings ?? Number.NaN;
      expect(previous).toBeGreaterThanOrEqual(current);
      expect(current).toBeGreaterThan(0);
    }
  });

  it('never proposes rightsizing or stopping a resource that is not running', () => {
    const rows = generateRecommendations(mixedSnapshot(), context());
    const offId = vm('off').id;
    expect(rows.filter((row) => row.resourceId === offId)).toEqual([]);
  });

  it('keeps generator then discovery order for equal savings', () => {
    const rows = generateRecommendations(
      snapshotOf([
        [vm('a', { size: 'Standard_D2s_v3' }), 0.6],
        [vm('b', { size: 'Standard_D2s_v3' }), 0.6],
      ]),
      context(),
    );
    expect(rows.map((row) => [row.recommendationType, row.resourceName])).toEqual([
      ['StopIdle', 'a'],
      ['StopIdle', 'b'],
      ['PurchaseReservedCapacity', '2 x Standard_D2s_v3'],
    ]);
  });

  it('ignores duplicate resource entries', () => {
    const warn = vi.fn();
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() };
    const twin = vm('twin', { size: 'Standard_D2s_v3' });
    const rows = generateRecommendations(
      snapshotOf([
        [twin, 0.6],
        [twin, 0.6],
      ]),
      context({ logger }),
    );
    expect(rows.map((row) => row.recommendationType)).toEqual(['StopIdle']);
    expect(warn).toHaveBeenCalledWith('duplicate resource ignored', { ownerScope: 'sub-1', resourceId: twin.id });
  });

  it('skips a resource whose evaluation throws and keeps the rest', () => {
    const flaky: PricingTable = {
      hourlyCost: (size, region) => {
        if (size === 'Standard_Flaky') throw new Error('price feed down');
        return pricing.hourlyCost(size, region);
      },
    };
    const warn = vi.fn();
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() };
    const flakyVm = vm('flaky', { size: 'Standard_Flaky' });

    const rows = generateRecommendations(
      snapshotOf([
        [flakyVm, 0.5],
        [vm('web-01'), 2],
      ]),
      context({ pricing: flaky, logger }),
    );

    expect(rows.map((row) => [row.recommendationType, row.resourceName])).toEqual([['Rightsize', 'web-01']]);
    expect(warn).toHaveBeenCalledWith('idle-resources skipped item', {
      item: flakyVm.id,
      error: 'price feed down',
    });
  });
});

describe('summarizeByOwnerScope', () => {
  it('totals recommendations per owner scope, largest savings first', () => {
    const rows = generateRecommendations(mixedSnapshot(), context());
    const summary = summarizeByOwnerScope(rows);

    expect(summary.map((entry) => entry.ownerScope)).toEqual(['sub-1', '111111111111']);
    const [azure, aws] = summary;
    expect(azure?.rightsizeCount).toBe(3);
    expect(azure?.stopIdleCount).toBe(2);
    expect(azure?.reservedCapacityCount).toBe(2);
    expect(azure?.recommendationCount).toBe(7);
    expect(aws?.recommendationCount).toBe(2);
    expect(totalMonthlySavings(rows)).toBeCloseTo(
      summary.reduce((sum, entry) => sum + entry.totalMonthlySavings, 0),
      6,
    );
  });
});
