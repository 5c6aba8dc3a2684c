import {
  CostExplorerClient,
  GetCostAndUsageCommand,
  type GetCostAndUsageCommandInput,
  type GetCostAndUsageCommandOutput,
} from '@aws-sdk/client-cost-explorer';
import type { AwsProviderConfig } from '../config/types.js';
import { silentLogger, type Logger } from '../logger.js';
import { accountProfile } from './aws.js';

const DAY_MS = 24 * 60 * 60 * 1000;
// Cost Explorer is served from a single global endpoint.
const COST_EXPLORER_REGION = 'us-east-1';

export interface CostExplorerGateway {
  costAndUsage(input: GetCostAndUsageCommandInput): Promise<GetCostAndUsageCommandOutput>;
}

export const createCostExplorerGateway = (profile?: string): CostExplorerGateway => {
  const client = new CostExplorerClient({ region: COST_EXPLORER_REGION, profile });
  return { costAndUsage: (input) => client.send(new GetCostAndUsageCommand(input)) };
};

export interface CostBreakdown {
  key: string;
  amount: number;
}

export interface DailyCost {
  date: string;
  amount: number;
}

export interface AccountCostSummary {
  accountId: string;
  /** Inclusive start date, YYYY-MM-DD. */
  start: string;
  /** Exclusive end date, YYYY-MM-DD. */
  end: string;
  currency: string;
  total: number;
  byService: CostBreakdown[];
  byRegion: CostBreakdown[];
  daily: DailyCost[];
}

const isoDate = (date: Date): string => date.toISOString().slice(0, 10);

/** Whole UTC days ending today (exclusive), as Cost Explorer expects. */
export const costWindow = (now: Date, lookbackDays: number): { start: string; end: string } => {
  const end = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
  const start = new Date(end.getTime() - lookbackDays * DAY_MS);
  return { start: isoDate(start), end: isoDate(end) };
};

interface GroupedCost {
  date: string;
  key: string;
  amount: number;
  unit?: string;
}

const fetchGrouped = async (
  gateway: CostExplorerGateway,
  accountId: string,
  window: { start: string; end: string },
  dimension: 'SERVICE' | 'REGION',
): Promise<GroupedCost[]> => {
  const out: GroupedCost[] = [];
  let nextPageToken: string | undefined;
  do {
    const response = await gateway.costAndUsage({
      TimePeriod: { Start: window.start, End: window.end },
      Granularity: 'DAILY',
      Metrics: ['UnblendedCost'],
      GroupBy: [{ Type: 'DIMENSION', Key: dimension }],
      Filter: { Dimensions: { Key: 'LINKED_ACCOUNT', Values: [accountId] } },
      NextPageToken: nextPageToken,
    });
    for (const result of response.ResultsByTime ?? []) {
      const date = result.TimePeriod?.Start;
      if (!date) continue;
      for (const group of result.Groups ?? []) {
        const cost = group.Metrics?.UnblendedCost;
        const amount = Number(cost?.Amount ?? 0);
        if (!Number.isFinite(amount)) continue;
        out.push({ date, key: group.Keys?.[0] ?? 'Unknown', amount, unit: cost?.Unit });
      }
    }
    nextPageToken = response.NextPageToken;
  } while (nextPageToken);
  return out;
};

const sumBy = (rows: GroupedCost[], field: 'key' | 'date'): Map<string, number> => {
  const totals = new Map<string, number>();
  for (const row of rows) {
    totals.set(row[field], (totals.get(row[field]) ?? 0) + row.amount);
  }
  return totals;
};

const breakdown = (rows: GroupedCost[]): CostBreakdown[] =>
  [...sumBy(rows, 'key')]
    .map(([key, amount]) => ({ key, amount }))
    .filter((entry) => entry.amount > 0)
    .sort((a, b) => b.amount - a.amount);

export const summarizeAccountCosts = async (
  gateway: CostExplorerGateway,
  accountId: string,
  window: { start: string; end: string },
): Promise<AccountCostSummary> => {
  const byService = await fetchGrouped(gateway, accountId, window, 'SERVICE');
  const byRegion = await fetchGrouped(gateway, accountId, window, 'REGION');

  const daily = [...sumBy(byService, 'date')]
    .map(([date, amount]) => ({ date, amount }))
    .sort((a, b) => a.date.localeCompare(b.date));

  return {
    accountId,
    start: window.start,
    end: window.end,
    currency: byService.find((row) => row.unit)?.unit ?? 'USD',
    total: daily.reduce((sum, day) => sum + day.amount, 0),
    byService: breakdown(byService),
    byRegion: breakdown(byRegion),
    daily,
  };
};

export interface AwsCostSummaryOptions {
  config: AwsProviderConfig;
  lookbackDays: number;
  logger?: Logger;
  gatewayFor?: (profile: string | undefined) => CostExplorerGateway;
  now?: Date;
}

/** Unblended spend per configured account over the lookback window. */
export const summarizeAwsCosts = async (options: AwsCostSummaryOptions): Promise<AccountCostSummary[]> => {
  const logger = options.logger ?? silentLogger;
  const gatewayFor = options.gatewayFor ?? createCostExplorerGateway;
  const window = costWindow(options.now ?? new Date(), options.lookbackDays);

  return Promise.all(
    options.config.accounts.map(async (account) => {
      logger.debug('aws costAndUsage start', { accountId: account.id, ...window });
      const summary = await summarizeAccountCosts(gatewayFor(accountProfile(options.config, account.id)), account.id, window);
      logger.debug('aws costAndUsage end', { accountId: account.id, total: summary.total, days: summary.daily.length });
      return summary;
    }),
  );
};

/** Console lines for one account: the total, then the three largest services and regions. */
export const formatCostSummary = (summary: AccountCostSummary): string[] => {
  const top = (entries: CostBreakdown[]): string =>
    entries.length === 0
      ? 'none'
      : entries
          .slice(0, 3)
          .map((entry) => `${entry.key} ${entry.amount.toFixed(2)}`)
          .join(', ');
  return [
    `${summary.accountId} ${summary.start}..${summary.end}: ${summary.currency} ${summary.total.toFixed(2)}`,
    `  services: ${top(summary.byService)}`,
    `  regions: ${top(summary.byRegion)}`,
  ];
};
