import type { AppConfig } from '../config/types.js';
import { silentLogger, describeError, type Logger } from '../logger.js';
import type { PricingTable, ReservedTermDiscounts } from './pricing.js';
import type { SizeAdvisor } from './sizeAdvisor.js';
import type { Recommendation } from './types.js';
import type { UtilizationThresholds } from './utilization.js';

export interface ReservedCapacitySettings {
  minFleetSize: number;
  /** Groups strictly larger than this get the 3-year term and High confidence. */
  longTermFleetSize: number;
  discounts: ReservedTermDiscounts;
}

export interface EngineSettings {
  lookbackDays: number;
  thresholds: UtilizationThresholds;
  minUptimeHours: number;
  highConfidenceFraction: number;
  reservedCapacity: ReservedCapacitySettings;
}

export interface EngineContext {
  settings: EngineSettings;
  pricing: PricingTable;
  sizeAdvisor: SizeAdvisor;
  logger?: Logger;
  /** Reference time for uptime checks. */
  now?: Date;
}

export type GeneratorContext = Required<EngineContext>;

export const resolveContext = (context: EngineContext): GeneratorContext => ({
  settings: context.settings,
  pricing: context.pricing,
  sizeAdvisor: context.sizeAdvisor,
  logger: context.logger ?? silentLogger,
  now: context.now ?? new Date(),
});

export const engineSettingsFromConfig = (config: AppConfig): EngineSettings => ({
  lookbackDays: config.lookbackDays,
  thresholds: {
    idle: config.idleCpuUtilization ?? config.minCpuUtilization / 5,
    underutilized: config.minCpuUtilization,
  },
  minUptimeHours: config.minUptimeHours,
  highConfidenceFraction: config.highConfidenceFraction,
  reservedCapacity: {
    minFleetSize: config.reservedCapacity.minFleetSize,
    longTermFleetSize: config.reservedCapacity.longTermFleetSize,
    discounts: {
      oneYear: config.reservedCapacity.oneYearDiscount,
      threeYear: config.reservedCapacity.threeYearDiscount,
    },
  },
});

/** Runs `evaluate` per item; an item that throws is logged and skipped. */
export const evaluateEach = <T>(
  items: Iterable<T>,
  generator: string,
  logger: Logger,
  describe: (item: T) => string,
  evaluate: (item: T) => Recommendation | undefined,
): Recommendation[] => {
  const out: Recommendation[] = [];
  for (const item of items) {
    try {
      const recommendation = evaluate(item);
      if (recommendation) out.push(recommendation);
    } catch (error) {
      logger.warn(`${generator} skipped item`, { item: describe(item), error: describeError(error) });
    }
  }
  return out;
};

export const formatUsd = (value: number): string => `$${value.toFixed(2)}`;

export const formatPct = (value: number): string => `${value.toFixed(1)}%`;
