export const HOURS_PER_MONTH = 24 * 30;

export type ReservedTerm = '1-year' | '3-year';

export interface ReservedTermDiscounts {
  oneYear: number;
  threeYear: number;
}

export interface PricingTable {
  /** On-demand USD/hour, or undefined when the size is not priced in that region. */
  hourlyCost(size: string, region: string): number | undefined;
}

export const monthlyCost = (hourly: number): number => hourly * HOURS_PER_MONTH;

export const termDiscount = (term: ReservedTerm, discounts: ReservedTermDiscounts): number =>
  term === '3-year' ? discounts.threeYear : discounts.oneYear;

export class CatalogPricingTable implements PricingTable {
  private readonly flat: ReadonlyMap<string, number>;
  private readonly regional: ReadonlyMap<string, ReadonlyMap<string, number>>;

  constructor(hourlyPrices: Record<string, number>, regionalPrices: Record<string, Record<string, number>> = {}) {
    this.flat = new Map(Object.entries(hourlyPrices));
    this.regional = new Map(
      Object.entries(regionalPrices).map(([region, prices]) => [region, new Map(Object.entries(prices))] as const),
    );
  }

  hourlyCost(size: string, region: string): number | undefined {
    return this.regional.get(region)?.get(size) ?? this.flat.get(size);
  }
}
