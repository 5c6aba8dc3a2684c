import type { ComputeResource } from '../domain/types.js';

export interface InventoryProvider {
  readonly name: string;
  /** Owner scopes (accounts, subscriptions) this provider can list. */
  listScopes(): Promise<string[]>;
  listResources(ownerScope: string): Promise<ComputeResource[]>;
}

export interface MetricsProvider {
  /** Average CPU percentage over the last `windowDays`, or undefined when no datapoints exist. */
  averageUtilization(resourceId: string, windowDays: number): Promise<number | undefined>;
}

export type ComputeProvider = InventoryProvider & MetricsProvider;
