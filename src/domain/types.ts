export type CloudProvider = 'aws' | 'azure';

export type PowerState = 'running' | 'stopped' | 'deallocated' | 'unknown';

export interface ComputeResource {
  /** Provider-native identifier (instance ARN, Azure resource URI). */
  id: string;
  name: string;
  region: string;
  size: string;
  osType: string;
  resourceGroupOrAccount: string;
  tags: Record<string, string>;
  powerState: PowerState;
  /** Billing account or subscription the resource is queried under. */
  ownerScope: string;
  provider: CloudProvider;
  /** ISO-8601 launch time, when the provider reports one. */
  launchedAt?: string;
}

/** Average CPU percentage per resource id over the lookback window. */
export type UtilizationSamples = ReadonlyMap<string, number>;

export interface ResourceSnapshot {
  resources: readonly ComputeResource[];
  utilization: UtilizationSamples;
}

export type UtilizationBand = 'Idle' | 'Underutilized' | 'RightSized';

export type RecommendationType = 'Rightsize' | 'StopIdle' | 'PurchaseReservedCapacity';

export type Confidence = 'Low' | 'Medium' | 'High';

export type StateMap = Record<string, string | number>;

export interface Recommendation {
  resourceId: string;
  resourceName: string;
  ownerScope: string;
  resourceGroupOrAccount: string;
  region: string;
  recommendationType: RecommendationType;
  currentState: StateMap;
  recommendedState: StateMap;
  estimatedMonthlySavings: number;
  confidence: Confidence;
  details: string;
}

export interface OwnerScopeSummary {
  ownerScope: string;
  recommendationCount: number;
  rightsizeCount: number;
  stopIdleCount: number;
  reservedCapacityCount: number;
  totalMonthlySavings: number;
}
