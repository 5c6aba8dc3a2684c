import type { ComputeResource, Confidence, UtilizationBand } from './types.js';

export interface UtilizationThresholds {
  idle: number;
  underutilized: number;
}

const MS_PER_HOUR = 60 * 60 * 1000;

export const classifyUtilization = (avgCpuUtilization: number, thresholds: UtilizationThresholds): UtilizationBand => {
  // Idle is clamped so it can never exceed the underutilization threshold.
  const idle = Math.min(thresholds.idle, thresholds.underutilized);
  if (avgCpuUtilization < idle) return 'Idle';
  if (avgCpuUtilization < thresholds.underutilized) return 'Underutilized';
  return 'RightSized';
};

export const confidenceFor = (avgCpuUtilization: number, threshold: number, highConfidenceFraction: number): Confidence =>
  avgCpuUtilization < threshold * highConfidenceFraction ? 'High' : 'Medium';

export const uptimeHours = (resource: ComputeResource, now: Date): number | undefined => {
  if (!resource.launchedAt) return undefined;
  const launched = Date.parse(resource.launchedAt);
  if (Number.isNaN(launched)) return undefined;
  return (now.getTime() - launched) / MS_PER_HOUR;
};

/** Running, and not launched more recently than the minimum uptime when the launch time is known. */
export const isEligibleForUtilizationAnalysis = (resource: ComputeResource, now: Date, minUptimeHours: number): boolean => {
  if (resource.powerState !== 'running') return false;
  const hours = uptimeHours(resource, now);
  return hours === undefined || hours >= minUptimeHours;
};
