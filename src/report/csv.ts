import type { StateMap } from '../domain/types.js';
import type { ReportInput } from './html.js';

const HEADERS = [
  'resourceId',
  'resourceName',
  'ownerScope',
  'resourceGroupOrAccount',
  'region',
  'recommendationType',
  'confidence',
  'estimatedMonthlySavings',
  'currentState',
  'recommendedState',
  'details',
];

export const csvField = (value: string): string => (/[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value);

const formatState = (state: StateMap): string =>
  Object.entries(state)
    .map(([key, value]) => `${key}=${value}`)
    .join('; ');

export const renderCsvReport = (input: ReportInput): string => {
  const rows = input.recommendations.map((row) =>
    [
      row.resourceId,
      row.resourceName,
      row.ownerScope,
      row.resourceGroupOrAccount,
      row.region,
      row.recommendationType,
      row.confidence,
      row.estimatedMonthlySavings.toFixed(2),
      formatState(row.currentState),
      formatState(row.recommendedState),
      row.details,
    ]
      .map(csvField)
      .join(','),
  );
  return `${[HEADERS.join(','), ...rows].join('\n')}\n`;
};
