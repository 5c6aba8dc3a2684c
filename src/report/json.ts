import type { ReportInput } from './html.js';

export const renderJsonReport = (input: ReportInput): string =>
  `${JSON.stringify(
    {
      generatedAt: input.generatedAt.toISOString(),
      lookbackDays: input.config.lookbackDays,
      totalMonthlySavings: input.totalMonthlySavings,
      summary: input.summary,
      recommendations: input.recommendations,
    },
    null,
    2,
  )}\n`;
