import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { ReportFormat } from '../config/types.js';
import { silentLogger, type Logger } from '../logger.js';
import { renderCsvReport } from './csv.js';
import { renderHtmlReport, type ReportInput } from './html.js';
import { renderJsonReport } from './json.js';

export type { ReportInput } from './html.js';

export const renderReport = (format: ReportFormat, input: ReportInput): string => {
  switch (format) {
    case 'json':
      return renderJsonReport(input);
    case 'csv':
      return renderCsvReport(input);
    default:
      return renderHtmlReport(input);
  }
};

export const writeReport = async (
  args: ReportInput & { outputPath: string; format: ReportFormat },
  logger: Logger = silentLogger,
): Promise<string> => {
  logger.debug('writeReport start', { outputPath: args.outputPath, format: args.format, rows: args.recommendations.length });
  const abs = resolve(args.outputPath);
  await writeFile(abs, renderReport(args.format, args), 'utf8');
  logger.debug('writeReport end', { path: abs });
  return abs;
};
