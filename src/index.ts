import { existsSync, realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { buildCatalogModels, loadCatalog } from './config/catalog.js';
import { loadConfig } from './config/loader.js';
import { ConfigError } from './config/types.js';
import { engineSettingsFromConfig } from './domain/context.js';
import { generateRecommendations, summarizeByOwnerScope, totalMonthlySavings } from './domain/recommendations.js';
import { createLogger, describeError } from './logger.js';
import { formatCostSummary, summarizeAwsCosts } from './providers/awsCosts.js';
import { collectSnapshot } from './providers/collect.js';
import { createProviders } from './providers/index.js';
import { writeReport } from './report/index.js';

const VERSION = '0.1.0';

interface CliOptions {
  config: string;
  output?: string;
  format?: string;
  snapshot?: string;
  listResources?: boolean;
  costs?: boolean;
  debug?: boolean;
}

export const run = async (argv: string[]): Promise<void> => {
  const program = new Command();

  program
    .name('cloud-cost-opt')
    .description('Rightsizing, idle-resource and reserved-capacity recommendations for AWS and Azure compute')
    .version(VERSION)
    .option('-c, --config <path>', 'config file path', 'config.yaml')
    .option('-o, --output <path>', 'override report output path')
    .option('-f, --format <format>', 'override report format: html | json | csv')
    .option('-s, --snapshot <path>', 'read resources and utilization from a snapshot file')
    .option('--list-resources', 'print the collected inventory and exit')
    .option('--costs', 'print AWS spend per account over the lookback window and exit')
    .option('-d, --debug', 'enable debug logging');

  program.parse(argv);
  const opts = program.opts<CliOptions>();
  const logger = createLogger({ debug: opts.debug ? true : undefined });
  logger.debug('cli options parsed', { ...opts });

  const config = await loadConfig(
    opts.config,
    { outputPath: opts.output, format: opts.format, snapshotPath: opts.snapshot },
    logger,
  );

  if (opts.costs) {
    if (!config.providers.aws.enabled) {
      throw new ConfigError('--costs needs providers.aws to be enabled');
    }
    const summaries = await summarizeAwsCosts({ config: config.providers.aws, lookbackDays: config.lookbackDays, logger });
    for (const summary of summaries) {
      for (const line of formatCostSummary(summary)) console.log(line);
    }
    return;
  }

  const catalog = await loadCatalog(config.catalogPath, logger);
  const settings = engineSettingsFromConfig(config);
  const { pricing, sizeAdvisor } = buildCatalogModels(catalog, settings.thresholds.underutilized);

  const providers = await createProviders(config, logger);
  const snapshot = await collectSnapshot({ providers, lookbackDays: config.lookbackDays, logger });

  if (opts.listResources) {
    if (snapshot.resources.length === 0) {
      console.log('No resources collected.');
      return;
    }
    console.log('Collected resources:');
    for (const resource of snapshot.resources) {
      const sample = snapshot.utilization.get(resource.id);
      const cpu = sample === undefined ? 'n/a' : `${sample.toFixed(1)}%`;
      console.log(`- ${resource.ownerScope} ${resource.region} ${resource.size} ${resource.powerState} cpu=${cpu} ${resource.id}`);
    }
    return;
  }

  const generatedAt = new Date();
  const recommendations = generateRecommendations(snapshot, { settings, pricing, sizeAdvisor, logger, now: generatedAt });
  const summary = summarizeByOwnerScope(recommendations);
  const total = totalMonthlySavings(recommendations);

  const reportPath = await writeReport(
    {
      outputPath: config.outputPath,
      format: config.format,
      config,
      recommendations,
      summary,
      totalMonthlySavings: total,
      generatedAt,
    },
    logger,
  );

  console.log(`Resources analyzed: ${snapshot.resources.length}`);
  console.log(`Recommendations generated: ${recommendations.length}`);
  console.log(`Estimated monthly savings: $${total.toFixed(2)}`);
  console.log(`Report written to: ${reportPath}`);
};

export const main = async (): Promise<void> => {
  try {
    await run(process.argv);
  } catch (error) {
    console.error(`Error: ${describeError(error)}`);
    process.exitCode = 1;
  }
};

/** True when `scriptPath` (argv[1]) resolves to the module at `moduleUrl`, following symlinks such as npm bin links. */
export const isEntryPoint = (scriptPath: string | undefined, moduleUrl: string): boolean => {
  if (!scriptPath || !existsSync(scriptPath)) return false;
  return realpathSync(scriptPath) === realpathSync(fileURLToPath(moduleUrl));
};

if (isEntryPoint(process.argv[1], import.meta.url)) {
  void main();
}
