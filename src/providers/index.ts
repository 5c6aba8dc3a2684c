import type { AppConfig } from '../config/types.js';
import type { Logger } from '../logger.js';
import { AwsComputeProvider } from './aws.js';
import { AzureComputeProvider } from './azure.js';
import { loadSnapshotProvider } from './snapshot.js';
import type { ComputeProvider } from './types.js';

export const createProviders = async (config: AppConfig, logger: Logger): Promise<ComputeProvider[]> => {
  const providers: ComputeProvider[] = [];
  const { aws, azure, snapshot } = config.providers;

  if (aws.enabled) {
    providers.push(new AwsComputeProvider({ config: aws, logger }));
  }

  if (azure.enabled) {
    providers.push(new AzureComputeProvider({ config: azure, logger }));
  }

  if (snapshot?.enabled) {
    providers.push(await loadSnapshotProvider(snapshot.path, snapshot.scopes, logger));
  }

  logger.debug('providers created', { providers: providers.map((provider) => provider.name) });
  return providers;
};
