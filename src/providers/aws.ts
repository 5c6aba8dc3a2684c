import { CloudWatchClient, GetMetricStatisticsCommand, type Datapoint } from '@aws-sdk/client-cloudwatch';
import {
  DescribeInstancesCommand,
  EC2Client,
  type DescribeInstancesCommandOutput,
  type Instance,
} from '@aws-sdk/client-ec2';
import type { AwsProviderConfig } from '../config/types.js';
import type { ComputeResource, PowerState } from '../domain/types.js';
import { silentLogger, type Logger } from '../logger.js';
import type { ComputeProvider } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const INSTANCE_ARN = /^arn:aws[a-z-]*:ec2:([a-z0-9-]+):(\d{12}):instance\/(i-[0-9a-f]+)$/;

/** The two AWS calls the provider needs, scoped to one account's credentials. */
export interface AwsGateway {
  describeInstances(region: string, nextToken?: string): Promise<DescribeInstancesCommandOutput>;
  cpuDatapoints(region: string, instanceId: string, start: Date, end: Date): Promise<Datapoint[]>;
}

export const createAwsGateway = (profile?: string): AwsGateway => {
  const ec2Clients = new Map<string, EC2Client>();
  const cloudWatchClients = new Map<string, CloudWatchClient>();

  const ec2For = (region: string): EC2Client => {
    const client = ec2Clients.get(region) ?? new EC2Client({ region, profile });
    ec2Clients.set(region, client);
    return client;
  };

  const cloudWatchFor = (region: string): CloudWatchClient => {
    const client = cloudWatchClients.get(region) ?? new CloudWatchClient({ region, profile });
    cloudWatchClients.set(region, client);
    return client;
  };

  return {
    describeInstances: (region, nextToken) =>
      ec2For(region).send(new DescribeInstancesCommand({ NextToken: nextToken, MaxResults: 1000 })),
    cpuDatapoints: async (region, instanceId, start, end) => {
      const response = await cloudWatchFor(region).send(
        new GetMetricStatisticsCommand({
          Namespace: 'AWS/EC2',
          MetricName: 'CPUUtilization',
          Dimensions: [{ Name: 'InstanceId', Value: instanceId }],
          StartTime: start,
          EndTime: end,
          Period: 86400,
          Statistics: ['Average'],
        }),
      );
      return response.Datapoints ?? [];
    },
  };
};

export const instanceArn = (region: string, accountId: string, instanceId: string): string =>
  `arn:aws:ec2:${region}:${accountId}:instance/${instanceId}`;

export const parseInstanceArn = (
  arn: string,
): { region: string; accountId: string; instanceId: string } | undefined => {
  const match = INSTANCE_ARN.exec(arn);
  if (!match) return undefined;
  const [, region, accountId, instanceId] = match;
  if (!region || !accountId || !instanceId) return undefined;
  return { region, accountId, instanceId };
};

const toPowerState = (state: string | undefined): PowerState => {
  switch (state) {
    case 'running':
      return 'running';
    case 'stopped':
    case 'stopping':
      return 'stopped';
    default:
      return 'unknown';
  }
};

const toResource = (instance: Instance, region: string, accountId: string): ComputeResource | undefined => {
  if (!instance.InstanceId || !instance.InstanceType) return undefined;
  const tags: Record<string, string> = {};
  for (const tag of instance.Tags ?? []) {
    if (tag.Key) tags[tag.Key] = tag.Value ?? '';
  }

  return {
    id: instanceArn(region, accountId, instance.InstanceId),
    name: tags.Name ?? instance.InstanceId,
    region,
    size: instance.InstanceType,
    osType: instance.PlatformDetails ?? 'Linux/UNIX',
    resourceGroupOrAccount: accountId,
    tags,
    powerState: toPowerState(instance.State?.Name),
    ownerScope: accountId,
    provider: 'aws',
    launchedAt: instance.LaunchTime?.toISOString(),
  };
};

/** Named profile for an account under profile auth; an account's own profile beats the shared one. */
export const accountProfile = (config: AwsProviderConfig, accountId: string): string | undefined => {
  if (config.auth !== 'profile') return undefined;
  const account = config.accounts.find((candidate) => candidate.id === accountId);
  return account?.profile ?? config.profile;
};

export interface AwsComputeProviderOptions {
  config: AwsProviderConfig;
  logger?: Logger;
  gatewayFor?: (profile: string | undefined) => AwsGateway;
  now?: () => Date;
}

/** EC2 inventory and CloudWatch CPU averages, one owner scope per configured account. */
export class AwsComputeProvider implements ComputeProvider {
  readonly name = 'aws';
  private readonly config: AwsProviderConfig;
  private readonly logger: Logger;
  private readonly gatewayFor: (profile: string | undefined) => AwsGateway;
  private readonly now: () => Date;
  private readonly gateways = new Map<string, AwsGateway>();

  constructor(options: AwsComputeProviderOptions) {
    this.config = options.config;
    this.logger = options.logger ?? silentLogger;
    this.gatewayFor = options.gatewayFor ?? createAwsGateway;
    this.now = options.now ?? (() => new Date());
  }

  private gateway(accountId: string): AwsGateway {
    const existing = this.gateways.get(accountId);
    if (existing) return existing;
    const created = this.gatewayFor(accountProfile(this.config, accountId));
    this.gateways.set(accountId, created);
    return created;
  }

  async listScopes(): Promise<string[]> {
    return this.config.accounts.map((account) => account.id);
  }

  async listResources(accountId: string): Promise<ComputeResource[]> {
    if (!this.config.includeServices.includes('ec2')) {
      this.logger.debug('aws listResources skipped: ec2 not included', { accountId });
      return [];
    }

    const gateway = this.gateway(accountId);
    const out: ComputeResource[] = [];

    for (const region of this.config.regions) {
      this.logger.debug('aws describeInstances start', { accountId, region });
      let nextToken: string | undefined;
      let page = 0;
      do {
        page += 1;
        const response = await gateway.describeInstances(region, nextToken);
        for (const reservation of response.Reservations ?? []) {
          if (reservation.OwnerId && reservation.OwnerId !== accountId) {
            throw new Error(
              `Credentials for account ${accountId} returned instances owned by ${reservation.OwnerId}`,
            );
          }
          for (const instance of reservation.Instances ?? []) {
            const resource = toResource(instance, region, accountId);
            if (resource) out.push(resource);
          }
        }
        nextToken = response.NextToken;
        this.logger.debug('aws describeInstances page', { accountId, region, page, cumulative: out.length });
      } while (nextToken);
    }

    return out;
  }

  async averageUtilization(resourceId: string, windowDays: number): Promise<number | undefined> {
    const parsed = parseInstanceArn(resourceId);
    if (!parsed) {
      throw new Error(`Not an EC2 instance ARN: ${resourceId}`);
    }

    const end = this.now();
    const start = new Date(end.getTime() - windowDays * DAY_MS);
    const datapoints = await this.gateway(parsed.accountId).cpuDatapoints(parsed.region, parsed.instanceId, start, end);
    const averages = datapoints
      .map((point) => point.Average)
      .filter((value): value is number => typeof value === 'number');

    if (averages.length === 0) return undefined;
    return averages.reduce((sum, value) => sum + value, 0) / averages.length;
  }
}
