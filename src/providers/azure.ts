import { ComputeManagementClient } from '@azure/arm-compute';
import { MonitorClient } from '@azure/arm-monitor';
import { DefaultAzureCredential } from '@azure/identity';
import type { AzureProviderConfig } from '../config/types.js';
import type { ComputeResource, PowerState } from '../domain/types.js';
import { describeError, silentLogger, type Logger } from '../logger.js';
import type { ComputeProvider } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const VM_RESOURCE_ID =
  /^\/subscriptions\/([^/]+)\/resourceGroups\/([^/]+)\/providers\/Microsoft\.Compute\/virtualMachines\/([^/]+)$/i;

/** The VM fields the provider reads from a `virtualMachines.listAll` page. */
export interface AzureVirtualMachine {
  id?: string;
  name?: string;
  location: string;
  vmSize?: string;
  osType?: string;
  tags?: Record<string, string>;
  timeCreated?: Date;
}

/** Compute and Monitor calls the provider needs, addressed by subscription. */
export interface AzureGateway {
  listVirtualMachines(subscriptionId: string): Promise<AzureVirtualMachine[]>;
  /** The `PowerState/*` status code from the VM instance view, if any. */
  powerStateCode(subscriptionId: string, resourceGroup: string, vmName: string): Promise<string | undefined>;
  cpuAverages(subscriptionId: string, resourceUri: string, start: Date, end: Date): Promise<number[]>;
}

export const createAzureGateway = (tenantId?: string): AzureGateway => {
  const credential = new DefaultAzureCredential({ tenantId });
  const computeClients = new Map<string, ComputeManagementClient>();
  const monitorClients = new Map<string, MonitorClient>();

  const computeFor = (subscriptionId: string): ComputeManagementClient => {
    const client = computeClients.get(subscriptionId) ?? new ComputeManagementClient(credential, subscriptionId);
    computeClients.set(subscriptionId, client);
    return client;
  };

  const monitorFor = (subscriptionId: string): MonitorClient => {
    const client = monitorClients.get(subscriptionId) ?? new MonitorClient(credential, subscriptionId);
    monitorClients.set(subscriptionId, client);
    return client;
  };

  return {
    listVirtualMachines: async (subscriptionId) => {
      const out: AzureVirtualMachine[] = [];
      for await (const vm of computeFor(subscriptionId).virtualMachines.listAll()) {
        out.push({
          id: vm.id,
          name: vm.name,
          location: vm.location,
          vmSize: vm.hardwareProfile?.vmSize,
          osType: vm.storageProfile?.osDisk?.osType,
          tags: vm.tags,
          timeCreated: vm.timeCreated,
        });
      }
      return out;
    },
    powerStateCode: async (subscriptionId, resourceGroup, vmName) => {
      const view = await computeFor(subscriptionId).virtualMachines.instanceView(resourceGroup, vmName);
      return view.statuses?.find((status) => status.code?.startsWith('PowerState/'))?.code;
    },
    cpuAverages: async (subscriptionId, resourceUri, start, end) => {
      const response = await monitorFor(subscriptionId).metrics.list(resourceUri, {
        timespan: `${start.toISOString()}/${end.toISOString()}`,
        interval: 'P1D',
        metricnames: 'Percentage CPU',
        aggregation: 'Average',
      });
      return response.value.flatMap((metric) =>
        (metric.timeseries ?? []).flatMap((series) =>
          (series.data ?? [])
            .map((point) => point.average)
            .filter((value): value is number => typeof value === 'number'),
        ),
      );
    },
  };
};

export const parseVmResourceId = (
  id: string,
): { subscriptionId: string; resourceGroup: string; name: string } | undefined => {
  const match = VM_RESOURCE_ID.exec(id);
  if (!match) return undefined;
  const [, subscriptionId, resourceGroup, name] = match;
  if (!subscriptionId || !resourceGroup || !name) return undefined;
  return { subscriptionId, resourceGroup, name };
};

export const toPowerState = (code: string | undefined): PowerState => {
  switch (code?.toLowerCase()) {
    case 'powerstate/running':
      return 'running';
    case 'powerstate/deallocated':
    case 'powerstate/deallocating':
      return 'deallocated';
    case 'powerstate/stopped':
    case 'powerstate/stopping':
      return 'stopped';
    default:
      return 'unknown';
  }
};

export interface AzureComputeProviderOptions {
  config: AzureProviderConfig;
  logger?: Logger;
  gateway?: AzureGateway;
  now?: () => Date;
}

/** Azure VMs and Azure Monitor CPU averages, one owner scope per configured subscription. */
export class AzureComputeProvider implements ComputeProvider {
  readonly name = 'azure';
  private readonly config: AzureProviderConfig;
  private readonly logger: Logger;
  private readonly gateway: AzureGateway;
  private readonly now: () => Date;

  constructor(options: AzureComputeProviderOptions) {
    this.config = options.config;
    this.logger = options.logger ?? silentLogger;
    this.gateway = options.gateway ?? createAzureGateway(options.config.tenantId);
    this.now = options.now ?? (() => new Date());
  }

  async listScopes(): Promise<string[]> {
    return [...this.config.subscriptions];
  }

  async listResources(subscriptionId: string): Promise<ComputeResource[]> {
    this.logger.debug('azure listVirtualMachines start', { subscriptionId });
    const vms = await this.gateway.listVirtualMachines(subscriptionId);
    const { regions } = this.config;
    const inScope = vms.filter((vm) => !regions || regions.includes(vm.location));

    const resources = await Promise.all(inScope.map((vm) => this.toResource(vm, subscriptionId)));
    const out = resources.filter((resource): resource is ComputeResource => resource !== undefined);
    this.logger.debug('azure listVirtualMachines end', { subscriptionId, listed: vms.length, resources: out.length });
    return out;
  }

  private async toResource(vm: AzureVirtualMachine, subscriptionId: string): Promise<ComputeResource | undefined> {
    const parsed = vm.id ? parseVmResourceId(vm.id) : undefined;
    if (!vm.id || !parsed || !vm.vmSize) {
      this.logger.debug('azure vm skipped: missing id or size', { subscriptionId, id: vm.id });
      return undefined;
    }

    let powerState: PowerState;
    try {
      powerState = toPowerState(await this.gateway.powerStateCode(subscriptionId, parsed.resourceGroup, parsed.name));
    } catch (error) {
      // An unknown power state keeps the VM out of utilization analysis.
      this.logger.warn('azure instance view failed', { resourceId: vm.id, error: describeError(error) });
      powerState = 'unknown';
    }

    return {
      id: vm.id,
      name: vm.name ?? parsed.name,
      region: vm.location,
      size: vm.vmSize,
      osType: vm.osType ?? 'unknown',
      resourceGroupOrAccount: parsed.resourceGroup,
      tags: { ...vm.tags },
      powerState,
      ownerScope: subscriptionId,
      provider: 'azure',
      launchedAt: vm.timeCreated?.toISOString(),
    };
  }

  async averageUtilization(resourceId: string, windowDays: number): Promise<number | undefined> {
    const parsed = parseVmResourceId(resourceId);
    if (!parsed) {
      throw new Error(`Not an Azure VM resource id: ${resourceId}`);
    }

    const end = this.now();
    const start = new Date(end.getTime() - windowDays * DAY_MS);
    const averages = await this.gateway.cpuAverages(parsed.subscriptionId, resourceId, start, end);
    if (averages.length === 0) return undefined;
    return averages.reduce((sum, value) => sum + value, 0) / averages.length;
  }
}
