import { mkdtemp, writeFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { loadConfig } from '../../src/config/loader.js';
import { ConfigError } from '../../src/config/types.js';
import { engineSettingsFromConfig } from '../../src/domain/context.js';

const tempPaths: string[] = [];

afterEach(async () => {
  delete process.env.COST_OPT_AWS_PROFILE;
  for (const path of tempPaths.splice(0, tempPaths.length)) {
    await rm(path, { recursive: true, force: true });
  }
});

const writeTempConfig = async (content: string, name = 'config.yaml'): Promise<{ dir: string; path: string }> => {
  const dir = await mkdtemp(join(tmpdir(), 'cost-opt-'));
  tempPaths.push(dir);
  const path = join(dir, name);
  await writeFile(path, content, 'utf8');
  return { dir, path };
};

describe('loadConfig', () => {
  it('loads a minimal snapshot config and applies defaults', async () => {
    const { dir, path } = await writeTempConfig(`providers:
  snapshot:
    path: ./snapshot.yaml
`);

    const config = await loadConfig(path);
    expect(config.lookbackDays).toBe(30);
    expect(config.minCpuUtilization).toBe(5);
    expect(config.idleCpuUtilization).toBeUndefined();
    expect(config.minUptimeHours).toBe(168);
    expect(config.format).toBe('html');
    expect(config.reservedCapacity).toEqual({
      minFleetSize: 2,
      longTermFleetSize: 5,
      oneYearDiscount: 0.35,
      threeYearDiscount: 0.6,
    });
    expect(config.catalogPath).toBe(join(dir, 'catalog.yaml'));
    expect(config.providers.snapshot?.path).toBe(join(dir, 'snapshot.yaml'));
    expect(config.providers.aws.enabled).toBe(false);
  });

  it('reads JSON configs', async () => {
    const { path } = await writeTempConfig(
      JSON.stringify({ lookbackDays: 14, providers: { snapshot: { path: 'inv.json' } } }),
      'config.json',
    );
    const config = await loadConfig(path);
    expect(config.lookbackDays).toBe(14);
  });

  it('derives the idle threshold as a fifth of the underutilization threshold', async () => {
    const { path } = await writeTempConfig(`minCpuUtilization: 10
providers:
  snapshot:
    path: ./snapshot.yaml
`);
    const settings = engineSettingsFromConfig(await loadConfig(path));
    expect(settings.thresholds).toEqual({ idle: 2, underutilized: 10 });
    expect(settings.reservedCapacity.discounts).toEqual({ oneYear: 0.35, threeYear: 0.6 });
  });

  it('applies CLI overrides', async () => {
    const { path } = await writeTempConfig(`providers:
  snapshot:
    enabled: false
    path: ./snapshot.yaml
`);
    const config = await loadConfig(path, { outputPath: 'out.json', format: 'json', snapshotPath: 'local.yaml' });
    expect(config.outputPath).toBe('out.json');
    expect(config.format).toBe('json');
    expect(config.providers.snapshot).toEqual({ enabled: true, path: resolve('local.yaml') });
  });

  it('COST_OPT_AWS_PROFILE switches AWS to profile auth', async () => {
    const { path } = await writeTempConfig(`providers:
  aws:
    enabled: true
    accounts:
      - id: "111111111111"
`);
    process.env.COST_OPT_AWS_PROFILE = 'audit';
    const config = await loadConfig(path);
    expect(config.providers.aws.auth).toBe('profile');
    expect(config.providers.aws.profile).toBe('audit');
    expect(config.providers.aws.regions).toEqual(['us-east-1']);
  });

  it('COST_OPT_AWS_PROFILE takes precedence over per-account profiles', async () => {
    const { path } = await writeTempConfig(`providers:
  aws:
    enabled: true
    auth: profile
    profile: default
    accounts:
      - id: "111111111111"
        profile: staging
`);
    process.env.COST_OPT_AWS_PROFILE = 'audit';
    const config = await loadConfig(path);
    expect(config.providers.aws.profile).toBe('audit');
    expect(config.providers.aws.accounts).toEqual([{ id: '111111111111' }]);
  });

  it('loads an Azure subscription block', async () => {
    const { path } = await writeTempConfig(`providers:
  azure:
    enabled: true
    tenantId: aaaaaaaa-0000-4000-8000-00000000000a
    subscriptions:
      - aaaaaaaa-0000-4000-8000-000000000001
    regions: [eastus]
`);
    const config = await loadConfig(path);
    expect(config.providers.azure).toEqual({
      enabled: true,
      tenantId: 'aaaaaaaa-0000-4000-8000-00000000000a',
      subscriptions: ['aaaaaaaa-0000-4000-8000-000000000001'],
      regions: ['eastus'],
    });
  });

  it('requires a subscription when Azure is enabled', async () => {
    const { path } = await writeTempConfig(`providers:
  azure:
    enabled: true
`);
    await expect(loadConfig(path)).rejects.toThrow('providers.azure.subscriptions: at least one subscription is required');
  });

  it('rejects subscription ids that are not GUIDs', async () => {
    const { path } = await writeTempConfig(`providers:
  azure:
    enabled: true
    subscriptions: [sub-demo]
`);
    await expect(loadConfig(path)).rejects.toThrow('providers.azure.subscriptions.0: must be an Azure subscription id');
  });

  it('requires a profile per account under profile auth', async () => {
    const { path } = await writeTempConfig(`providers:
  aws:
    enabled: true
    auth: profile
    accounts:
      - id: "111111111111"
`);
    await expect(loadConfig(path)).rejects.toThrow('accounts.0.profile: a profile is required when auth is "profile"');
  });

  it('rejects malformed account ids', async () => {
    const { path } = await writeTempConfig(`providers:
  aws:
    enabled: true
    accounts:
      - id: "1234"
`);
    await expect(loadConfig(path)).rejects.toThrow('must be a 12-digit AWS account id');
  });

  it('rejects an idle threshold above the underutilization threshold', async () => {
    const { path } = await writeTempConfig(`minCpuUtilization: 5
idleCpuUtilization: 8
providers:
  snapshot:
    path: ./snapshot.yaml
`);
    await expect(loadConfig(path)).rejects.toThrow('idleCpuUtilization: must not exceed minCpuUtilization');
  });

  it('rejects a lookback window outside 1..90 days', async () => {
    const { path } = await writeTempConfig(`lookbackDays: 120
providers:
  snapshot:
    path: ./snapshot.yaml
`);
    await expect(loadConfig(path)).rejects.toBeInstanceOf(ConfigError);
  });

  it('requires at least one enabled provider', async () => {
    const { path } = await writeTempConfig('lookbackDays: 7\n');
    await expect(loadConfig(path)).rejects.toThrow(
      'At least one provider must be enabled (providers.aws, providers.azure or providers.snapshot)',
    );
  });

  it('reports a missing file', async () => {
    await expect(loadConfig('./no-such-config.yaml')).rejects.toThrow(
      `Config file not found: ${resolve('./no-such-config.yaml')}`,
    );
  });

  it('reports a file that is not a mapping', async () => {
    const { path } = await writeTempConfig('- just\n- a list\n');
    await expect(loadConfig(path)).rejects.toThrow(`Invalid config format in ${path}`);
  });
});
