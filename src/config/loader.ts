import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { env } from 'node:process';
import yaml from 'js-yaml';
import type { z } from 'zod';
import { silentLogger, type Logger } from '../logger.js';
import { AppConfigSchema, ConfigError, type AppConfig, type ConfigOverrides } from './types.js';

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const parseByExtension = (raw: string, path: string): unknown => {
  if (path.endsWith('.json')) {
    return JSON.parse(raw);
  }
  return yaml.load(raw);
};

export const readStructuredFile = async (
  path: string,
  label: string,
  logger: Logger,
): Promise<{ absPath: string; parsed: Record<string, unknown> }> => {
  const absPath = resolve(path);

  let raw: string;
  try {
    raw = await readFile(absPath, 'utf8');
  } catch (error) {
    logger.debug('readStructuredFile readFile failed', { absPath, error });
    throw new ConfigError(`${label} file not found: ${absPath}`);
  }

  let parsed: unknown;
  try {
    parsed = parseByExtension(raw, absPath);
  } catch (error) {
    logger.debug('readStructuredFile parse failed', { absPath, error });
    throw new ConfigError(`Invalid ${label.toLowerCase()} format in ${absPath}`);
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Invalid ${label.toLowerCase()} format in ${absPath}`);
  }
  return { absPath, parsed };
};

export const parseWithSchema = <S extends z.ZodTypeAny>(schema: S, input: unknown, absPath: string): z.infer<S> => {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration in ${absPath}:\n${issues.join('\n')}`);
  }
  return result.data;
};

const applyOverrides = (input: Record<string, unknown>, overrides: ConfigOverrides | undefined, logger: Logger): void => {
  if (overrides?.outputPath) {
    logger.debug('loadConfig applying outputPath override', { outputPath: overrides.outputPath });
    input.outputPath = overrides.outputPath;
  }

  if (overrides?.format) {
    logger.debug('loadConfig applying format override', { format: overrides.format });
    input.format = overrides.format;
  }

  const providers = isRecord(input.providers) ? { ...input.providers } : {};

  if (overrides?.snapshotPath) {
    logger.debug('loadConfig applying snapshot override', { snapshotPath: overrides.snapshotPath });
    const existing = isRecord(providers.snapshot) ? providers.snapshot : {};
    // CLI paths are relative to the working directory, not the config file.
    providers.snapshot = { ...existing, enabled: true, path: resolve(overrides.snapshotPath) };
  }

  const profile = env.COST_OPT_AWS_PROFILE?.trim();
  if (profile) {
    const aws = isRecord(providers.aws) ? providers.aws : {};
    // The env profile applies to every account, so per-account profiles are dropped.
    const accounts = Array.isArray(aws.accounts)
      ? aws.accounts.map((account: unknown) => (isRecord(account) ? { id: account.id } : account))
      : aws.accounts;
    providers.aws = { ...aws, auth: 'profile', profile, accounts };
    logger.debug('COST_OPT_AWS_PROFILE env override applied');
  }

  input.providers = providers;
};

export const loadConfig = async (
  configPath: string,
  overrides?: ConfigOverrides,
  logger: Logger = silentLogger,
): Promise<AppConfig> => {
  logger.debug('loadConfig start', { configPath, overrides });
  const { absPath, parsed } = await readStructuredFile(configPath, 'Config', logger);

  const configInput = { ...parsed };
  applyOverrides(configInput, overrides, logger);

  const config = parseWithSchema(AppConfigSchema, configInput, absPath);

  const { aws, azure, snapshot } = config.providers;
  if (!aws.enabled && !azure.enabled && !snapshot?.enabled) {
    throw new ConfigError(
      'At least one provider must be enabled (providers.aws, providers.azure or providers.snapshot)',
    );
  }

  const baseDir = dirname(absPath);
  const resolved: AppConfig = {
    ...config,
    catalogPath: resolve(baseDir, config.catalogPath),
    providers: {
      aws,
      azure,
      snapshot: snapshot ? { ...snapshot, path: resolve(baseDir, snapshot.path) } : undefined,
    },
  };

  logger.debug('loadConfig end', {
    lookbackDays: resolved.lookbackDays,
    minCpuUtilization: resolved.minCpuUtilization,
    aws: aws.enabled,
    azure: azure.enabled,
    snapshot: Boolean(snapshot?.enabled),
  });
  return resolved;
};
