import { z } from 'zod';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const AwsProviderSchema = z
  .object({
    enabled: z.boolean().default(false),
    auth: z.enum(['default', 'profile']).default('default'),
    profile: z.string().min(1).optional(),
    accounts: z
      .array(
        z.object({
          id: z.string().regex(/^\d{12}$/, 'must be a 12-digit AWS account id'),
          profile: z.string().min(1).optional(),
        }),
      )
      .default([]),
    regions: z.array(z.string().min(1)).min(1).default(['us-east-1']),
    includeServices: z.array(z.enum(['ec2'])).default(['ec2']),
  })
  .superRefine((aws, ctx) => {
    if (aws.auth === 'profile') {
      aws.accounts.forEach((account, index) => {
        if (!account.profile && !aws.profile) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['accounts', index, 'profile'],
            message: 'a profile is required when auth is "profile"',
          });
        }
      });
    }
    if (aws.enabled && aws.accounts.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['accounts'], message: 'at least one account is required' });
    }
  });

export const AzureProviderSchema = z
  .object({
    enabled: z.boolean().default(false),
    tenantId: z.string().uuid().optional(),
    subscriptions: z.array(z.string().uuid('must be an Azure subscription id')).default([]),
    regions: z.array(z.string().min(1)).optional(),
  })
  .superRefine((azure, ctx) => {
    if (azure.enabled && azure.subscriptions.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['subscriptions'],
        message: 'at least one subscription is required',
      });
    }
  });

const SnapshotProviderSchema = z.object({
  enabled: z.boolean().default(true),
  path: z.string().min(1),
  scopes: z.array(z.string().min(1)).optional(),
});

const ReservedCapacitySchema = z
  .object({
    minFleetSize: z.number().int().min(2).default(2),
    longTermFleetSize: z.number().int().min(1).default(5),
    oneYearDiscount: z.number().gt(0).lt(1).default(0.35),
    threeYearDiscount: z.number().gt(0).lt(1).default(0.6),
  })
  .default({});

export const AppConfigSchema = z
  .object({
    lookbackDays: z.number().int().min(1).max(90).default(30),
    minCpuUtilization: z.number().gt(0).max(100).default(5),
    idleCpuUtilization: z.number().min(0).max(100).optional(),
    minUptimeHours: z.number().int().min(0).default(168),
    highConfidenceFraction: z.number().gt(0).max(1).default(0.5),
    reservedCapacity: ReservedCapacitySchema,
    catalogPath: z.string().min(1).default('./catalog.yaml'),
    outputPath: z.string().min(1).default('./report.html'),
    format: z.enum(['html', 'json', 'csv']).default('html'),
    providers: z
      .object({
        aws: AwsProviderSchema.default({}),
        azure: AzureProviderSchema.default({}),
        snapshot: SnapshotProviderSchema.optional(),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    if (config.idleCpuUtilization !== undefined && config.idleCpuUtilization > config.minCpuUtilization) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['idleCpuUtilization'],
        message: 'must not exceed minCpuUtilization',
      });
    }
  });

export type AppConfig = z.infer<typeof AppConfigSchema>;

export type ReportFormat = AppConfig['format'];

export type AwsProviderConfig = AppConfig['providers']['aws'];

export type AzureProviderConfig = AppConfig['providers']['azure'];

export interface ConfigOverrides {
  outputPath?: string;
  format?: string;
  snapshotPath?: string;
}
