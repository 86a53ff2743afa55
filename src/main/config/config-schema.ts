import { z } from 'zod';

import { HTTP } from '../../constants';

export const ConsoleVerbositySchema = z.enum(['error', 'warning', 'summary', 'detailed', 'debug']);
export const LogfileVerbositySchema = z.enum(['none', 'error', 'warning', 'summary', 'detailed', 'debug', 'all']);

export const WebsiteSectionSchema = z.object({
  HostingIP: z.string().min(1).default(HTTP.DEFAULT_HOST),
  Port: z.number().int().min(80).max(65535).default(HTTP.DEFAULT_PORT),
  PageAutoRefresh: z.number().int().min(0).max(3600).default(10),
  DebugMode: z.boolean().default(false),
  AccessKey: z.string().min(1).nullable().default(null),
  Workers: z.number().int().min(1).max(64).default(2),
});

export const FilesSectionSchema = z.object({
  LogfileName: z.string().min(1).nullable().default(null),
  LogfileMaxLines: z.number().int().min(0).max(100_000).default(500),
  LogProcessID: z.boolean().default(true),
  LogfileVerbosity: LogfileVerbositySchema.default('summary'),
  ConsoleVerbosity: ConsoleVerbositySchema.default('summary'),
});

export const StateCacheSectionSchema = z.object({
  StoreDirectory: z.string().min(1).default('state_data'),
  ArtifactDirectory: z.string().min(1).default('static'),
  PollIntervalSeconds: z.number().min(0.05).max(3600).default(5),
  GraceWindowSeconds: z.number().min(0).max(600).default(10),
  LockStaleSeconds: z.number().min(1).max(3600).default(60),
});

export const AppConfigSchema = z.object({
  Website: WebsiteSectionSchema.default({}),
  Files: FilesSectionSchema.default({}),
  StateCache: StateCacheSectionSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ConfigSection = keyof AppConfig;
