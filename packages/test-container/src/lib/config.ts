import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { parse as parseDotenv } from 'dotenv';
import { z } from 'zod';

import { LOG_LEVELS } from './logger.service';

const positiveInt = (defaultValue: number) =>
  z
    .union([z.string(), z.number()])
    .default(String(defaultValue))
    .transform((value) => {
      const num = typeof value === 'number' ? value : Number(value);
      return Number.isInteger(num) && num > 0 ? num : defaultValue;
    });

export const HOST_ENVIRONMENT_MODES = ['auto', 'local', 'remote-vm'] as const;
export type HostEnvironmentMode = (typeof HOST_ENVIRONMENT_MODES)[number];

export const FAULT_POLICIES = ['report', 'fail-run'] as const;
export type FaultPolicy = (typeof FAULT_POLICIES)[number];

const testContainerConfigSchema = z.object({
  hostEnvironment: z.enum(HOST_ENVIRONMENT_MODES).default('auto'),
  vmHelper: z.string().min(1).default('/usr/local/bin/boot2docker'),
  vmPort: positiveInt(2376),
  vmCertPath: z.string().min(1).optional(),
  readinessIntervalMs: positiveInt(100),
  readinessMaxAttempts: positiveInt(6000),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  faultPolicy: z.enum(FAULT_POLICIES).default('report'),
});

export type TestContainerConfig = z.infer<typeof testContainerConfigSchema>;

const emptyToUndefined = (value: string | undefined) => (value?.trim() ? value.trim() : undefined);

export function loadTestContainerConfig(env: NodeJS.ProcessEnv = process.env): TestContainerConfig {
  const parsed = testContainerConfigSchema.safeParse({
    hostEnvironment: emptyToUndefined(env.TEST_CONTAINER_HOST_ENVIRONMENT)?.toLowerCase(),
    vmHelper: emptyToUndefined(env.TEST_CONTAINER_VM_HELPER),
    vmPort: emptyToUndefined(env.TEST_CONTAINER_VM_PORT),
    vmCertPath: emptyToUndefined(env.TEST_CONTAINER_VM_CERT_PATH),
    readinessIntervalMs: emptyToUndefined(env.TEST_CONTAINER_READINESS_INTERVAL_MS),
    readinessMaxAttempts: emptyToUndefined(env.TEST_CONTAINER_READINESS_MAX_ATTEMPTS),
    logLevel: emptyToUndefined(env.TEST_CONTAINER_LOG_LEVEL)?.toLowerCase(),
    faultPolicy: emptyToUndefined(env.TEST_CONTAINER_FAULT_POLICY)?.toLowerCase(),
  });
  if (!parsed.success) {
    throw new Error(`Invalid test-container configuration: ${parsed.error.message}`);
  }
  return parsed.data;
}

const PACKAGE_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../..');

export type DotenvOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

/**
 * Fills unset variables from `.env` in the working directory, else the package root.
 * Skipped when NODE_ENV is production. Returns the file that was read.
 */
export function loadDotenv({ cwd = process.cwd(), env = process.env }: DotenvOptions = {}): string | undefined {
  if (env.NODE_ENV?.toLowerCase() === 'production') return undefined;
  const file = [path.join(cwd, '.env'), path.join(PACKAGE_DIR, '.env')].find((candidate) => fs.existsSync(candidate));
  if (!file) return undefined;
  for (const [key, value] of Object.entries(parseDotenv(fs.readFileSync(file)))) {
    if (env[key] === undefined) env[key] = value;
  }
  return file;
}
