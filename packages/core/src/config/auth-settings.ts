/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import stripJsonComments from 'strip-json-comments';
import { z } from 'zod';
import { ProviderConfigObjectSchema } from '../auth/types.js';
import { ConfigurationError } from '../auth/oauth-errors.js';
import { getUserSettingsPath } from '../utils/paths.js';

const RetrySettingsSchema = z.object({
  baseDelayMs: z.number().int().positive().default(1000),
  backoffMultiplier: z.number().min(1).default(2),
  maxDelayMs: z.number().int().positive().default(30000),
  jitter: z.boolean().default(true),
});

/**
 * Per-provider overrides. For a built-in provider any subset of fields may
 * be given; an unknown id must carry a complete configuration.
 */
export const ProviderOverrideSchema = ProviderConfigObjectSchema.omit({
  id: true,
}).partial();

export const PreferredFlowSchema = z.enum(['auto', 'loopback', 'device_code']);

export const AuthSettingsSchema = z.object({
  loopbackTimeoutMs: z.number().int().positive().default(300000),
  deviceCodeTimeoutMs: z.number().int().positive().default(900000),
  refreshLeadTimeMs: z.number().int().nonnegative().default(300000),
  refreshJitterMs: z.number().int().nonnegative().default(0),
  maxRefreshAttempts: z.number().int().positive().default(3),
  refreshRetry: RetrySettingsSchema.default({}),
  expirySkewMs: z.number().int().nonnegative().default(30000),
  preferredFlow: PreferredFlowSchema.default('auto'),
  loopbackPort: z.number().int().min(0).max(65535).default(0),
  providers: z.record(z.string(), ProviderOverrideSchema).default({}),
});

export type AuthSettings = z.infer<typeof AuthSettingsSchema>;
export type AuthSettingsInput = z.input<typeof AuthSettingsSchema>;
export type ProviderOverride = z.infer<typeof ProviderOverrideSchema>;
export type PreferredFlow = z.infer<typeof PreferredFlowSchema>;

const SettingsFileSchema = z
  .object({ auth: z.unknown().optional() })
  .passthrough();

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validates settings supplied programmatically and fills in defaults.
 */
export function parseAuthSettings(
  input: unknown = {},
  source = 'settings',
): AuthSettings {
  const result = AuthSettingsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid ${source}: ${describeIssues(result.error)}`,
      { technicalDetails: { source } },
    );
  }
  return result.data;
}

export interface LoadAuthSettingsOptions {
  /** Defaults to ~/.tokenloom/settings.json */
  path?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Reads the `auth` block of the user settings file (comments allowed) and
 * applies environment overrides. A missing file means defaults.
 */
export function loadAuthSettings(
  options: LoadAuthSettingsOptions = {},
): AuthSettings {
  const settingsPath = options.path ?? getUserSettingsPath();
  const env = options.env ?? process.env;

  let fileSettings: unknown = {};
  if (fs.existsSync(settingsPath)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(
        stripJsonComments(fs.readFileSync(settingsPath, 'utf8')),
      );
    } catch (error) {
      throw new ConfigurationError(
        `Failed to read settings from ${settingsPath}`,
        { cause: error, technicalDetails: { path: settingsPath } },
      );
    }
    const file = SettingsFileSchema.safeParse(parsed);
    if (!file.success) {
      throw new ConfigurationError(
        `Invalid settings in ${settingsPath}: ${describeIssues(file.error)}`,
        { technicalDetails: { path: settingsPath } },
      );
    }
    fileSettings = file.data.auth ?? {};
  }

  const settings = parseAuthSettings(fileSettings, settingsPath);

  const preferredFlow = env['TOKENLOOM_PREFERRED_FLOW'];
  if (preferredFlow) {
    const flow = PreferredFlowSchema.safeParse(preferredFlow);
    if (!flow.success) {
      throw new ConfigurationError(
        `TOKENLOOM_PREFERRED_FLOW must be one of auto, loopback, device_code (got "${preferredFlow}")`,
      );
    }
    settings.preferredFlow = flow.data;
  }

  const port = env['TOKENLOOM_LOOPBACK_PORT'];
  if (port) {
    const parsedPort = Number(port);
    if (!Number.isInteger(parsedPort) || parsedPort < 0 || parsedPort > 65535) {
      throw new ConfigurationError(
        `TOKENLOOM_LOOPBACK_PORT must be a port number (got "${port}")`,
      );
    }
    settings.loopbackPort = parsedPort;
  }

  return settings;
}
