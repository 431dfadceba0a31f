// Run settings: scenario values, then environment overrides, then defaults.

import os from 'node:os';
import path from 'node:path';
import {
  DEFAULT_MODEL,
  DEFAULT_PLACEHOLDER,
  DEFAULT_PRODUCT_NAME,
  DEFAULT_PROVIDER,
  type PermissionMode,
  type Scenario,
} from './scenario.js';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_EXIT_HINT_MS = 2000;
export const DEFAULT_RESPONSE_DELAY_MS = 0;

export const EXIT_HINT_ENV = 'UNDERSTUDY_EXIT_HINT_TIMEOUT_MS';
export const RESPONSE_DELAY_ENV = 'UNDERSTUDY_RESPONSE_DELAY_MS';

// ============================================================================
// Types
// ============================================================================

export interface Timeouts {
  exitHintMs: number;
  responseDelayMs: number;
}

export interface SessionSettings {
  productName: string;
  version: string;
  provider: string;
  /** Display form, home abbreviated to ~ */
  workingDirectory: string;
  placeholder: string;
  model: string;
  permissionMode: PermissionMode;
  allowBypass: boolean;
  timeouts: Timeouts;
}

/** Values taken from command-line flags */
export interface CliOverrides {
  model?: string;
  permissionMode?: PermissionMode;
  /** --dangerously-skip-permissions */
  skipPermissions?: boolean;
  /** --allow-dangerously-skip-permissions */
  allowSkipPermissions?: boolean;
}

// ============================================================================
// Resolution
// ============================================================================

function envMs(env: NodeJS.ProcessEnv, name: string): number | null {
  const raw = env[name];
  if (raw === undefined || !/^\d+$/.test(raw.trim())) return null;
  return Number(raw.trim());
}

/**
 * Timeouts for a run. Scenario beats environment beats default.
 */
export function resolveTimeouts(scenario: Scenario, env: NodeJS.ProcessEnv = process.env): Timeouts {
  return {
    exitHintMs: scenario.timeouts.exit_hint_ms ?? envMs(env, EXIT_HINT_ENV) ?? DEFAULT_EXIT_HINT_MS,
    responseDelayMs:
      scenario.timeouts.response_delay_ms ?? envMs(env, RESPONSE_DELAY_ENV) ?? DEFAULT_RESPONSE_DELAY_MS,
  };
}

/** Replace the home directory prefix with ~ */
export function abbreviateHome(dir: string, home: string = os.homedir()): string {
  if (!home) return dir;
  if (dir === home) return '~';
  const prefix = home.endsWith(path.sep) ? home : home + path.sep;
  return dir.startsWith(prefix) ? `~${path.sep}${dir.slice(prefix.length)}` : dir;
}

/**
 * Merge scenario, flags and environment into the settings a session runs with
 */
export function resolveSettings(
  scenario: Scenario,
  version: string,
  overrides: CliOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): SessionSettings {
  const permissionMode: PermissionMode = overrides.skipPermissions
    ? 'bypassPermissions'
    : (overrides.permissionMode ?? scenario.environment.permission_mode ?? 'default');

  return {
    productName: scenario.identity.product_name ?? DEFAULT_PRODUCT_NAME,
    version: scenario.identity.version ?? version,
    provider: scenario.identity.provider ?? DEFAULT_PROVIDER,
    workingDirectory: abbreviateHome(scenario.environment.working_directory ?? cwd),
    placeholder: scenario.identity.placeholder ?? DEFAULT_PLACEHOLDER,
    model: overrides.model ?? scenario.identity.model ?? DEFAULT_MODEL,
    permissionMode,
    allowBypass:
      permissionMode === 'bypassPermissions' || Boolean(overrides.skipPermissions || overrides.allowSkipPermissions),
    timeouts: resolveTimeouts(scenario, env),
  };
}
