import type { SmartAccountConfigInput } from './config.js';

/**
 * Load account configuration from environment variables.
 *
 * Supported variables:
 * - `LATCHKEY_ACCOUNT_ADDRESS` — address the account lives at
 * - `LATCHKEY_ENTRY_POINT` — coordinator (entry point) address
 * - `LATCHKEY_TELEMETRY` — `"false"` or `"0"` disables telemetry
 *
 * Only fields with a corresponding env var present are included in the
 * returned partial config. Values are validated later, together with the
 * explicit config they are merged with.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): Partial<SmartAccountConfigInput> {
  const config: Partial<SmartAccountConfigInput> = {};

  const address = env['LATCHKEY_ACCOUNT_ADDRESS'];
  if (address) {
    config.address = address;
  }

  const entryPoint = env['LATCHKEY_ENTRY_POINT'];
  if (entryPoint) {
    config.entryPoint = entryPoint;
  }

  const telemetry = env['LATCHKEY_TELEMETRY'];
  if (telemetry !== undefined && telemetry !== '') {
    config.telemetry = !['false', '0', 'off'].includes(telemetry.trim().toLowerCase());
  }

  return config;
}
