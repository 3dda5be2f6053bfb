import { z } from 'zod';
import {
  ACK_RANDOM_FACTOR,
  ACK_TIMEOUT_MS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_PURGE_INTERVAL_MS,
  EXCHANGE_LIFETIME_MS,
  MAX_RETRANSMIT,
} from './constants.js';
import { ConfigurationError, ValidationError } from './core/errors.js';

/**
 * Transmission and housekeeping parameters of a delivery engine (milliseconds)
 */
export const engineConfigSchema = z.object({
  ackTimeout: z.number().positive(),
  ackRandomFactor: z.number().min(1),
  maxRetransmit: z.number().int().min(0),
  pollInterval: z.number().positive(),
  exchangeLifetime: z.number().positive(),
  purgeInterval: z.number().positive(),
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  ackTimeout: ACK_TIMEOUT_MS,
  ackRandomFactor: ACK_RANDOM_FACTOR,
  maxRetransmit: MAX_RETRANSMIT,
  pollInterval: DEFAULT_POLL_INTERVAL_MS,
  exchangeLifetime: EXCHANGE_LIFETIME_MS,
  purgeInterval: DEFAULT_PURGE_INTERVAL_MS,
};

export const midSchema = z.number().int().min(0).max(0xffff);

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  const result = engineConfigSchema.safeParse({ ...DEFAULT_ENGINE_CONFIG, ...defined });
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue.path.join('.');
    throw new ConfigurationError(`Invalid engine option "${key}": ${issue.message}`, { configKey: key });
  }
  return result.data;
}

/**
 * Validate a message ID (0..65535)
 */
export function parseMid(value: unknown): number {
  const result = midSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid MID: ${String(value)} (expected an integer in 0..65535)`, {
      field: 'mid',
      value,
    });
  }
  return result.data;
}

const ENV_KEYS = {
  ackTimeout: 'COAPLINK_ACK_TIMEOUT',
  ackRandomFactor: 'COAPLINK_ACK_RANDOM_FACTOR',
  maxRetransmit: 'COAPLINK_MAX_RETRANSMIT',
  pollInterval: 'COAPLINK_POLL_INTERVAL',
} as const;

const envNumber = z.coerce.number().finite();

/**
 * Read engine overrides from COAPLINK_* environment variables
 *
 * @example
 * ```bash
 * COAPLINK_ACK_TIMEOUT=5000 COAPLINK_MAX_RETRANSMIT=6 coaplink udp://10.0.0.7:5683 -r /temp
 * ```
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<EngineConfig> {
  const config: Partial<EngineConfig> = {};

  for (const [key, variable] of Object.entries(ENV_KEYS)) {
    const raw = env[variable];
    if (raw === undefined || raw.trim() === '') continue;

    const parsed = envNumber.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`${variable} must be a number, got "${raw}"`, { configKey: variable });
    }
    assignConfig(config, key, parsed.data);
  }

  // Validate the combination the same way explicit options are
  resolveEngineConfig(config);
  return config;
}

function assignConfig(config: Partial<EngineConfig>, key: string, value: number): void {
  switch (key) {
    case 'ackTimeout':
    case 'ackRandomFactor':
    case 'maxRetransmit':
    case 'pollInterval':
      config[key] = value;
      break;
  }
}
