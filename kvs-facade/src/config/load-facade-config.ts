import { DEFAULT_MAX_ATTEMPTS } from './kinesis-video-config';
import { ConfigurationError } from '../types/errors';
import type { KinesisVideoSession } from '../types/session';

/**
 * Facade configuration derived from the environment.
 */
export interface FacadeConfig {
  readonly session: KinesisVideoSession;
  readonly verbose: boolean;
}

type Env = Record<string, string | undefined>;

/**
 * Build facade configuration from environment variables.
 *
 * - `KVS_REGION`, falling back to `AWS_REGION`
 * - `KVS_MAX_ATTEMPTS` (default 3)
 * - `KVS_ENDPOINT` control-plane endpoint override
 * - `KVS_VERBOSE` (`1` or `true`)
 */
export function loadFacadeConfig(env: Env = process.env): FacadeConfig {
  const region = env.KVS_REGION || env.AWS_REGION || undefined;
  const endpoint = env.KVS_ENDPOINT || undefined;

  return {
    session: {
      region,
      endpoint,
      maxAttempts: parseMaxAttempts(env.KVS_MAX_ATTEMPTS),
    },
    verbose: parseFlag(env.KVS_VERBOSE),
  };
}

function parseMaxAttempts(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_MAX_ATTEMPTS;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`KVS_MAX_ATTEMPTS must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseFlag(raw: string | undefined): boolean {
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  return normalized === '1' || normalized === 'true';
}
