import { z } from 'zod';

import { normalizeDomainSuffix, isValidDnsLabel } from './address/codec.js';
import { compileProxyPolicy, type ProxyPolicy } from './address/policy.js';
import { formatForError, formatOneLineError } from './util/text.js';

const logLevels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof logLevels)[number];

export type Config = Readonly<{
  HOST: string;
  PORT: number;
  ADMIN_HOST: string;
  ADMIN_PORT: number;
  LOG_LEVEL: LogLevel;
  SHUTDOWN_GRACE_MS: number;

  // Address decoding and rewriting.
  DOMAIN_SUFFIX: string;
  UPSTREAM_HOST_SUFFIX: string;
  DEFAULT_UPSTREAM_PORT: number;

  // Destination policy (validated at load time, compiled by `policyFromConfig`).
  ALLOWED_PORTS: string;
  DENY_CIDRS: string;
  ALLOW_CIDRS: string;
  ALLOW_PRIVATE_IPS: boolean;

  // Timeouts and limits.
  CONNECT_TIMEOUT_MS: number;
  IDLE_TIMEOUT_MS: number;
  REQUEST_HEAD_TIMEOUT_MS: number;
  POOL_IDLE_TIMEOUT_MS: number;
  POOL_MAX_IDLE_PER_DESTINATION: number;
  MAX_HEAD_BYTES: number;

  FORWARDED_HEADERS: boolean;
}>;

type Env = Record<string, string | undefined>;

const MAX_ENV_ERROR_MESSAGE_BYTES = 256;

const envSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8100),
  ADMIN_HOST: z.string().min(1).default('127.0.0.1'),
  ADMIN_PORT: z.coerce.number().int().min(0).max(65535).default(8101),
  LOG_LEVEL: z.enum(logLevels).default('info'),
  SHUTDOWN_GRACE_MS: z.coerce.number().int().min(0).default(10_000),

  DOMAIN_SUFFIX: z.string().optional().default('nip.io'),
  UPSTREAM_HOST_SUFFIX: z.string().optional().default(''),
  DEFAULT_UPSTREAM_PORT: z.coerce.number().int().min(1).max(65535).default(80),

  ALLOWED_PORTS: z.string().optional().default('80,443,1024-65535'),
  DENY_CIDRS: z.string().optional().default('169.254.0.0/16,fe80::/10'),
  ALLOW_CIDRS: z.string().optional().default(''),
  ALLOW_PRIVATE_IPS: z.enum(['0', '1']).optional().default('0'),

  CONNECT_TIMEOUT_MS: z.coerce.number().int().min(1).default(10_000),
  IDLE_TIMEOUT_MS: z.coerce.number().int().min(1).default(60_000),
  REQUEST_HEAD_TIMEOUT_MS: z.coerce.number().int().min(1).default(30_000),
  POOL_IDLE_TIMEOUT_MS: z.coerce.number().int().min(1).default(30_000),
  POOL_MAX_IDLE_PER_DESTINATION: z.coerce.number().int().min(0).default(8),
  MAX_HEAD_BYTES: z.coerce.number().int().min(1024).max(1024 * 1024).default(64 * 1024),

  FORWARDED_HEADERS: z.enum(['0', '1']).optional().default('1'),
});

function validateSuffix(raw: string, envName: string, opts: { allowEmpty: boolean }): string {
  const suffix = normalizeDomainSuffix(raw);
  if (suffix === '') {
    if (opts.allowEmpty) return '';
    throw new Error(`Invalid configuration: ${envName} must not be empty`);
  }
  if (suffix.length > 253 || !suffix.split('.').every(isValidDnsLabel)) {
    throw new Error(`Invalid configuration: ${envName} is not a valid domain: ${formatForError(raw)}`);
  }
  return suffix;
}

export function loadConfig(env: Env = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration:\n${parsed.error.message}`);
  }

  const raw = parsed.data;
  const config: Config = {
    HOST: raw.HOST,
    PORT: raw.PORT,
    ADMIN_HOST: raw.ADMIN_HOST,
    ADMIN_PORT: raw.ADMIN_PORT,
    LOG_LEVEL: raw.LOG_LEVEL,
    SHUTDOWN_GRACE_MS: raw.SHUTDOWN_GRACE_MS,

    DOMAIN_SUFFIX: validateSuffix(raw.DOMAIN_SUFFIX, 'DOMAIN_SUFFIX', { allowEmpty: false }),
    UPSTREAM_HOST_SUFFIX: validateSuffix(raw.UPSTREAM_HOST_SUFFIX, 'UPSTREAM_HOST_SUFFIX', { allowEmpty: true }),
    DEFAULT_UPSTREAM_PORT: raw.DEFAULT_UPSTREAM_PORT,

    ALLOWED_PORTS: raw.ALLOWED_PORTS.trim(),
    DENY_CIDRS: raw.DENY_CIDRS.trim(),
    ALLOW_CIDRS: raw.ALLOW_CIDRS.trim(),
    ALLOW_PRIVATE_IPS: raw.ALLOW_PRIVATE_IPS === '1',

    CONNECT_TIMEOUT_MS: raw.CONNECT_TIMEOUT_MS,
    IDLE_TIMEOUT_MS: raw.IDLE_TIMEOUT_MS,
    REQUEST_HEAD_TIMEOUT_MS: raw.REQUEST_HEAD_TIMEOUT_MS,
    POOL_IDLE_TIMEOUT_MS: raw.POOL_IDLE_TIMEOUT_MS,
    POOL_MAX_IDLE_PER_DESTINATION: raw.POOL_MAX_IDLE_PER_DESTINATION,
    MAX_HEAD_BYTES: raw.MAX_HEAD_BYTES,

    FORWARDED_HEADERS: raw.FORWARDED_HEADERS === '1',
  };

  // Surface bad port ranges and CIDRs now rather than on the first request.
  policyFromConfig(config);
  return config;
}

export function policyFromConfig(config: Config): ProxyPolicy {
  try {
    return compileProxyPolicy({
      allowedPorts: config.ALLOWED_PORTS,
      denyCidrs: config.DENY_CIDRS,
      allowCidrs: config.ALLOW_CIDRS,
      allowPrivateIps: config.ALLOW_PRIVATE_IPS,
      defaultPort: config.DEFAULT_UPSTREAM_PORT,
    });
  } catch (err) {
    throw new Error(`Invalid configuration: ${formatOneLineError(err, MAX_ENV_ERROR_MESSAGE_BYTES)}`);
  }
}
