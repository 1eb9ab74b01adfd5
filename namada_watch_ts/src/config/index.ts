import * as dotenv from 'dotenv';
import { z } from 'zod';
import { Subscription } from '../store/SubscriptionStore';
import { isLogLevel, LogLevel } from '../utils/logger';

/** Subscriber id given to `WATCH_ADDRESSES` entries that name none. */
export const DEFAULT_SUBSCRIBER = 'env';

const MAX_U64 = 2n ** 64n - 1n;

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1' || value === 'yes');

export function parseWatchList(value: string): Subscription[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const separator = entry.indexOf(':');
      if (separator < 0) return { subscriberId: DEFAULT_SUBSCRIBER, address: entry };
      return {
        subscriberId: entry.slice(0, separator).trim() || DEFAULT_SUBSCRIBER,
        address: entry.slice(separator + 1).trim(),
      };
    });
}

const envSchema = z.object({
  NAMADA_RPC_URL: z.string().url(),
  POLL_INTERVAL_MS: positiveInt(60_000),
  POLL_CONCURRENCY: positiveInt(8),
  QUERY_TIMEOUT_MS: positiveInt(10_000),
  QUERY_RETRIES: nonNegativeInt(2),
  RETRY_BACKOFF_MS: nonNegativeInt(300),
  NOTIFY_VOTING_POWER: flag(false),
  UNABLE_TO_QUERY_THRESHOLD: positiveInt(3),
  WATCH_ADDRESSES: z.string().default('').transform(parseWatchList),
  TRACK_PROPOSALS: flag(false),
  PROPOSAL_START_ID: z
    .string()
    .regex(/^\d+$/, 'expected a non-negative integer')
    .default('0')
    .transform((value, ctx) => {
      const id = BigInt(value);
      if (id > MAX_U64) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected an id below 2^64' });
        return z.NEVER;
      }
      return id;
    }),
  LOG_LEVEL: z
    .string()
    .default('info')
    .refine(isLogLevel, 'expected one of error, warn, info, debug, silent'),
});

export interface WatchConfig {
  rpcUrl: string;
  pollIntervalMs: number;
  concurrency: number;
  queryTimeoutMs: number;
  queryRetries: number;
  retryBackoffMs: number;
  trackVotingPower: boolean;
  unableToQueryThreshold: number;
  subscriptions: Subscription[];
  trackProposals: boolean;
  proposalStartId: bigint;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(public readonly issues: readonly string[]) {
    super(`invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

// Empty strings count as unset so `KEY=` in .env falls back to the default.
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value.trim();
  }
  return cleaned;
}

export function parseConfig(env: NodeJS.ProcessEnv): WatchConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  const values = parsed.data;
  return {
    rpcUrl: values.NAMADA_RPC_URL,
    pollIntervalMs: values.POLL_INTERVAL_MS,
    concurrency: values.POLL_CONCURRENCY,
    queryTimeoutMs: values.QUERY_TIMEOUT_MS,
    queryRetries: values.QUERY_RETRIES,
    retryBackoffMs: values.RETRY_BACKOFF_MS,
    trackVotingPower: values.NOTIFY_VOTING_POWER,
    unableToQueryThreshold: values.UNABLE_TO_QUERY_THRESHOLD,
    subscriptions: values.WATCH_ADDRESSES,
    trackProposals: values.TRACK_PROPOSALS,
    proposalStartId: values.PROPOSAL_START_ID,
    logLevel: values.LOG_LEVEL,
  };
}

/** Loads `.env` into `process.env` (without overriding it) and parses the result. */
export function loadConfig(path?: string): WatchConfig {
  dotenv.config(path ? { path } : undefined);
  return parseConfig(process.env);
}
