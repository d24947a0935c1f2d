import { ConfigError, SequenceError } from '../core/errors';
import type { PollPolicy } from '../core/retry';
import { VersionSequence, parseVersionList } from '../core/versionSequence';

export const DEFAULT_VERSIONS = [
  '1.16.0',
  '1.16.1',
  '1.16.2',
  '1.16.3',
  '1.16.4',
  '1.16.5',
  '1.16.6',
  '1.16.7',
  '1.16.8',
  '1.16.9',
  '1.17.0',
  '1.17.1',
  '1.17.2',
] as const;

export type HarnessConfig = {
  versions: string[];
  clusterSize: number;
  endpoint: string;
  image: string;
  prefix: string;
  basePort: number;
  readiness: PollPolicy;
  visibility: PollPolicy;
  /** Bound on each HTTP request to a node. */
  requestTimeoutMs: number;
  keepCluster: boolean;
};

type Env = Record<string, string | undefined>;

export function parsePositiveIntEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw || raw.trim().length === 0) {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0 || String(value) !== raw.trim()) {
    throw new ConfigError(`invalid ${name}='${raw}' (must be positive integer)`);
  }
  return value;
}

function parseBooleanEnv(env: Env, name: string): boolean {
  const raw = (env[name] ?? '').trim().toLowerCase();
  return raw === 'true' || raw === '1';
}

/** Maps `--flag value` pairs onto the env names they override. */
const FLAG_TO_ENV: Record<string, string> = {
  '--versions': 'UPGRADE_VERSIONS',
  '--cluster-size': 'CLUSTER_SIZE',
  '--endpoint': 'SERVICE_ENDPOINT',
  '--image': 'SERVICE_IMAGE',
  '--prefix': 'CLUSTER_PREFIX',
  '--base-port': 'SERVICE_BASE_PORT',
};

export function applyArgs(argv: readonly string[], env: Env): Env {
  const merged: Env = { ...env };
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index] ?? '';
    if (arg === '--keep-cluster') {
      merged.KEEP_CLUSTER = 'true';
      continue;
    }
    const target = FLAG_TO_ENV[arg];
    if (!target) {
      throw new ConfigError(`unknown argument '${arg}'`);
    }
    const value = argv[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigError(`missing value for ${arg}`);
    }
    merged[target] = value;
    index += 1;
  }
  return merged;
}

function readVersions(env: Env): string[] {
  const raw = env.UPGRADE_VERSIONS;
  try {
    return new VersionSequence(parseVersionList(raw, DEFAULT_VERSIONS)).toArray();
  } catch (error) {
    if (error instanceof SequenceError) {
      throw new ConfigError(`invalid UPGRADE_VERSIONS='${raw ?? ''}': ${error.message}`, { cause: error });
    }
    throw error;
  }
}

export function readConfig(argv: readonly string[], rawEnv: Env): HarnessConfig {
  const env = applyArgs(argv, rawEnv);
  const basePort = parsePositiveIntEnv(env, 'SERVICE_BASE_PORT', 8080);
  const endpoint = (env.SERVICE_ENDPOINT?.trim() || `http://localhost:${basePort}`).replace(/\/+$/u, '');
  if (!/^https?:\/\//u.test(endpoint)) {
    throw new ConfigError(`SERVICE_ENDPOINT must be an http(s) URL, got '${endpoint}'`);
  }

  return {
    versions: readVersions(env),
    clusterSize: parsePositiveIntEnv(env, 'CLUSTER_SIZE', 3),
    endpoint,
    image: env.SERVICE_IMAGE?.trim() || 'semitechnologies/weaviate',
    prefix: env.CLUSTER_PREFIX?.trim() || 'upgrade-journey',
    basePort,
    readiness: {
      maxAttempts: parsePositiveIntEnv(env, 'READY_MAX_ATTEMPTS', 120),
      intervalMs: parsePositiveIntEnv(env, 'READY_POLL_INTERVAL_MS', 1_000),
      timeoutMs: parsePositiveIntEnv(env, 'READY_TIMEOUT_S', 180) * 1_000,
    },
    visibility: {
      maxAttempts: parsePositiveIntEnv(env, 'VISIBILITY_MAX_ATTEMPTS', 20),
      intervalMs: parsePositiveIntEnv(env, 'VISIBILITY_POLL_INTERVAL_MS', 250),
      backoff: 1.5,
      maxIntervalMs: 2_000,
    },
    requestTimeoutMs: parsePositiveIntEnv(env, 'REQUEST_TIMEOUT_MS', 5_000),
    keepCluster: parseBooleanEnv(env, 'KEEP_CLUSTER'),
  };
}
