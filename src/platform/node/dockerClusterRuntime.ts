import { execFile as execFileWithCallback } from 'node:child_process';
import { promisify } from 'node:util';
import {
  UNREACHABLE_PROBE,
  type ClusterRuntime,
  type NodeLaunch,
  type NodeProbe,
} from '../../core/clusterRuntime';
import { silentLogger, type Logger } from '../../core/log';
import { fetchWithTimeout } from './fetchWithTimeout';

const execFile = promisify(execFileWithCallback);

type ExecFileResult = {
  stdout: string;
  stderr: string;
};

export type ExecFileFn = (
  file: string,
  args: readonly string[],
  options?: {
    encoding?: BufferEncoding;
  },
) => Promise<ExecFileResult>;

const defaultExecFile: ExecFileFn = async (file, args, options) => {
  const result = await execFile(file, [...args], { encoding: options?.encoding ?? 'utf8' });
  return {
    stdout: result.stdout,
    stderr: result.stderr,
  };
};

const CONTAINER_HTTP_PORT = 8080;
const GOSSIP_PORT = 7100;
const DATA_PORT = 7101;
const DATA_PATH = '/var/lib/weaviate';

export type DockerClusterRuntimeOptions = {
  image: string;
  /** Prefix for container and volume names. */
  prefix: string;
  /** Node `i` publishes its HTTP port on `basePort + i`. */
  basePort: number;
  host?: string;
  stopTimeoutSeconds?: number;
  docker?: string;
  extraEnv?: Record<string, string>;
  execFile?: ExecFileFn;
  fetchFn?: typeof fetch;
  /** Bound on each readiness and membership request; a hung node counts as unreachable. */
  requestTimeoutMs?: number;
  log?: Logger;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function nodeHostname(index: number): string {
  return `node${index}`;
}

export function containerName(prefix: string, index: number): string {
  return `${prefix}-node-${index}`;
}

export function volumeName(prefix: string, index: number): string {
  return `${prefix}-node-${index}-data`;
}

export function nodeEnv(
  launch: NodeLaunch,
  prefix: string,
  extraEnv: Record<string, string> = {},
): Record<string, string> {
  const env: Record<string, string> = {
    QUERY_DEFAULTS_LIMIT: '25',
    AUTHENTICATION_ANONYMOUS_ACCESS_ENABLED: 'true',
    PERSISTENCE_DATA_PATH: DATA_PATH,
    DEFAULT_VECTORIZER_MODULE: 'none',
    CLUSTER_HOSTNAME: nodeHostname(launch.index),
    CLUSTER_GOSSIP_BIND_PORT: String(GOSSIP_PORT),
    CLUSTER_DATA_BIND_PORT: String(DATA_PORT),
  };
  if (launch.index > 0) {
    env.CLUSTER_JOIN = `${containerName(prefix, 0)}:${GOSSIP_PORT}`;
  }
  return { ...env, ...extraEnv };
}

export function buildRunArgs(
  launch: NodeLaunch,
  options: Pick<DockerClusterRuntimeOptions, 'image' | 'prefix' | 'basePort' | 'extraEnv'>,
): string[] {
  const args = [
    'run',
    '--detach',
    '--name',
    containerName(options.prefix, launch.index),
    '--hostname',
    nodeHostname(launch.index),
    '--network',
    launch.network,
    '--publish',
    `${options.basePort + launch.index}:${CONTAINER_HTTP_PORT}`,
    '--volume',
    `${volumeName(options.prefix, launch.index)}:${DATA_PATH}`,
  ];
  const env = nodeEnv(launch, options.prefix, options.extraEnv);
  for (const key of Object.keys(env).sort()) {
    args.push('--env', `${key}=${env[key] ?? ''}`);
  }
  args.push(`${options.image}:${launch.version}`);
  return args;
}

/**
 * Runs each node as a container on a user-defined network. Data lives in a
 * named volume per node so a replaced container keeps what it stored.
 */
export class DockerClusterRuntime implements ClusterRuntime {
  private readonly docker: string;
  private readonly host: string;
  private readonly stopTimeoutSeconds: number;
  private readonly execFile: ExecFileFn;
  private readonly fetchFn: typeof fetch;
  private readonly requestTimeoutMs: number;
  private readonly log: Logger;
  private readonly volumes = new Set<string>();

  constructor(private readonly options: DockerClusterRuntimeOptions) {
    this.docker = options.docker ?? 'docker';
    this.host = options.host ?? '127.0.0.1';
    this.stopTimeoutSeconds = options.stopTimeoutSeconds ?? 30;
    this.execFile = options.execFile ?? defaultExecFile;
    this.fetchFn = options.fetchFn ?? fetch;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 5_000;
    this.log = options.log ?? silentLogger;
  }

  nodeUrl(index: number): string {
    return `http://${this.host}:${this.options.basePort + index}`;
  }

  async createNetwork(name: string): Promise<void> {
    await this.run(['network', 'create', name]);
  }

  /** Also removes the data volumes of nodes started by this runtime. */
  async removeNetwork(name: string): Promise<void> {
    await this.run(['network', 'rm', name]);
    for (const volume of [...this.volumes]) {
      await this.run(['volume', 'rm', '--force', volume]);
      this.volumes.delete(volume);
    }
  }

  async startNode(launch: NodeLaunch): Promise<void> {
    const args = buildRunArgs(launch, this.options);
    this.volumes.add(volumeName(this.options.prefix, launch.index));
    this.log(`docker ${args.slice(0, 3).join(' ')} (${this.options.image}:${launch.version})`);
    await this.run(args);
  }

  async stopNode(index: number): Promise<void> {
    const name = containerName(this.options.prefix, index);
    await this.run(['stop', '--time', String(this.stopTimeoutSeconds), name]);
    await this.run(['rm', name]);
  }

  async probe(index: number): Promise<NodeProbe> {
    const baseUrl = this.nodeUrl(index);
    try {
      const ready = await this.get(`${baseUrl}/v1/.well-known/ready`);
      if (!ready.ok) {
        return UNREACHABLE_PROBE;
      }
    } catch {
      // Connection refused while the container boots, or no answer in time.
      return UNREACHABLE_PROBE;
    }

    try {
      const response = await this.get(`${baseUrl}/v1/nodes`);
      if (!response.ok) {
        return { ...UNREACHABLE_PROBE, ready: true };
      }
      const body: unknown = await response.json();
      return parseNodesStatus(body, nodeHostname(index));
    } catch {
      return { ...UNREACHABLE_PROBE, ready: true };
    }
  }

  private get(url: string): Promise<Response> {
    return fetchWithTimeout(this.fetchFn, url, { method: 'GET' }, this.requestTimeoutMs);
  }

  private async run(args: readonly string[]): Promise<string> {
    try {
      const result = await this.execFile(this.docker, args, { encoding: 'utf8' });
      return result.stdout.trim();
    } catch (error) {
      const value = isRecord(error) ? error : {};
      const details = [value.stderr, value.stdout]
        .map((part) => (typeof part === 'string' ? part.trim() : ''))
        .filter((part) => part.length > 0)
        .join(' | ');
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(
        `'${this.docker} ${args.slice(0, 2).join(' ')}' failed: ${message}${details ? ` (${details.slice(0, 300)})` : ''}`,
        { cause: error },
      );
    }
  }
}

/** Reads a `/v1/nodes` body as seen from the node named `self`. */
export function parseNodesStatus(body: unknown, self: string): NodeProbe {
  const nodes = isRecord(body) && Array.isArray(body.nodes) ? body.nodes.filter(isRecord) : [];
  const own = nodes.find((node) => node.name === self);
  return {
    ready: true,
    clusterMembers: nodes.length,
    healthyMembers: nodes.filter((node) => node.status === 'HEALTHY').length,
    version: own && typeof own.version === 'string' ? own.version : null,
  };
}
