export type NodeState = 'running' | 'stopped';

export type ClusterNode = {
  index: number;
  /** Version most recently started on this node; null until its first start. */
  version: string | null;
  state: NodeState;
};

export type Cluster = {
  size: number;
  network: string;
  nodes: readonly ClusterNode[];
};

export function createCluster(size: number, network: string): Cluster {
  if (!Number.isInteger(size) || size <= 0) {
    throw new Error(`cluster size must be a positive integer, got ${String(size)}`);
  }
  const nodes: ClusterNode[] = [];
  for (let index = 0; index < size; index += 1) {
    nodes.push({ index, version: null, state: 'stopped' });
  }
  return { size, network, nodes };
}

function replaceNode(cluster: Cluster, index: number, update: Partial<ClusterNode>): Cluster {
  const current = cluster.nodes[index];
  if (!current) {
    throw new Error(`node ${index} does not exist in a cluster of size ${cluster.size}`);
  }
  const nodes = [...cluster.nodes];
  nodes[index] = { ...current, ...update, index };
  return { ...cluster, nodes };
}

export function markNodeStopped(cluster: Cluster, index: number): Cluster {
  return replaceNode(cluster, index, { state: 'stopped' });
}

export function markNodeRunning(cluster: Cluster, index: number, version: string): Cluster {
  return replaceNode(cluster, index, { state: 'running', version });
}

/** Deterministic upgrade order: ascending node index. */
export function rollingUpdateOrder(cluster: Cluster): number[] {
  return cluster.nodes.map((node) => node.index).sort((left, right) => left - right);
}

export function clusterVersions(cluster: Cluster): string[] {
  const versions = new Set<string>();
  for (const node of cluster.nodes) {
    if (node.version !== null) {
      versions.add(node.version);
    }
  }
  return [...versions];
}

export function isUniformlyRunning(cluster: Cluster, version: string): boolean {
  return cluster.nodes.every((node) => node.state === 'running' && node.version === version);
}
