export type NodeLaunch = {
  index: number;
  version: string;
  network: string;
  clusterSize: number;
};

export type NodeProbe = {
  /** The node answers its readiness endpoint. */
  ready: boolean;
  /** Members the node currently sees in the cluster, itself included. */
  clusterMembers: number;
  /** Members reported healthy by the node. */
  healthyMembers: number;
  /** Version the node reports for itself, when it reports one. */
  version: string | null;
};

/**
 * Lifecycle capability for the nodes under test. Implementations own the
 * container or process layer; the controller only sequences calls and polls.
 */
export interface ClusterRuntime {
  createNetwork(name: string): Promise<void>;
  removeNetwork(name: string): Promise<void>;
  startNode(launch: NodeLaunch): Promise<void>;
  stopNode(index: number): Promise<void>;
  /** Must resolve with `ready: false` while a node is still coming up rather than throw. */
  probe(index: number): Promise<NodeProbe>;
}

export const UNREACHABLE_PROBE: NodeProbe = {
  ready: false,
  clusterMembers: 0,
  healthyMembers: 0,
  version: null,
};
