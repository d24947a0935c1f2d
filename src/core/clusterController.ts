import {
  createCluster,
  markNodeRunning,
  markNodeStopped,
  rollingUpdateOrder,
  type Cluster,
} from './cluster';
import type { ClusterRuntime, NodeProbe } from './clusterRuntime';
import { ClusterStartError, RollingUpdateError, describeCause } from './errors';
import { silentLogger, type Logger } from './log';
import { pollUntil, systemClock, type Clock, type PollPolicy, type ProbeResult } from './retry';

export type ClusterControllerOptions = {
  runtime: ClusterRuntime;
  size: number;
  network: string;
  readiness: PollPolicy;
  clock?: Clock;
  log?: Logger;
};

function describeProbe(index: number, probe: NodeProbe): string {
  return `node ${index} ready=${probe.ready} members=${probe.healthyMembers}/${probe.clusterMembers} version=${probe.version ?? '?'}`;
}

export class ClusterController {
  private readonly runtime: ClusterRuntime;
  private readonly readiness: PollPolicy;
  private readonly clock: Clock;
  private readonly log: Logger;
  private cluster: Cluster;
  private networkStarted = false;

  constructor(options: ClusterControllerOptions) {
    this.runtime = options.runtime;
    this.readiness = options.readiness;
    this.clock = options.clock ?? systemClock;
    this.log = options.log ?? silentLogger;
    this.cluster = createCluster(options.size, options.network);
  }

  snapshot(): Cluster {
    return this.cluster;
  }

  async startNetwork(): Promise<void> {
    if (this.networkStarted) {
      return;
    }
    await this.runtime.createNetwork(this.cluster.network);
    this.networkStarted = true;
    this.log(`Created network '${this.cluster.network}'`);
  }

  /**
   * Launches every node at `version` and waits for all of them together.
   * Only used for the bootstrap step, when there is no data to protect.
   */
  async startAllNodes(version: string): Promise<Cluster> {
    try {
      await this.startNetwork();
      for (const index of rollingUpdateOrder(this.cluster)) {
        await this.runtime.startNode({
          index,
          version,
          network: this.cluster.network,
          clusterSize: this.cluster.size,
        });
        this.cluster = markNodeRunning(this.cluster, index, version);
        this.log(`Started node ${index} at ${version}`);
      }
      await pollUntil(
        `cluster of ${this.cluster.size} nodes at ${version}`,
        () => this.probeAll(version),
        this.readiness,
        this.clock,
      );
    } catch (error) {
      throw new ClusterStartError(version, error);
    }
    this.log(`Cluster ready: ${this.cluster.size} nodes at ${version}`);
    return this.cluster;
  }

  /**
   * Replaces nodes one at a time in ascending index order. The first node
   * that does not rejoin stops the update; the nodes already replaced stay on
   * `targetVersion` and the error carries that mixed-version snapshot.
   */
  async rollingUpdate(targetVersion: string): Promise<Cluster> {
    for (const index of rollingUpdateOrder(this.cluster)) {
      const node = this.cluster.nodes[index];
      const fromVersion = node?.version ?? '?';
      try {
        if (node?.state !== 'running') {
          throw new Error(`node ${index} is not running`);
        }
        this.log(`Rolling node ${index}: ${fromVersion} -> ${targetVersion}`);
        await this.runtime.stopNode(index);
        this.cluster = markNodeStopped(this.cluster, index);
        await this.runtime.startNode({
          index,
          version: targetVersion,
          network: this.cluster.network,
          clusterSize: this.cluster.size,
        });
        this.cluster = markNodeRunning(this.cluster, index, targetVersion);
        await pollUntil(
          `node ${index} to rejoin at ${targetVersion}`,
          () => this.probeRejoined(index, targetVersion),
          this.readiness,
          this.clock,
        );
      } catch (error) {
        this.log(`Rolling update failed at node ${index}: ${describeCause(error)}`);
        throw new RollingUpdateError(index, targetVersion, this.cluster, error);
      }
    }
    this.log(`Rolling update to ${targetVersion} complete`);
    return this.cluster;
  }

  /** Stops running nodes and removes the network. Failures are logged, not thrown. */
  async teardown(): Promise<string[]> {
    const failures: string[] = [];
    for (const node of this.cluster.nodes) {
      if (node.state !== 'running') {
        continue;
      }
      try {
        await this.runtime.stopNode(node.index);
        this.cluster = markNodeStopped(this.cluster, node.index);
      } catch (error) {
        failures.push(`node ${node.index}: ${describeCause(error)}`);
      }
    }
    if (this.networkStarted) {
      try {
        await this.runtime.removeNetwork(this.cluster.network);
        this.networkStarted = false;
      } catch (error) {
        failures.push(`network ${this.cluster.network}: ${describeCause(error)}`);
      }
    }
    for (const failure of failures) {
      this.log(`WARNING: teardown failed for ${failure}`);
    }
    return failures;
  }

  private async probeAll(version: string): Promise<ProbeResult<void>> {
    for (const node of this.cluster.nodes) {
      const probe = await this.runtime.probe(node.index);
      const reason = this.unhealthyReason(node.index, probe, version);
      if (reason !== null) {
        return { done: false, reason };
      }
    }
    return { done: true, value: undefined };
  }

  private async probeRejoined(index: number, version: string): Promise<ProbeResult<void>> {
    const probe = await this.runtime.probe(index);
    const reason = this.unhealthyReason(index, probe, version);
    return reason === null ? { done: true, value: undefined } : { done: false, reason };
  }

  private unhealthyReason(index: number, probe: NodeProbe, version: string): string | null {
    if (!probe.ready) {
      return `${describeProbe(index, probe)}: not ready`;
    }
    if (probe.version !== null && probe.version !== version) {
      return `${describeProbe(index, probe)}: expected version ${version}`;
    }
    if (probe.clusterMembers < this.cluster.size || probe.healthyMembers < this.cluster.size) {
      return `${describeProbe(index, probe)}: expected ${this.cluster.size} healthy members`;
    }
    return null;
  }
}
