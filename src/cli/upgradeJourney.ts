import { ClusterController } from '../core/clusterController';
import type { ClusterRuntime } from '../core/clusterRuntime';
import { RunCoordinator, type RunOutcome } from '../core/coordinator';
import type { DataService } from '../core/dataService';
import { silentLogger, type Logger } from '../core/log';
import { systemClock, type Clock } from '../core/retry';
import { ConsistencyVerifier } from '../core/verifier';
import { VersionSequence } from '../core/versionSequence';
import { WorkloadDriver } from '../core/workload';
import type { HarnessConfig } from './config';

export type UpgradeJourneyDeps = {
  runtime: ClusterRuntime;
  data: DataService;
  clock?: Clock;
  log?: Logger;
};

export type UpgradeJourneyResult = {
  outcome: RunOutcome;
  teardownFailures: string[];
};

/**
 * Wires the controller, workload and verifier for one run and tears the
 * cluster down afterwards unless `keepCluster` is set.
 */
export async function runUpgradeJourney(
  config: HarnessConfig,
  deps: UpgradeJourneyDeps,
): Promise<UpgradeJourneyResult> {
  const log = deps.log ?? silentLogger;
  const clock = deps.clock ?? systemClock;
  const versions = new VersionSequence(config.versions);

  const cluster = new ClusterController({
    runtime: deps.runtime,
    size: config.clusterSize,
    network: `${config.prefix}-net`,
    readiness: config.readiness,
    clock,
    log,
  });
  const coordinator = new RunCoordinator({
    versions,
    cluster,
    workload: new WorkloadDriver(deps.data, log),
    verifier: new ConsistencyVerifier({
      data: deps.data,
      versions,
      visibility: config.visibility,
      clock,
      log,
    }),
    log,
    now: () => clock.now(),
  });

  log(
    `Upgrade journey: ${versions.length} versions (${versions.bootstrap}..${versions.at(versions.length - 1)}) on ${config.clusterSize} nodes`,
  );
  let outcome: RunOutcome;
  let teardownFailures: string[] = [];
  try {
    outcome = await coordinator.run();
  } finally {
    if (config.keepCluster) {
      log(`Keeping cluster '${config.prefix}' running`);
    } else {
      teardownFailures = await cluster.teardown();
    }
  }
  return { outcome, teardownFailures };
}
