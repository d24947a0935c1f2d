import type { ClusterController } from './clusterController';
import { describeCause, errorKind } from './errors';
import { silentLogger, type Logger } from './log';
import type { ConsistencyVerifier } from './verifier';
import type { VersionSequence } from './versionSequence';
import { initialRunState, type RunState, type WorkloadDriver } from './workload';

export type StepPhase = 'bootstrapping' | 'upgrading';

export type StepReport = {
  index: number;
  phase: StepPhase;
  version: string;
  objectsCreated: number;
  verifiedRecords: number;
  aggregateCount: number;
  durationMs: number;
};

export type RunOutcome =
  | {
      status: 'completed';
      state: RunState;
      steps: StepReport[];
    }
  | {
      status: 'failed';
      stepIndex: number;
      phase: StepPhase;
      /** Version verified by the previous step; null when bootstrapping. */
      currentVersion: string | null;
      targetVersion: string;
      errorKind: string;
      error: unknown;
      state: RunState;
      steps: StepReport[];
    };

export type RunCoordinatorOptions = {
  versions: VersionSequence;
  cluster: Pick<ClusterController, 'startAllNodes' | 'rollingUpdate'>;
  workload: Pick<WorkloadDriver, 'createSchema' | 'importForVersion'>;
  verifier: Pick<ConsistencyVerifier, 'verify'>;
  log?: Logger;
  now?: () => number;
};

export function phaseFor(stepIndex: number): StepPhase {
  return stepIndex === 0 ? 'bootstrapping' : 'upgrading';
}

export class RunCoordinator {
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(private readonly options: RunCoordinatorOptions) {
    this.log = options.log ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Drives every step to completion or stops at the first error. There is no
   * partial success: a failed step leaves the cluster in a state later
   * verification could not trust.
   */
  async run(): Promise<RunOutcome> {
    const { versions } = this.options;
    const cursor = { state: initialRunState() };
    const steps: StepReport[] = [];

    for (let index = 0; index < versions.length; index += 1) {
      const targetVersion = versions.at(index);
      cursor.state = { ...cursor.state, currentStepIndex: index };
      try {
        steps.push(await this.runStep(index, targetVersion, cursor));
      } catch (error) {
        const outcome: RunOutcome = {
          status: 'failed',
          stepIndex: index,
          phase: phaseFor(index),
          currentVersion: index === 0 ? null : versions.at(index - 1),
          targetVersion,
          errorKind: errorKind(error),
          error,
          state: cursor.state,
          steps,
        };
        this.log(describeOutcome(outcome));
        return outcome;
      }
    }

    const outcome: RunOutcome = { status: 'completed', state: cursor.state, steps };
    this.log(describeOutcome(outcome));
    return outcome;
  }

  /** Advances `cursor.state` as soon as the write is acknowledged, even if verification then fails. */
  private async runStep(
    index: number,
    version: string,
    cursor: { state: RunState },
  ): Promise<StepReport> {
    const startedAt = this.now();
    const phase = phaseFor(index);
    this.log(`Step ${index} (${phase}): ${version}`);

    if (phase === 'bootstrapping') {
      await this.options.cluster.startAllNodes(version);
      await this.options.workload.createSchema();
    } else {
      await this.options.cluster.rollingUpdate(version);
    }

    const imported = await this.options.workload.importForVersion(cursor.state, version);
    cursor.state = imported.state;
    const verified = await this.options.verifier.verify(index, cursor.state.objectsCreated);

    const report: StepReport = {
      index,
      phase,
      version,
      objectsCreated: cursor.state.objectsCreated,
      verifiedRecords: verified.records.length,
      aggregateCount: verified.aggregateCount,
      durationMs: this.now() - startedAt,
    };
    this.log(
      `Step ${index} verified: records=${report.verifiedRecords} count=${report.aggregateCount} durationMs=${report.durationMs}`,
    );
    return report;
  }
}

export function describeOutcome(outcome: RunOutcome): string {
  if (outcome.status === 'completed') {
    return `PASS: ${outcome.steps.length} steps verified, ${outcome.state.objectsCreated} objects`;
  }
  const pair = `${outcome.currentVersion ?? '(none)'} -> ${outcome.targetVersion}`;
  return `FAIL at step ${outcome.stepIndex} (${outcome.phase}, ${pair}): ${outcome.errorKind}: ${describeCause(outcome.error)}`;
}
