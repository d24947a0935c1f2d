import { describe, expect, it } from 'vitest';
import { RunCoordinator, describeOutcome, phaseFor, type RunOutcome } from '../../src/core/coordinator';
import { COLLECTION_CLASS, initialRunState, type RunState } from '../../src/core/workload';
import { VersionSequence } from '../../src/core/versionSequence';
import { createJourneyHarness } from '../shared/journeyHarness';

function summarize(outcome: RunOutcome) {
  return outcome.steps.map((step) => [
    step.index,
    step.phase,
    step.version,
    step.objectsCreated,
    step.verifiedRecords,
    step.aggregateCount,
  ]);
}

describe('RunCoordinator', () => {
  it('bootstraps, upgrades and verifies every step of a three-version path', async () => {
    const { coordinator, runtime, messages } = createJourneyHarness({ versions: ['1.0', '1.1', '1.2'] });
    const outcome = await coordinator.run();

    expect(outcome.status).toBe('completed');
    expect(summarize(outcome)).toEqual([
      [0, 'bootstrapping', '1.0', 1, 1, 1],
      [1, 'upgrading', '1.1', 2, 2, 2],
      [2, 'upgrading', '1.2', 3, 3, 3],
    ]);
    expect(outcome.state).toEqual({ objectsCreated: 3, currentStepIndex: 2 });
    expect([0, 1, 2].map((index) => runtime.versionOf(index))).toEqual(['1.2', '1.2', '1.2']);
    expect(messages.at(-1)).toBe('PASS: 3 steps verified, 3 objects');
  });

  it('runs a single-version path without a rolling update', async () => {
    const { coordinator, runtime } = createJourneyHarness({ versions: ['1.0'], size: 1 });
    const outcome = await coordinator.run();

    expect(outcome.status).toBe('completed');
    expect(runtime.calls).toEqual(['createNetwork net', 'start 0@1.0']);
  });

  it('stops at the node that fails to rejoin', async () => {
    const { coordinator, runtime } = createJourneyHarness({
      versions: ['1.0', '1.1', '1.2'],
      runtime: { neverReady: { index: 1, version: '1.1' } },
    });
    const outcome = await coordinator.run();

    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') {
      return;
    }
    expect(outcome.stepIndex).toBe(1);
    expect(outcome.phase).toBe('upgrading');
    expect(outcome.currentVersion).toBe('1.0');
    expect(outcome.targetVersion).toBe('1.1');
    expect(outcome.errorKind).toBe('RollingUpdateError');
    expect(outcome.state).toEqual({ objectsCreated: 1, currentStepIndex: 1 });
    expect(outcome.steps).toHaveLength(1);
    expect(runtime.calls).not.toContain('start 0@1.2');
    expect(describeOutcome(outcome)).toBe(
      'FAIL at step 1 (upgrading, 1.0 -> 1.1): RollingUpdateError: node 1 failed to rejoin at version 1.1: ' +
        'timed out waiting for node 1 to rejoin at 1.1 after 5 attempts: node 1 ready=false members=0/0 version=?: not ready',
    );
  });

  it('counts an acknowledged write even when verification of it fails', async () => {
    const { coordinator } = createJourneyHarness({
      versions: ['1.0', '1.1', '1.2'],
      delays: { '1.1': 10_000 },
    });
    const outcome = await coordinator.run();

    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') {
      return;
    }
    expect(outcome.errorKind).toBe('DataLossError');
    expect(outcome.state).toEqual({ objectsCreated: 2, currentStepIndex: 1 });
    expect(describeOutcome(outcome)).toBe(
      'FAIL at step 1 (upgrading, 1.0 -> 1.1): DataLossError: object for version 1.1 is missing or changed: not found after 4 attempts',
    );
  });

  it('reports a schema failure during bootstrap with no current version', async () => {
    const { coordinator, data } = createJourneyHarness({ versions: ['1.0', '1.1'] });
    await data.createClass({ class: COLLECTION_CLASS, properties: [] });
    const outcome = await coordinator.run();

    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') {
      return;
    }
    expect(outcome.phase).toBe('bootstrapping');
    expect(outcome.currentVersion).toBeNull();
    expect(outcome.errorKind).toBe('SchemaError');
    expect(outcome.state).toEqual({ objectsCreated: 0, currentStepIndex: 0 });
    expect(describeOutcome(outcome)).toBe(
      "FAIL at step 0 (bootstrapping, (none) -> 1.0): SchemaError: failed to create class Collection: class name 'Collection' already exists",
    );
  });

  it('reports a rejected write as ImportError', async () => {
    const { coordinator } = createJourneyHarness({ versions: ['1.0'], rejectWrites: true });
    const outcome = await coordinator.run();

    expect(outcome.status === 'failed' ? outcome.errorKind : outcome.status).toBe('ImportError');
    expect(outcome.state.objectsCreated).toBe(0);
  });

  it('calls each collaborator in step order', async () => {
    const calls: string[] = [];
    const coordinator = new RunCoordinator({
      versions: new VersionSequence(['1.0', '1.1']),
      cluster: {
        startAllNodes: async (version) => {
          calls.push(`startAllNodes ${version}`);
          return { size: 1, network: 'net', nodes: [] };
        },
        rollingUpdate: async (version) => {
          calls.push(`rollingUpdate ${version}`);
          return { size: 1, network: 'net', nodes: [] };
        },
      },
      workload: {
        createSchema: async () => {
          calls.push('createSchema');
        },
        importForVersion: async (state: RunState, version: string) => {
          calls.push(`import ${version}`);
          return {
            record: { version, object_count: state.objectsCreated },
            state: { ...state, objectsCreated: state.objectsCreated + 1 },
          };
        },
      },
      verifier: {
        verify: async (uptoIndex, expectedCount) => {
          calls.push(`verify ${uptoIndex} ${expectedCount}`);
          return { records: [], aggregateCount: expectedCount };
        },
      },
    });

    const outcome = await coordinator.run();
    expect(outcome.status).toBe('completed');
    expect(calls).toEqual([
      'startAllNodes 1.0',
      'createSchema',
      'import 1.0',
      'verify 0 1',
      'rollingUpdate 1.1',
      'import 1.1',
      'verify 1 2',
    ]);
  });
});

describe('phaseFor', () => {
  it('only the first step bootstraps', () => {
    expect([0, 1, 5].map(phaseFor)).toEqual(['bootstrapping', 'upgrading', 'upgrading']);
    expect(initialRunState().currentStepIndex).toBe(0);
  });
});
