import { equalTo, type DataService, type QueriedObject } from './dataService';
import { AggregateMismatchError, DataLossError, TimeoutError } from './errors';
import { silentLogger, type Logger } from './log';
import { pollUntil, systemClock, type Clock, type PollPolicy, type ProbeResult } from './retry';
import type { VersionSequence } from './versionSequence';
import { COLLECTION_CLASS, type VersionRecord } from './workload';

const RECORD_FIELDS = ['_additional { id }', 'version', 'object_count'];

export type VerifierOptions = {
  data: DataService;
  versions: VersionSequence;
  /** Bound on how long a just-written object may stay invisible to reads. */
  visibility: PollPolicy;
  clock?: Clock;
  log?: Logger;
};

export type VerificationResult = {
  records: VersionRecord[];
  aggregateCount: number;
};

function toRecord(object: QueriedObject): VersionRecord | null {
  const { version, object_count: objectCount } = object.properties;
  if (typeof version !== 'string' || typeof objectCount !== 'number') {
    return null;
  }
  return { version, object_count: objectCount };
}

export class ConsistencyVerifier {
  private readonly data: DataService;
  private readonly versions: VersionSequence;
  private readonly visibility: PollPolicy;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(options: VerifierOptions) {
    this.data = options.data;
    this.versions = options.versions;
    this.visibility = options.visibility;
    this.clock = options.clock ?? systemClock;
    this.log = options.log ?? silentLogger;
  }

  async verify(uptoIndex: number, expectedCount: number): Promise<VerificationResult> {
    const records = await this.findEachImportedObject(uptoIndex);
    const aggregateCount = await this.aggregateObjects(expectedCount);
    return { records, aggregateCount };
  }

  /**
   * Re-reads the record of every version up to and including `uptoIndex`.
   * The record of step `i` must carry `object_count == i`. An empty result
   * is retried within the visibility bound; a wrong or duplicated match
   * fails at once.
   */
  async findEachImportedObject(uptoIndex: number): Promise<VersionRecord[]> {
    const lastVersion = this.versions.at(uptoIndex);
    const found: VersionRecord[] = [];
    for (const [index, version] of this.versions.slice(uptoIndex).entries()) {
      found.push(await this.findVersion(version, index));
    }
    this.log(
      `Found ${found.length} imported objects (versions ${this.versions.bootstrap}..${lastVersion})`,
    );
    return found;
  }

  async aggregateObjects(expectedCount: number): Promise<number> {
    let lastCount = 0;
    try {
      return await pollUntil(
        `aggregate count ${expectedCount}`,
        async (): Promise<ProbeResult<number>> => {
          lastCount = await this.data.aggregateCount(COLLECTION_CLASS);
          if (lastCount > expectedCount) {
            throw new AggregateMismatchError(expectedCount, lastCount);
          }
          if (lastCount < expectedCount) {
            return { done: false, reason: `count=${lastCount}` };
          }
          return { done: true, value: lastCount };
        },
        this.visibility,
        this.clock,
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new AggregateMismatchError(expectedCount, lastCount);
      }
      throw error;
    }
  }

  private async findVersion(version: string, expectedCount: number): Promise<VersionRecord> {
    try {
      return await pollUntil(
        `object for version ${version}`,
        async (): Promise<ProbeResult<VersionRecord>> => {
          const objects = await this.data.query(
            COLLECTION_CLASS,
            equalTo('version', version),
            RECORD_FIELDS,
          );
          if (objects.length === 0) {
            return { done: false, reason: 'no matching object' };
          }
          if (objects.length > 1) {
            throw new DataLossError(version, `expected exactly one match, got ${objects.length}`);
          }
          const [object] = objects;
          const record = object ? toRecord(object) : null;
          if (record === null || record.version !== version) {
            throw new DataLossError(
              version,
              `wanted ${version} got ${JSON.stringify(object?.properties ?? null)}`,
            );
          }
          if (record.object_count !== expectedCount) {
            throw new DataLossError(
              version,
              `object_count changed: wanted ${expectedCount} got ${record.object_count}`,
            );
          }
          return { done: true, value: record };
        },
        this.visibility,
        this.clock,
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new DataLossError(version, `not found after ${error.attempts} attempts`);
      }
      throw error;
    }
  }
}
