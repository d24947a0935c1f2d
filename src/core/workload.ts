import type { ClassSchema, DataService } from './dataService';
import { ImportError, SchemaError } from './errors';
import { silentLogger, type Logger } from './log';

export const COLLECTION_CLASS = 'Collection';

export const COLLECTION_SCHEMA: ClassSchema = {
  class: COLLECTION_CLASS,
  properties: [
    // Whole-value tokens: under word tokenization "1.16.1" would also match "1.16.0".
    { name: 'version', dataType: ['string'], tokenization: 'field' },
    { name: 'object_count', dataType: ['int'] },
  ],
};

export type VersionRecord = {
  version: string;
  object_count: number;
};

export type RunState = {
  objectsCreated: number;
  currentStepIndex: number;
};

export function initialRunState(): RunState {
  return { objectsCreated: 0, currentStepIndex: 0 };
}

export class WorkloadDriver {
  private readonly log: Logger;

  constructor(
    private readonly data: DataService,
    log?: Logger,
  ) {
    this.log = log ?? silentLogger;
  }

  /** Called once, on the bootstrap step. An existing class is an error, not a no-op. */
  async createSchema(): Promise<void> {
    try {
      await this.data.createClass(COLLECTION_SCHEMA);
    } catch (error) {
      throw new SchemaError(COLLECTION_CLASS, error);
    }
    this.log(`Created class ${COLLECTION_CLASS}`);
  }

  /**
   * Writes one record tagged with `version`. The returned state counts the
   * write only once the service acknowledged it.
   */
  async importForVersion(
    state: RunState,
    version: string,
  ): Promise<{ record: VersionRecord; state: RunState }> {
    const record: VersionRecord = { version, object_count: state.objectsCreated };
    try {
      await this.data.createObject(COLLECTION_CLASS, record);
    } catch (error) {
      throw new ImportError(version, error);
    }
    this.log(`Imported object_count=${record.object_count} for version ${version}`);
    return {
      record,
      state: { ...state, objectsCreated: state.objectsCreated + 1 },
    };
  }
}
