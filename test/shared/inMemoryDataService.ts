import type {
  ClassSchema,
  DataService,
  EqualityFilter,
  ObjectProperties,
  QueriedObject,
} from '../../src/core/dataService';
import type { Clock } from '../../src/core/retry';

type StoredObject = {
  id: string;
  className: string;
  properties: ObjectProperties;
  visibleAt: number;
};

export type InMemoryDataServiceOptions = {
  clock: Pick<Clock, 'now'>;
  /** Read-after-write delay, per written object, in clock milliseconds. */
  visibilityDelayMs?: (properties: ObjectProperties) => number;
  rejectWrites?: boolean;
};

/** Stand-in for the service under test: stores objects in memory and hides fresh writes for a while. */
export class InMemoryDataService implements DataService {
  readonly classes = new Map<string, ClassSchema>();
  readonly objects: StoredObject[] = [];
  queries = 0;

  constructor(private readonly options: InMemoryDataServiceOptions) {}

  async createClass(schema: ClassSchema): Promise<void> {
    if (this.classes.has(schema.class)) {
      throw new Error(`class name '${schema.class}' already exists`);
    }
    this.classes.set(schema.class, schema);
  }

  async createObject(className: string, properties: ObjectProperties): Promise<string | null> {
    if (this.options.rejectWrites) {
      throw new Error('write rejected: no quorum');
    }
    if (!this.classes.has(className)) {
      throw new Error(`class '${className}' not found`);
    }
    const id = `obj-${this.objects.length}`;
    const delay = this.options.visibilityDelayMs?.(properties) ?? 0;
    this.objects.push({
      id,
      className,
      properties: { ...properties },
      visibleAt: this.options.clock.now() + delay,
    });
    return id;
  }

  /** Equal filters match the way the service indexes the property: on tokens, unless it is field-tokenized. */
  async query(className: string, filter: EqualityFilter, _fields: string[]): Promise<QueriedObject[]> {
    this.queries += 1;
    const [field] = filter.path;
    const property = this.classes.get(className)?.properties.find((candidate) => candidate.name === field);
    const tokenize = (value: string): string[] => {
      if (property?.tokenization === 'field') {
        return [value];
      }
      const separator = property?.dataType.includes('text') ? /[^a-z0-9]+/u : /\s+/u;
      return value
        .toLowerCase()
        .split(separator)
        .filter((token) => token.length > 0);
    };
    const wanted = tokenize(filter.valueString);
    return this.visible(className)
      .filter((object) => {
        const stored = field === undefined ? undefined : object.properties[field];
        if (typeof stored !== 'string') {
          return false;
        }
        const tokens = tokenize(stored);
        return wanted.every((token) => tokens.includes(token));
      })
      .map((object) => ({ id: object.id, properties: { ...object.properties } }));
  }

  async aggregateCount(className: string): Promise<number> {
    return this.visible(className).length;
  }

  private visible(className: string): StoredObject[] {
    const now = this.options.clock.now();
    return this.objects.filter((object) => object.className === className && object.visibleAt <= now);
  }
}
