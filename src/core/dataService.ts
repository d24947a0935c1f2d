export type PropertyDataType = 'string' | 'text' | 'int';

/** `field` indexes the whole value as one token; `word` splits it into words. */
export type Tokenization = 'field' | 'word';

export type PropertySchema = {
  name: string;
  dataType: PropertyDataType[];
  tokenization?: Tokenization;
};

export type ClassSchema = {
  class: string;
  properties: PropertySchema[];
};

export type PropertyValue = string | number | boolean | null;

export type ObjectProperties = Record<string, PropertyValue>;

export type EqualityFilter = {
  path: string[];
  operator: 'Equal';
  valueString: string;
};

export type QueriedObject = {
  id: string | null;
  properties: ObjectProperties;
};

/**
 * Data capability of the service under test. The harness only needs class
 * creation, single-object writes, a filtered read and an aggregate count.
 */
export interface DataService {
  createClass(schema: ClassSchema): Promise<void>;
  createObject(className: string, properties: ObjectProperties): Promise<string | null>;
  query(className: string, filter: EqualityFilter, fields: string[]): Promise<QueriedObject[]>;
  aggregateCount(className: string): Promise<number>;
}

export function equalTo(path: string, value: string): EqualityFilter {
  return { path: [path], operator: 'Equal', valueString: value };
}
