import type {
  ClassSchema,
  DataService,
  EqualityFilter,
  ObjectProperties,
  PropertyValue,
  QueriedObject,
} from '../../core/dataService';
import { DataServiceError } from '../../core/errors';
import { fetchWithTimeout } from './fetchWithTimeout';

type HttpMethod = 'GET' | 'POST';

function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.trim().replace(/\/+$/u, '');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toPropertyValue(value: unknown): PropertyValue {
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value === null
  ) {
    return value;
  }
  return JSON.stringify(value);
}

/** Renders a where filter as a GraphQL input object literal. */
export function renderWhere(filter: EqualityFilter): string {
  const path = filter.path.map((segment) => JSON.stringify(segment)).join(', ');
  return `{path: [${path}], operator: ${filter.operator}, valueString: ${JSON.stringify(filter.valueString)}}`;
}

export function buildGetQuery(className: string, filter: EqualityFilter, fields: string[]): string {
  return `{ Get { ${className}(where: ${renderWhere(filter)}) { ${fields.join(' ')} } } }`;
}

export function buildAggregateCountQuery(className: string): string {
  return `{ Aggregate { ${className} { meta { count } } } }`;
}

function parseGetObjects(data: Record<string, unknown>, className: string): QueriedObject[] {
  const get = data.Get;
  const rows = isRecord(get) ? get[className] : undefined;
  if (rows === null || rows === undefined) {
    return [];
  }
  if (!Array.isArray(rows)) {
    throw new DataServiceError(`Get.${className} is not a list: ${JSON.stringify(rows)}`, null);
  }
  return rows.filter(isRecord).map((row) => {
    const additional = row._additional;
    const id = isRecord(additional) && typeof additional.id === 'string' ? additional.id : null;
    const properties: ObjectProperties = {};
    for (const [key, value] of Object.entries(row)) {
      if (key !== '_additional') {
        properties[key] = toPropertyValue(value);
      }
    }
    return { id, properties };
  });
}

function parseAggregateCount(data: Record<string, unknown>, className: string): number {
  const aggregate = data.Aggregate;
  const groups = isRecord(aggregate) ? aggregate[className] : undefined;
  const first: unknown = Array.isArray(groups) ? groups[0] : undefined;
  const meta = isRecord(first) ? first.meta : undefined;
  const count = isRecord(meta) ? meta.count : undefined;
  if (typeof count !== 'number' || !Number.isInteger(count)) {
    throw new DataServiceError(
      `unexpected Aggregate.${className} response: ${JSON.stringify(aggregate ?? null)}`,
      null,
    );
  }
  return count;
}

/**
 * REST + GraphQL client for the service under test, covering only the calls
 * the harness makes.
 */
export class HttpDataService implements DataService {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly fetchFn: typeof fetch = fetch,
    private readonly requestTimeoutMs = 10_000,
  ) {
    this.baseUrl = normalizeBaseUrl(baseUrl);
  }

  async createClass(schema: ClassSchema): Promise<void> {
    await this.requestJson('/v1/schema', 'POST', schema);
  }

  async createObject(className: string, properties: ObjectProperties): Promise<string | null> {
    const body = await this.requestJson('/v1/objects', 'POST', { class: className, properties });
    return isRecord(body) && typeof body.id === 'string' ? body.id : null;
  }

  async query(className: string, filter: EqualityFilter, fields: string[]): Promise<QueriedObject[]> {
    const data = await this.graphql(buildGetQuery(className, filter, fields));
    return parseGetObjects(data, className);
  }

  async aggregateCount(className: string): Promise<number> {
    const data = await this.graphql(buildAggregateCountQuery(className));
    return parseAggregateCount(data, className);
  }

  private async graphql(query: string): Promise<Record<string, unknown>> {
    const body = await this.requestJson('/v1/graphql', 'POST', { query });
    if (!isRecord(body)) {
      throw new DataServiceError(`GraphQL response is not an object: ${JSON.stringify(body)}`, null);
    }
    if (Array.isArray(body.errors) && body.errors.length > 0) {
      throw new DataServiceError(`GraphQL errors: ${JSON.stringify(body.errors).slice(0, 400)}`, null);
    }
    if (!isRecord(body.data)) {
      throw new DataServiceError('GraphQL response is missing data', null);
    }
    return body.data;
  }

  private async requestJson(path: string, method: HttpMethod, body?: unknown): Promise<unknown> {
    const response = await fetchWithTimeout(
      this.fetchFn,
      `${this.baseUrl}${path}`,
      {
        method,
        headers: { 'content-type': 'application/json' },
        ...(typeof body !== 'undefined' ? { body: JSON.stringify(body) } : {}),
      },
      this.requestTimeoutMs,
    );
    const text = await response.text();
    if (!response.ok) {
      throw new DataServiceError(
        `${method} ${path} failed status=${response.status} body=${text.slice(0, 400)}`,
        response.status,
      );
    }
    if (text.trim().length === 0) {
      return null;
    }
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      throw new DataServiceError(`${method} ${path} returned non-JSON body: ${text.slice(0, 400)}`, response.status);
    }
  }
}
