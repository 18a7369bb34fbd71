/**
 * Builds the query descriptor for one search and renders it as an
 * Elasticsearch request body. Pure: no I/O.
 *
 * The query string is passed to the cluster untouched as a `query_string`
 * clause; the resolved time range is a `filter` clause on the timestamp
 * field, so both are required for a document to match.
 *
 * @module
 */
import { InvalidQueryConfiguration } from './errors';
import { validateFieldName, validateIndexName } from './inputSanitizer';
import { TimeRange } from './timeResolver';

export interface QueryDescriptor {
  readonly indexPattern: string;
  /** Cluster-native query string syntax, passed through as-is. */
  readonly queryString: string;
  readonly timestampField: string;
  readonly range: TimeRange;
  /** `'all'` requests whole documents. */
  readonly projectedFields: readonly string[] | 'all';
}

/** The search-related subset of the command arguments. */
export interface SearchSettings {
  index?: string;
  query?: string;
  tsfield?: string;
  fields?: readonly string[];
}

function validated(check: () => void): void {
  try {
    check();
  } catch (error: unknown) {
    throw new InvalidQueryConfiguration(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Validates the search settings and freezes them into a descriptor.
 *
 * When fields are projected, the timestamp field is appended if missing so
 * every record still carries its event time.
 *
 * @throws {InvalidQueryConfiguration} If the index or query is missing, or a
 *   name contains characters the cluster API cannot take.
 */
export function planQuery(
  settings: SearchSettings,
  range: TimeRange,
  defaultTimestampField: string,
): QueryDescriptor {
  const indexPattern = settings.index?.trim() ?? '';
  if (!indexPattern) {
    throw new InvalidQueryConfiguration('Missing required argument: index');
  }
  validated(() => validateIndexName(indexPattern));

  const queryString = settings.query?.trim() ?? '';
  if (!queryString) {
    throw new InvalidQueryConfiguration('Missing required argument: query');
  }

  const timestampField = settings.tsfield?.trim() || defaultTimestampField;
  validated(() => validateFieldName(timestampField));

  let projectedFields: readonly string[] | 'all' = 'all';
  if (settings.fields && settings.fields.length > 0) {
    const fields = settings.fields.map((field) => field.trim()).filter(Boolean);
    fields.forEach((field) => validated(() => validateFieldName(field)));
    if (!fields.includes(timestampField)) {
      fields.push(timestampField);
    }
    projectedFields = Object.freeze(fields);
  }

  return Object.freeze({
    indexPattern,
    queryString,
    timestampField,
    range: Object.freeze({ start: range.start, end: range.end }),
    projectedFields,
  });
}

/** Renders the descriptor as the body of the initial `_search` request. */
export function buildSearchBody(descriptor: QueryDescriptor, pageSize: number): Record<string, unknown> {
  const { timestampField, range } = descriptor;

  return {
    size: pageSize,
    sort: [{ [timestampField]: { order: 'asc' } }],
    _source: descriptor.projectedFields === 'all' ? true : [...descriptor.projectedFields],
    query: {
      bool: {
        must: [{ query_string: { query: descriptor.queryString } }],
        filter: [
          {
            range: {
              [timestampField]: { gte: range.start, lt: range.end, format: 'epoch_millis' },
            },
          },
        ],
      },
    },
  };
}
