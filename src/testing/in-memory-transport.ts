/**
 * In-process RecordTransport for tests.
 *
 * Behaves like the Notion database endpoints the repository uses: ids are
 * assigned on create, updates merge properties, archived pages drop out of
 * queries, and queries are served in cursor-chained pages of at most
 * `maxPageSize` records.
 */

import {
  PropertyValueSchema,
  plainText,
  type FilterExpression,
  type PropertyMap,
  type RemoteRecord,
} from "../notion/schema.js";
import type {
  QueryPage,
  QueryRequest,
  RecordTransport,
  RecordUpdate,
  RemoteDatabase,
} from "../notion/transport.js";
import { NotFoundError, RemoteServiceError } from "../speakers/errors.js";
import { SPEAKER_PROPERTIES } from "../speakers/properties.js";

export type TransportOperation = "create" | "retrieve" | "update" | "query" | "database";

interface PendingFailure {
  error: Error;
  skip: number;
}

export interface InMemoryTransportOptions {
  /** Largest page the fake will serve, whatever the request asks for */
  maxPageSize?: number;
  databaseId?: string;
  databaseTitle?: string;
  /** Property name -> kind; defaults to the speaker schema */
  databaseProperties?: Record<string, string>;
}

export class InMemoryTransport implements RecordTransport {
  /** Every call in order, e.g. "query", "update:page-0001" */
  readonly calls: string[] = [];
  /** Query requests as received */
  readonly queries: QueryRequest[] = [];
  /** Update requests as received */
  readonly updates: Array<{ id: string; update: RecordUpdate }> = [];

  private readonly records = new Map<string, RemoteRecord>();
  private readonly failures = new Map<TransportOperation, PendingFailure[]>();
  private readonly maxPageSize: number;
  private readonly database: RemoteDatabase;
  private nextId = 1;

  constructor(options: InMemoryTransportOptions = {}) {
    this.maxPageSize = options.maxPageSize ?? 100;
    this.database = {
      id: options.databaseId ?? "db-test",
      title: options.databaseTitle ?? "Speakers",
      properties: options.databaseProperties ?? defaultDatabaseProperties(),
    };
  }

  /**
   * Make a later call of `operation` throw `error`: the next one, or the one
   * after `skip` successful calls. Failures queue up.
   */
  failNext(operation: TransportOperation, error: Error, skip = 0): void {
    const queue = this.failures.get(operation) ?? [];
    queue.push({ error, skip });
    this.failures.set(operation, queue);
  }

  /** Insert a record directly, bypassing the mapper. */
  seed(properties: Record<string, unknown>): RemoteRecord {
    const record = this.store(properties);
    return structuredClone(record);
  }

  count(operation: TransportOperation): number {
    return this.calls.filter((call) => call.split(":")[0] === operation).length;
  }

  async createRecord(properties: PropertyMap): Promise<RemoteRecord> {
    this.enter("create");
    return structuredClone(this.store(structuredClone(properties)));
  }

  async retrieveRecord(id: string): Promise<RemoteRecord> {
    this.enter("retrieve", id);
    return structuredClone(this.lookup(id));
  }

  async updateRecord(id: string, update: RecordUpdate): Promise<RemoteRecord> {
    this.enter("update", id);
    this.updates.push({ id, update: structuredClone(update) });
    const record = this.lookup(id);
    if (record.archived && update.properties !== undefined && update.archived !== false) {
      throw new RemoteServiceError(
        "Notion update page failed: Can't edit block that is archived. You must unarchive the block before editing.",
        { code: "validation_error", status: 400 }
      );
    }
    if (update.properties !== undefined) {
      Object.assign(record.properties, structuredClone(update.properties));
    }
    if (update.archived !== undefined) {
      record.archived = update.archived;
    }
    return structuredClone(record);
  }

  async queryRecords(request: QueryRequest): Promise<QueryPage> {
    this.enter("query");
    this.queries.push(structuredClone(request));

    const matching = [...this.records.values()].filter(
      (record) => !record.archived && (request.filter === undefined || matches(record, request.filter))
    );

    const start = request.startCursor === undefined ? 0 : Number(request.startCursor);
    if (!Number.isInteger(start) || start < 0 || start > matching.length) {
      throw new RemoteServiceError(`Invalid start_cursor: ${request.startCursor}`, {
        code: "validation_error",
        status: 400,
      });
    }

    const end = Math.min(start + Math.min(request.pageSize, this.maxPageSize), matching.length);
    const hasMore = end < matching.length;
    return {
      results: matching.slice(start, end).map((record) => structuredClone(record)),
      hasMore,
      nextCursor: hasMore ? String(end) : null,
    };
  }

  async retrieveDatabase(): Promise<RemoteDatabase> {
    this.enter("database");
    return structuredClone(this.database);
  }

  private enter(operation: TransportOperation, id?: string): void {
    this.calls.push(id === undefined ? operation : `${operation}:${id}`);
    const queue = this.failures.get(operation);
    const pending = queue?.[0];
    if (queue === undefined || pending === undefined) {
      return;
    }
    if (pending.skip > 0) {
      pending.skip -= 1;
      return;
    }
    queue.shift();
    throw pending.error;
  }

  private store(properties: Record<string, unknown>): RemoteRecord {
    const id = `page-${String(this.nextId++).padStart(4, "0")}`;
    const record: RemoteRecord = {
      id,
      url: `https://www.notion.so/${id}`,
      archived: false,
      properties,
    };
    this.records.set(id, record);
    return record;
  }

  private lookup(id: string): RemoteRecord {
    const record = this.records.get(id);
    if (record === undefined) {
      throw new NotFoundError(id);
    }
    return record;
  }
}

function defaultDatabaseProperties(): Record<string, string> {
  const properties: Record<string, string> = {};
  for (const binding of Object.values(SPEAKER_PROPERTIES)) {
    properties[binding.property] = binding.kind;
  }
  return properties;
}

function matches(record: RemoteRecord, filter: FilterExpression): boolean {
  if ("and" in filter) {
    return filter.and.every((condition) => matches(record, condition));
  }
  const value = propertyText(record.properties[filter.property]);
  if ("title" in filter) {
    return value.toLowerCase().includes(filter.title.contains.toLowerCase());
  }
  if ("rich_text" in filter) {
    return value.toLowerCase().includes(filter.rich_text.contains.toLowerCase());
  }
  return value === filter.select.equals;
}

function propertyText(raw: unknown): string {
  const parsed = PropertyValueSchema.safeParse(raw);
  if (!parsed.success) {
    return "";
  }
  const property = parsed.data;
  switch (property.type) {
    case "title":
      return plainText(property.title);
    case "rich_text":
      return plainText(property.rich_text);
    case "select":
      return property.select?.name ?? "";
    case "multi_select":
      return property.multi_select.map((option) => option.name).join(",");
    case "url":
      return property.url ?? "";
    case "email":
      return property.email ?? "";
  }
}
