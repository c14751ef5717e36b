/**
 * RecordTransport backed by the Notion REST API.
 *
 * Requests go through the SDK client's generic `request` method. Every
 * response is validated with zod before it reaches the mapper; a response
 * that does not match is a RemoteServiceError.
 */

import {
  Client,
  APIErrorCode,
  APIResponseError,
  LogLevel,
  isNotionClientError,
} from "@notionhq/client";
import type { z } from "zod";
import {
  DatabaseResponseSchema,
  QueryResponseSchema,
  RemoteRecordSchema,
  plainText,
  type PropertyMap,
  type RemoteRecord,
} from "./schema.js";
import type {
  QueryPage,
  QueryRequest,
  RecordTransport,
  RecordUpdate,
  RemoteDatabase,
} from "./transport.js";
import {
  NotFoundError,
  RemoteServiceError,
  SpeakerTrackerError,
} from "../speakers/errors.js";
import { createSilentLogger, type Logger } from "../logging/index.js";

export interface NotionRequest {
  path: string;
  method: "get" | "post" | "patch";
  body?: Record<string, unknown>;
}

/** The slice of the SDK client this transport relies on. */
export interface NotionRequester {
  request(args: NotionRequest): Promise<unknown>;
}

export interface NotionTransportOptions {
  apiKey: string;
  databaseId: string;
  timeoutMs?: number;
  logger?: Logger;
  /** Pre-built client; a new SDK client is created from apiKey otherwise */
  client?: NotionRequester;
}

export class NotionTransport implements RecordTransport {
  private readonly client: NotionRequester;
  private readonly databaseId: string;
  private readonly logger: Logger;

  constructor(options: NotionTransportOptions) {
    this.databaseId = options.databaseId;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: "notion" });
    this.client =
      options.client ??
      new Client({
        auth: options.apiKey,
        timeoutMs: options.timeoutMs,
        logLevel: LogLevel.WARN,
        logger: (level, message, extraInfo) => this.forwardClientLog(level, message, extraInfo),
      });
  }

  async createRecord(properties: PropertyMap): Promise<RemoteRecord> {
    const body = await this.send("create page", {
      path: "pages",
      method: "post",
      body: { parent: { database_id: this.databaseId }, properties },
    });
    return this.parse("create page", RemoteRecordSchema, body);
  }

  async retrieveRecord(id: string): Promise<RemoteRecord> {
    const body = await this.send(
      "retrieve page",
      { path: `pages/${encodeURIComponent(id)}`, method: "get" },
      id
    );
    return this.parse("retrieve page", RemoteRecordSchema, body);
  }

  async updateRecord(id: string, update: RecordUpdate): Promise<RemoteRecord> {
    const body: Record<string, unknown> = {};
    if (update.properties !== undefined) {
      body.properties = update.properties;
    }
    if (update.archived !== undefined) {
      body.archived = update.archived;
    }
    const response = await this.send(
      "update page",
      { path: `pages/${encodeURIComponent(id)}`, method: "patch", body },
      id
    );
    return this.parse("update page", RemoteRecordSchema, response);
  }

  async queryRecords(request: QueryRequest): Promise<QueryPage> {
    const body: Record<string, unknown> = { page_size: request.pageSize };
    if (request.filter !== undefined) {
      body.filter = request.filter;
    }
    if (request.startCursor !== undefined) {
      body.start_cursor = request.startCursor;
    }
    const response = await this.send("query database", {
      path: `databases/${encodeURIComponent(this.databaseId)}/query`,
      method: "post",
      body,
    });
    const page = this.parse("query database", QueryResponseSchema, response);
    return {
      results: page.results,
      hasMore: page.has_more,
      nextCursor: page.next_cursor,
    };
  }

  async retrieveDatabase(): Promise<RemoteDatabase> {
    const response = await this.send("retrieve database", {
      path: `databases/${encodeURIComponent(this.databaseId)}`,
      method: "get",
    });
    const database = this.parse("retrieve database", DatabaseResponseSchema, response);
    const properties: Record<string, string> = {};
    for (const [name, property] of Object.entries(database.properties)) {
      properties[name] = property.type;
    }
    return { id: database.id, title: plainText(database.title), properties };
  }

  /**
   * Issue one request. `recordId` marks requests addressed to a single page,
   * where object_not_found means the record does not exist.
   */
  private async send(operation: string, request: NotionRequest, recordId?: string): Promise<unknown> {
    this.logger.debug("Notion request", { operation, method: request.method, path: request.path });
    try {
      return await this.client.request(request);
    } catch (err) {
      throw toDomainError(operation, err, recordId);
    }
  }

  private parse<S extends z.ZodTypeAny>(operation: string, schema: S, body: unknown): z.infer<S> {
    const result = schema.safeParse(body);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new RemoteServiceError(
        `Notion ${operation} returned a malformed response: ${details}`,
        { code: "malformed_response" }
      );
    }
    return result.data;
  }

  private forwardClientLog(
    level: LogLevel,
    message: string,
    extraInfo: Record<string, unknown>
  ): void {
    switch (level) {
      case LogLevel.DEBUG:
        this.logger.debug(message, extraInfo);
        break;
      case LogLevel.INFO:
        this.logger.info(message, extraInfo);
        break;
      case LogLevel.WARN:
        this.logger.warn(message, extraInfo);
        break;
      case LogLevel.ERROR:
        this.logger.error(message, extraInfo);
        break;
    }
  }
}

/**
 * Map an SDK or network failure to the domain taxonomy.
 */
export function toDomainError(
  operation: string,
  err: unknown,
  recordId?: string
): SpeakerTrackerError {
  if (err instanceof SpeakerTrackerError) {
    return err;
  }
  if (isNotionClientError(err)) {
    if (recordId !== undefined && err.code === APIErrorCode.ObjectNotFound) {
      return new NotFoundError(recordId, { cause: err });
    }
    return new RemoteServiceError(`Notion ${operation} failed: ${err.message}`, {
      code: err.code,
      status: err instanceof APIResponseError ? err.status : undefined,
      cause: err,
    });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new RemoteServiceError(`Notion ${operation} failed: ${message}`, { cause: err });
}
