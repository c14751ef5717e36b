/**
 * Speaker repository: the only component that talks to the record store.
 *
 * Every read goes to the remote service; nothing is cached between calls.
 * Writes are single requests, so a failure leaves the remote record exactly
 * as the service left it. Errors are never retried here.
 */

import type { z } from "zod";
import { MAX_PAGE_SIZE, type FilterExpression } from "../notion/schema.js";
import type { RecordTransport } from "../notion/transport.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import { buildFilterExpression } from "./filter.js";
import { fromRemoteRecord, toRemoteProperties } from "./mapper.js";
import { SPEAKER_PROPERTIES } from "./properties.js";
import {
  SearchFilterSchema,
  SpeakerCreateSchema,
  SpeakerUpdateSchema,
  type GroupableField,
  type SearchFilter,
  type Speaker,
  type SpeakerCreateInput,
  type SpeakerUpdateInput,
} from "./schema.js";
import {
  NotFoundError,
  RemoteServiceError,
  SpeakerTrackerError,
  ValidationError,
} from "./errors.js";

export interface SpeakerGroup {
  /** Field value shared by the group; null for records without one */
  key: string | null;
  speakers: Speaker[];
}

export type SpeakerListing =
  | { kind: "flat"; speakers: Speaker[] }
  | { kind: "grouped"; groupBy: GroupableField; total: number; groups: SpeakerGroup[] };

export interface ListOptions {
  groupBy?: GroupableField;
  limit?: number;
}

export interface PropertyMismatch {
  property: string;
  expected: string;
  actual: string;
}

export type ConnectionStatus =
  | {
      success: true;
      databaseId: string;
      databaseTitle: string;
      /** Expected properties the database does not define */
      missingProperties: string[];
      /** Expected properties defined with a different kind */
      mismatchedProperties: PropertyMismatch[];
    }
  | { success: false; error: string };

export interface SpeakerRepositoryOptions {
  logger?: Logger;
}

export class SpeakerRepository {
  private readonly logger: Logger;

  constructor(
    private readonly transport: RecordTransport,
    options: SpeakerRepositoryOptions = {}
  ) {
    this.logger = (options.logger ?? createSilentLogger()).child({ component: "speakers" });
  }

  /**
   * Create a speaker. `contactStatus` defaults to "Not Contacted".
   */
  async addSpeaker(input: SpeakerCreateInput): Promise<Speaker> {
    const create = validate(SpeakerCreateSchema, input, "Invalid speaker");
    const properties = toRemoteProperties(create);

    this.logger.debug("Creating speaker", { name: create.name });
    const speaker = fromRemoteRecord(await this.transport.createRecord(properties));
    this.logger.info("Speaker created", { id: speaker.id, name: speaker.name });
    return speaker;
  }

  /**
   * Fetch one speaker. Archived records count as missing.
   */
  async getSpeaker(id: string): Promise<Speaker> {
    const recordId = validateId(id);
    const record = await this.transport.retrieveRecord(recordId);
    if (record.archived) {
      throw new NotFoundError(recordId);
    }
    return fromRemoteRecord(record);
  }

  /**
   * Query speakers matching every present predicate of `filter`, in the
   * order the service returns them, up to `limit` records.
   */
  async searchSpeakers(filter: SearchFilter = {}, limit?: number): Promise<Speaker[]> {
    const predicates = validate(SearchFilterSchema, filter, "Invalid search filter");
    const max = validateLimit(limit);
    const speakers = await this.drain(buildFilterExpression(predicates), max);
    this.logger.info("Speaker search completed", { filter: predicates, resultCount: speakers.length });
    return speakers;
  }

  /**
   * Apply a partial update and return the record as stored afterwards.
   * Fields absent from `updates` are left untouched; null clears a field.
   * An archived record is reported as missing, as in `getSpeaker`.
   */
  async updateSpeaker(id: string, updates: SpeakerUpdateInput): Promise<Speaker> {
    const recordId = validateId(id);
    const changes = validate(SpeakerUpdateSchema, updates, "Invalid speaker update");
    const properties = toRemoteProperties(changes);
    const changed = Object.keys(properties);

    if (changed.length === 0) {
      this.logger.debug("Update has no fields; skipping write", { id: recordId });
    } else {
      try {
        await this.transport.updateRecord(recordId, { properties });
      } catch (err) {
        // Notion rejects edits to archived pages as a validation error.
        if (err instanceof RemoteServiceError && err.code === "validation_error") {
          await this.getSpeaker(recordId);
        }
        throw err;
      }
      this.logger.info("Speaker updated", { id: recordId, properties: changed });
    }

    return this.getSpeaker(recordId);
  }

  /**
   * Every speaker, optionally grouped. Grouping runs after the whole result
   * set is fetched; groups appear in order of first appearance.
   */
  async listSpeakers(options: ListOptions = {}): Promise<SpeakerListing> {
    const max = validateLimit(options.limit);
    const speakers = await this.drain(undefined, max);

    if (options.groupBy === undefined) {
      return { kind: "flat", speakers };
    }
    return {
      kind: "grouped",
      groupBy: options.groupBy,
      total: speakers.length,
      groups: groupSpeakers(speakers, options.groupBy),
    };
  }

  /**
   * Soft-delete a speaker by archiving its page.
   */
  async archiveSpeaker(id: string): Promise<Speaker> {
    const recordId = validateId(id);
    const speaker = fromRemoteRecord(
      await this.transport.updateRecord(recordId, { archived: true })
    );
    this.logger.info("Speaker archived", { id: recordId, name: speaker.name });
    return speaker;
  }

  /**
   * Check that the database is reachable and has the expected properties.
   * Remote failures are reported in the result, not thrown.
   */
  async testConnection(): Promise<ConnectionStatus> {
    try {
      const database = await this.transport.retrieveDatabase();
      const missingProperties: string[] = [];
      const mismatchedProperties: PropertyMismatch[] = [];

      for (const { property, kind } of Object.values(SPEAKER_PROPERTIES)) {
        const actual = database.properties[property];
        if (actual === undefined) {
          missingProperties.push(property);
        } else if (actual !== kind) {
          mismatchedProperties.push({ property, expected: kind, actual });
        }
      }

      return {
        success: true,
        databaseId: database.id,
        databaseTitle: database.title || "Untitled",
        missingProperties,
        mismatchedProperties,
      };
    } catch (err) {
      if (err instanceof SpeakerTrackerError) {
        this.logger.warn("Connection test failed", { error: err });
        return { success: false, error: err.message };
      }
      throw err;
    }
  }

  /**
   * Follow the cursor chain until the service reports no more pages or
   * `limit` records have been collected. A failed page request aborts the
   * whole drain; partial results are never returned.
   */
  private async drain(filter: FilterExpression | undefined, limit?: number): Promise<Speaker[]> {
    const speakers: Speaker[] = [];
    let cursor: string | undefined;
    let pages = 0;

    for (;;) {
      const wanted = limit === undefined ? MAX_PAGE_SIZE : Math.min(limit - speakers.length, MAX_PAGE_SIZE);
      const page = await this.transport.queryRecords({ filter, pageSize: wanted, startCursor: cursor });
      pages += 1;

      for (const record of page.results) {
        speakers.push(fromRemoteRecord(record));
      }

      if (limit !== undefined && speakers.length >= limit) {
        break;
      }
      if (!page.hasMore) {
        break;
      }
      if (!page.nextCursor) {
        throw new RemoteServiceError(
          `Query reported more results without a cursor after page ${pages}`,
          { code: "malformed_response" }
        );
      }
      cursor = page.nextCursor;
    }

    this.logger.debug("Query drained", { pages, records: speakers.length });
    return limit === undefined ? speakers : speakers.slice(0, limit);
  }
}

/**
 * Stable grouping: groups in order of first appearance, records in their
 * original order within each group.
 */
export function groupSpeakers(speakers: readonly Speaker[], field: GroupableField): SpeakerGroup[] {
  const groups = new Map<string | null, Speaker[]>();
  for (const speaker of speakers) {
    const key = speaker[field] ?? null;
    const members = groups.get(key);
    if (members) {
      members.push(speaker);
    } else {
      groups.set(key, [speaker]);
    }
  }
  return [...groups].map(([key, members]) => ({ key, speakers: members }));
}

function validate<S extends z.ZodTypeAny>(schema: S, input: unknown, message: string): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZod(message, result.error.issues);
  }
  return result.data;
}

function validateId(id: string): string {
  const trimmed = id.trim();
  if (trimmed === "") {
    throw new ValidationError("Invalid speaker id", [
      { field: "id", message: "Speaker id must not be empty" },
    ]);
  }
  return trimmed;
}

function validateLimit(limit: number | undefined): number | undefined {
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    throw new ValidationError("Invalid limit", [
      { field: "limit", message: `Limit must be a positive integer, got ${limit}` },
    ]);
  }
  return limit;
}
