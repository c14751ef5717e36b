/**
 * The seam between the speaker repository and the remote record store.
 *
 * Implementations translate their own failures into the domain error
 * taxonomy: NotFoundError for an unknown record id on retrieve/update,
 * RemoteServiceError for everything else.
 */

import type { FilterExpression, PropertyMap, RemoteRecord } from "./schema.js";

export interface QueryRequest {
  filter?: FilterExpression;
  /** 1..MAX_PAGE_SIZE */
  pageSize: number;
  /** Cursor from the previous page; omitted for the first page */
  startCursor?: string;
}

export interface QueryPage {
  results: RemoteRecord[];
  hasMore: boolean;
  nextCursor: string | null;
}

export interface RecordUpdate {
  properties?: PropertyMap;
  archived?: boolean;
}

export interface RemoteDatabase {
  id: string;
  title: string;
  /** Property name -> property kind as configured remotely */
  properties: Record<string, string>;
}

export interface RecordTransport {
  createRecord(properties: PropertyMap): Promise<RemoteRecord>;
  retrieveRecord(id: string): Promise<RemoteRecord>;
  updateRecord(id: string, update: RecordUpdate): Promise<RemoteRecord>;
  queryRecords(request: QueryRequest): Promise<QueryPage>;
  retrieveDatabase(): Promise<RemoteDatabase>;
}
