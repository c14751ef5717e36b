/**
 * Speaker tracker: typed speaker records on a Notion database.
 *
 * @example
 *   const transport = new NotionTransport({ apiKey, databaseId });
 *   const speakers = new SpeakerRepository(transport);
 *   const created = await speakers.addSpeaker({ name: "Dr. Jane Smith" });
 */

export * from "./speakers/index.js";
export { NotionTransport, type NotionTransportOptions, type NotionRequester } from "./notion/client.js";
export type {
  RecordTransport,
  RecordUpdate,
  QueryRequest,
  QueryPage,
  RemoteDatabase,
} from "./notion/transport.js";
export type { PropertyMap, PropertyValue, RemoteRecord, FilterExpression } from "./notion/schema.js";
export { config, validateConfig, loadNotionConfig, ConfigError, type NotionConfig } from "./config/index.js";
export { createLogger, createSilentLogger, type Logger, type LogLevel } from "./logging/index.js";
export {
  ToolRegistry,
  createSpeakerToolRegistry,
  createDefaultRegistry,
  lazyRepository,
} from "./tools/index.js";
