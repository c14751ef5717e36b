/**
 * Tool layer: registry, speaker tool definitions and result formatting.
 */

import { loadNotionConfig } from "../config/index.js";
import { NotionTransport } from "../notion/client.js";
import { SpeakerRepository } from "../speakers/repository.js";
import type { Logger } from "../logging/index.js";
import { createSpeakerToolRegistry, type RepositoryProvider } from "./speaker-tools.js";
import type { ToolRegistry } from "./registry.js";

export {
  ToolRegistry,
  type ToolDefinition,
  type ToolResult,
  type ToolSummary,
  type ToolParameterSummary,
} from "./registry.js";
export { createSpeakerToolRegistry, type RepositoryProvider } from "./speaker-tools.js";
export * from "./format.js";

/**
 * Provider that builds the repository on first call and reuses it after.
 * A failed build (e.g. missing credentials) is retried on the next call.
 */
export function lazyRepository(build: () => SpeakerRepository): RepositoryProvider {
  let repository: SpeakerRepository | undefined;
  return () => {
    if (repository === undefined) {
      repository = build();
    }
    return repository;
  };
}

/**
 * Registry wired to the Notion database named by the environment.
 * Credentials are read when the first tool runs, not here.
 */
export function createDefaultRegistry(logger: Logger, env: NodeJS.ProcessEnv = process.env): ToolRegistry {
  const provider = lazyRepository(() => {
    const notion = loadNotionConfig(env);
    const transport = new NotionTransport({
      apiKey: notion.apiKey,
      databaseId: notion.databaseId,
      timeoutMs: notion.timeoutMs,
      logger,
    });
    logger.debug("Notion transport created", { databaseId: notion.databaseId });
    return new SpeakerRepository(transport, { logger });
  });
  return createSpeakerToolRegistry(provider, logger);
}
