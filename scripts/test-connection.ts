#!/usr/bin/env node
/**
 * Smoke test against the live Notion database.
 * Checks credentials, database access and the property schema, then reads
 * a few records through the mapper.
 *
 * Run with: npm run test-connection
 */

import { loadNotionConfig, ConfigError, type NotionConfig } from "../src/config/index.js";
import { NotionTransport } from "../src/notion/client.js";
import { SpeakerRepository, SpeakerTrackerError } from "../src/speakers/index.js";
import { formatConnectionStatus } from "../src/tools/format.js";

console.log("=== Notion Connection Test ===\n");

// Step 1: Configuration
console.log("1. Loading configuration...");

function loadConfigOrExit(): NotionConfig {
  try {
    return loadNotionConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.log(`   ✗ ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

const notion = loadConfigOrExit();
console.log("   ✓ NOTION_API_KEY is set");
console.log(`   ✓ NOTION_DATABASE_ID: ${notion.databaseId}`);

const repository = new SpeakerRepository(
  new NotionTransport({
    apiKey: notion.apiKey,
    databaseId: notion.databaseId,
    timeoutMs: notion.timeoutMs,
  })
);

// Step 2: Database access and schema
console.log("\n2. Retrieving database...");
const status = await repository.testConnection();
console.log(
  formatConnectionStatus(status)
    .split("\n")
    .map((line) => `   ${line}`)
    .join("\n")
);
if (!status.success) {
  process.exit(1);
}

// Step 3: Read a few records
console.log("\n3. Reading up to 5 speakers...");
try {
  const speakers = await repository.searchSpeakers({}, 5);
  console.log(`   ✓ Read ${speakers.length} speaker(s)`);
  for (const speaker of speakers) {
    console.log(`   - ${speaker.name} [${speaker.contactStatus}]`);
  }
} catch (err) {
  if (err instanceof SpeakerTrackerError) {
    console.log(`   ✗ ${err.name}: ${err.message}`);
    process.exit(1);
  }
  throw err;
}

console.log("\n=== Connection test passed ===");
