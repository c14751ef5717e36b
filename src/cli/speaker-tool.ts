#!/usr/bin/env node
/**
 * Run one speaker tool from the command line.
 *
 * Usage:
 *   npx tsx src/cli/speaker-tool.ts <tool> [--args '<json>']
 *   npm run speaker-tool -- <tool> [--args '<json>']
 *
 * Options:
 *   -a, --args <json>   Tool arguments as a JSON object (default: {})
 *   --list              List the available tools and their arguments
 *   -h, --help          Show help
 *
 * Examples:
 *   speaker-tool test_connection
 *   speaker-tool add_speaker --args '{"name":"Dr. Jane Smith","affiliation":"Stanford"}'
 *   speaker-tool search_speakers --args '{"priority":"High"}'
 *
 * The tool's text result goes to stdout, logs to stderr.
 *
 * Exit codes:
 *   0 - Tool ran and reported success
 *   1 - Usage error, configuration error, or the tool reported an error
 */

import { existsSync, realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";

import { config, validateConfig, ConfigError } from "../config/index.js";
import { createLogger, initRunId } from "../logging/index.js";
import { createDefaultRegistry, type ToolSummary } from "../tools/index.js";

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export interface CliOptions {
  tool: string | undefined;
  args: object;
  list: boolean;
  help: boolean;
}

const USAGE = `Usage: speaker-tool <tool> [--args '<json>']
       speaker-tool --list

Options:
  -a, --args <json>   Tool arguments as a JSON object (default: {})
  --list              List the available tools and their arguments
  -h, --help          Show help`;

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      args: { type: "string", short: "a" },
      list: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (positionals.length > 1) {
    throw new CliUsageError(`Expected one tool name, got: ${positionals.join(" ")}`);
  }

  return {
    tool: positionals[0],
    args: parseToolArguments(values.args),
    list: values.list ?? false,
    help: values.help ?? false,
  };
}

/**
 * Parse the --args value. Missing or blank means no arguments.
 */
export function parseToolArguments(raw: string | undefined): object {
  if (raw === undefined || raw.trim() === "") {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new CliUsageError(
      `--args must be valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new CliUsageError("--args must be a JSON object");
  }
  return parsed;
}

export function formatToolList(tools: readonly ToolSummary[]): string {
  const lines: string[] = [];
  for (const tool of tools) {
    lines.push(tool.name, `  ${tool.description}`);
    for (const parameter of tool.parameters) {
      const flag = parameter.required ? " (required)" : "";
      const description = parameter.description ? ` - ${parameter.description}` : "";
      lines.push(`    ${parameter.name}${flag}${description}`);
    }
    lines.push("");
  }
  return lines.join("\n").trimEnd();
}

async function main(): Promise<number> {
  const runId = initRunId();
  const logger = createLogger({
    level: validateConfig(),
    logFile: config.logFile,
    context: { app: config.appName },
  });

  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CliUsageError || err instanceof TypeError) {
      console.error(`Error: ${err.message}\n\n${USAGE}`);
      return 1;
    }
    throw err;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const registry = createDefaultRegistry(logger);

  if (options.list) {
    console.log(formatToolList(registry.list()));
    return 0;
  }

  if (options.tool === undefined) {
    console.error(`Error: No tool given.\n\n${USAGE}`);
    return 1;
  }

  logger.info("Running tool", { tool: options.tool, runId });
  const result = await registry.invoke(options.tool, options.args);
  console.log(result.text);
  return result.isError ? 1 : 0;
}

/**
 * True when `scriptPath` (normally process.argv[1]) is the module at
 * `moduleUrl`. Symlinks are resolved, so npm's bin links count.
 */
export function isEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (scriptPath === undefined || !existsSync(scriptPath)) {
    return false;
  }
  return realpathSync(scriptPath) === realpathSync(fileURLToPath(moduleUrl));
}

// Only run when executed directly (not imported by tests)
if (isEntryPoint(process.argv[1], import.meta.url)) {
  main()
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      console.error(err instanceof ConfigError ? `Configuration error: ${message}` : `Error: ${message}`);
      process.exit(1);
    });
}
