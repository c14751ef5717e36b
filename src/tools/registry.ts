/**
 * Explicit tool registry.
 *
 * Each tool is a name, a description, a zod object schema for its
 * arguments and an async handler returning display text. Tools are
 * registered once at startup; nothing is discovered by reflection.
 *
 * `invoke` never rejects: unknown tools, invalid arguments and handler
 * failures all come back as an "Error ..." result with `isError` set.
 */

import { z } from "zod";
import { createSilentLogger, type Logger } from "../logging/index.js";

export interface ToolDefinition<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  parameters: S;
  /** Phrase used in failure messages: "Error <failureContext>: ..." */
  failureContext: string;
  /** Plain text is a success; return a ToolResult to report a failure */
  handler: (args: z.infer<S>) => Promise<string | ToolResult>;
}

export interface ToolResult {
  text: string;
  isError: boolean;
}

export interface ToolParameterSummary {
  name: string;
  required: boolean;
  description: string | undefined;
}

export interface ToolSummary {
  name: string;
  description: string;
  parameters: ToolParameterSummary[];
}

interface RegisteredTool {
  summary: ToolSummary;
  run(rawArgs: unknown): Promise<ToolResult>;
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly logger: Logger;

  constructor(logger: Logger = createSilentLogger()) {
    this.logger = logger.child({ component: "tools" });
  }

  /**
   * Add a tool. Names must be unique.
   */
  register<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): this {
    if (this.tools.has(definition.name)) {
      throw new Error(`Tool already registered: ${definition.name}`);
    }

    const logger = this.logger;
    this.tools.set(definition.name, {
      summary: summarize(definition),
      async run(rawArgs: unknown): Promise<ToolResult> {
        const parsed = definition.parameters.safeParse(rawArgs ?? {});
        if (!parsed.success) {
          const details = parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "(arguments)"}: ${issue.message}`)
            .join("; ");
          return failure(`Error: Invalid arguments for ${definition.name}: ${details}`);
        }
        try {
          const result = await definition.handler(parsed.data);
          return typeof result === "string" ? { text: result, isError: false } : result;
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          logger.error("Tool failed", { tool: definition.name, error: err });
          return failure(`Error ${definition.failureContext}: ${message}`);
        }
      },
    });
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Registered tools in registration order. */
  list(): ToolSummary[] {
    return [...this.tools.values()].map((tool) => tool.summary);
  }

  async invoke(name: string, rawArgs: unknown = {}): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (tool === undefined) {
      const available = [...this.tools.keys()].join(", ");
      return failure(`Error: Unknown tool '${name}'. Available tools: ${available}`);
    }
    this.logger.debug("Invoking tool", { tool: name });
    return tool.run(rawArgs);
  }
}

function failure(text: string): ToolResult {
  return { text, isError: true };
}

function summarize<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): ToolSummary {
  const parameters: z.ZodTypeAny = definition.parameters;
  const shape: Record<string, z.ZodTypeAny> =
    parameters instanceof z.ZodObject ? parameters.shape : {};
  return {
    name: definition.name,
    description: definition.description,
    parameters: Object.entries(shape).map(([name, schema]) => ({
      name,
      required: !schema.isOptional(),
      description: schema.description,
    })),
  };
}
