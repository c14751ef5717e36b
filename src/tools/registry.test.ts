/**
 * Tests for the tool registry.
 *
 * Run: node --import tsx --test src/tools/registry.test.ts
 */

import { describe, it } from "node:test";
import { strict as assert } from "node:assert";
import { z } from "zod";

import { ToolRegistry } from "./registry.js";

function createRegistry(): ToolRegistry {
  return new ToolRegistry()
    .register({
      name: "echo",
      description: "Repeat the text back.",
      parameters: z
        .object({
          text: z.string().describe("Text to echo"),
          times: z.number().int().positive().optional(),
        })
        .strict(),
      failureContext: "echoing",
      handler: async (args) => args.text.repeat(args.times ?? 1),
    })
    .register({
      name: "explode",
      description: "Always fails.",
      parameters: z.object({}),
      failureContext: "exploding",
      handler: async () => {
        throw new Error("kaboom");
      },
    });
}

async function invokeText(registry: ToolRegistry, name: string, args?: unknown): Promise<string> {
  return (await registry.invoke(name, args)).text;
}

describe("ToolRegistry.invoke", () => {
  it("runs the handler with parsed arguments", async () => {
    assert.equal(await invokeText(createRegistry(), "echo", { text: "hi", times: 2 }), "hihi");
  });

  it("reports missing arguments", async () => {
    assert.equal(
      await invokeText(createRegistry(), "echo", {}),
      "Error: Invalid arguments for echo: text: Required"
    );
  });

  it("reports unexpected arguments", async () => {
    assert.equal(
      await invokeText(createRegistry(), "echo", { text: "hi", loud: true }),
      "Error: Invalid arguments for echo: (arguments): Unrecognized key(s) in object: 'loud'"
    );
  });

  it("treats null arguments as none", async () => {
    assert.equal(
      await invokeText(createRegistry(), "echo", null),
      "Error: Invalid arguments for echo: text: Required"
    );
  });

  it("marks successes and failures", async () => {
    const registry = createRegistry();
    assert.deepStrictEqual(await registry.invoke("echo", { text: "ok" }), { text: "ok", isError: false });
    assert.equal((await registry.invoke("echo", {})).isError, true);
    assert.equal((await registry.invoke("explode")).isError, true);
    assert.equal((await registry.invoke("missing")).isError, true);
  });

  it("passes through a result the handler marks as failed", async () => {
    const registry = new ToolRegistry().register({
      name: "check",
      description: "Report a failed check.",
      parameters: z.object({}),
      failureContext: "checking",
      handler: async () => ({ text: "Check failed: offline", isError: true }),
    });
    assert.deepStrictEqual(await registry.invoke("check"), { text: "Check failed: offline", isError: true });
  });

  it("turns handler failures into an error string", async () => {
    assert.equal(await invokeText(createRegistry(), "explode"), "Error exploding: kaboom");
  });

  it("names the available tools for an unknown tool", async () => {
    assert.equal(
      await invokeText(createRegistry(), "missing"),
      "Error: Unknown tool 'missing'. Available tools: echo, explode"
    );
  });
});

describe("ToolRegistry.register", () => {
  it("rejects duplicate names", () => {
    const registry = createRegistry();
    assert.throws(
      () =>
        registry.register({
          name: "echo",
          description: "Again.",
          parameters: z.object({}),
          failureContext: "echoing",
          handler: async () => "",
        }),
      { message: "Tool already registered: echo" }
    );
  });

  it("summarizes tools in registration order", () => {
    const registry = createRegistry();
    assert.equal(registry.has("echo"), true);
    assert.equal(registry.has("missing"), false);
    assert.deepStrictEqual(registry.list(), [
      {
        name: "echo",
        description: "Repeat the text back.",
        parameters: [
          { name: "text", required: true, description: "Text to echo" },
          { name: "times", required: false, description: undefined },
        ],
      },
      { name: "explode", description: "Always fails.", parameters: [] },
    ]);
  });
});
