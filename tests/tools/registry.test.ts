import { describe, expect, test } from "vitest";

import { createDefaultRegistry, createRegistry, ToolRegistry } from "../../src/tools";
import { ConfigError, DuplicateToolError } from "../../src/utils/errors";
import { createFakeTool, createReadFileFake } from "../helpers/fake-tools";

describe("tool registry", () => {
  test("fills spec defaults on registration", () => {
    const registry = createRegistry([createFakeTool({ name: "noop" })]);

    expect(registry.lookup("noop")).toEqual({
      description: "",
      effect: "mutating",
      name: "noop",
      requiredInputs: [],
      tags: [],
    });
  });

  test("returns undefined for an unknown name", () => {
    const registry = new ToolRegistry();

    expect(registry.lookup("missing")).toBeUndefined();
    expect(registry.getTool("missing")).toBeUndefined();
  });

  test("rejects a second tool with the same name", () => {
    const registry = createRegistry([createReadFileFake()]);

    expect(() => registry.register(createReadFileFake())).toThrow(DuplicateToolError);
    expect(registry.all()).toHaveLength(1);
  });

  test("rejects a tool name that is not snake_case", () => {
    const registry = new ToolRegistry();

    expect(() => registry.register(createFakeTool({ name: "Read File" }))).toThrow(ConfigError);
  });

  test("keeps the tool instance for execution", () => {
    const tool = createReadFileFake();
    const registry = createRegistry([tool]);

    expect(registry.getTool("read_file")).toBe(tool);
  });

  test("describes tools with their required inputs", () => {
    const registry = createRegistry([createReadFileFake()]);

    expect(registry.describe()).toBe(
      "- read_file (read_only): Reads a file.\n  Required inputs: path"
    );
  });

  test("default registry carries the built-in tools", () => {
    const names = createDefaultRegistry()
      .all()
      .map((spec) => spec.name);

    expect(names).toEqual(["git_status", "run_command", "echo"]);
  });
});
