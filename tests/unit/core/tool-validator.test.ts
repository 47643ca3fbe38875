import { describe, it, expect } from "vitest";
import { ToolInputValidator } from "../../../src/core/tool-validator.js";
import type { InputSchema } from "../../../src/core/tool-validator.js";

const schema: InputSchema = {
  type: "object",
  properties: {
    network_id: { type: "string", maxLength: 8 },
    vlan_id: { type: "integer", minimum: 1, maximum: 4094 },
    status: { type: "string", enum: ["online", "offline"] },
    enabled: { type: "boolean" },
    tags: { type: "array", items: { type: "string" }, minItems: 1, maxItems: 2 },
    options: { type: "object" },
  },
  required: ["network_id"],
};

describe("ToolInputValidator", () => {
  it("passes valid input through", () => {
    const input = { network_id: "N_HQ", vlan_id: 40, status: "online", enabled: true, tags: ["a"], options: {} };
    expect(ToolInputValidator.validate(schema, input)).toEqual({ valid: true, sanitizedInput: input });
  });

  it("drops fields the schema does not declare", () => {
    expect(ToolInputValidator.validate(schema, { network_id: "N_HQ", shell: "rm -rf /" })).toEqual({
      valid: true,
      sanitizedInput: { network_id: "N_HQ" },
    });
  });

  it("reports missing required fields", () => {
    expect(ToolInputValidator.validate(schema, {})).toEqual({
      valid: false,
      errors: ["Missing required field: network_id"],
    });
  });

  it("checks string length and enums", () => {
    const result = ToolInputValidator.validate(schema, { network_id: "N_HEADQUARTERS", status: "rebooting" });
    expect(result.errors).toEqual([
      'Field "network_id" exceeds maximum length (14 > 8)',
      'Field "status" must be one of: online, offline',
    ]);
  });

  it("checks numeric type, integrality and range", () => {
    expect(ToolInputValidator.validate(schema, { network_id: "N", vlan_id: "40" }).errors).toEqual([
      'Field "vlan_id" must be a number, got string',
    ]);
    expect(ToolInputValidator.validate(schema, { network_id: "N", vlan_id: 4.5 }).errors).toEqual([
      'Field "vlan_id" must be an integer',
    ]);
    expect(ToolInputValidator.validate(schema, { network_id: "N", vlan_id: 5000 }).errors).toEqual([
      'Field "vlan_id" must be <= 4094',
    ]);
    expect(ToolInputValidator.validate(schema, { network_id: "N", vlan_id: 0 }).errors).toEqual([
      'Field "vlan_id" must be >= 1',
    ]);
  });

  it("checks arrays and their items", () => {
    expect(ToolInputValidator.validate(schema, { network_id: "N", tags: [] }).errors).toEqual([
      'Field "tags" must have at least 1 items',
    ]);
    expect(ToolInputValidator.validate(schema, { network_id: "N", tags: ["a", "b", "c"] }).errors).toEqual([
      'Field "tags" must have at most 2 items',
    ]);
    expect(ToolInputValidator.validate(schema, { network_id: "N", tags: ["a", 7] }).errors).toEqual([
      'Field "tags[1]" must be a string, got number',
    ]);
  });

  it("checks booleans and objects", () => {
    expect(ToolInputValidator.validate(schema, { network_id: "N", enabled: "yes", options: [] }).errors).toEqual([
      'Field "enabled" must be a boolean, got string',
      'Field "options" must be an object, got object',
    ]);
  });
});
