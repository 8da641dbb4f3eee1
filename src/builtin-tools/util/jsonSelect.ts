import jmespath from "jmespath";
import { createTaggedError } from "../../core/Retry.js";
import { defineBuiltin, stringArg } from "../types.js";

export const jsonSelectTool = defineBuiltin(
  {
    name: "builtin/json.select",
    version: "1.0.0",
    description: "Query JSON data with a JMESPath expression",
    tags: ["json", "builtin"],
    inputSchema: {
      type: "object",
      properties: {
        json: { description: "Object or array to query" },
        path: { type: "string", description: "JMESPath expression" },
        default: { description: "Returned when the expression matches nothing" },
      },
      required: ["json", "path"],
      additionalProperties: false,
    },
    outputSchema: {
      type: "object",
      properties: {
        value: {},
        matched: { type: "boolean" },
      },
      required: ["value", "matched"],
      additionalProperties: false,
    },
  },
  async (args) => {
    const expression = stringArg(args, "path");
    let selected: unknown;
    try {
      selected = jmespath.search(args.json, expression);
    } catch (err) {
      throw createTaggedError(
        "input-invalid",
        `Invalid JMESPath expression "${expression}": ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    const matched = selected !== null && selected !== undefined;
    return { value: matched ? selected : (args.default ?? null), matched };
  },
);
