import Mustache from "mustache";
import { createTaggedError } from "../../core/Retry.js";
import { booleanArg, defineBuiltin, stringArg } from "../types.js";

export const templateRenderTool = defineBuiltin(
  {
    name: "builtin/template.render",
    version: "1.0.0",
    description: "Fill a Mustache template from a data object",
    tags: ["template", "text", "builtin"],
    inputSchema: {
      type: "object",
      properties: {
        template: { type: "string" },
        data: { type: "object", additionalProperties: true },
        partials: {
          type: "object",
          additionalProperties: { type: "string" },
          description: "Named sub-templates usable as {{> name}}",
        },
        escapeHtml: { type: "boolean", default: true },
      },
      required: ["template", "data"],
      additionalProperties: false,
    },
    outputSchema: {
      type: "object",
      properties: { text: { type: "string" } },
      required: ["text"],
      additionalProperties: false,
    },
  },
  async (args) => {
    const template = stringArg(args, "template");
    const partials = stringRecord(args.partials);
    const escape = booleanArg(args, "escapeHtml", true) ? Mustache.escape : (value: string) => value;
    try {
      return { text: Mustache.render(template, args.data, partials, { escape }) };
    } catch (err) {
      throw createTaggedError(
        "input-invalid",
        `Template could not be rendered: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  },
);

function stringRecord(value: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (value !== null && typeof value === "object") {
    for (const [name, text] of Object.entries(value)) {
      if (typeof text === "string") out[name] = text;
    }
  }
  return out;
}
