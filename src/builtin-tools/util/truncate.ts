import { defineBuiltin, numberArg, optionalStringArg, stringArg } from "../types.js";

/**
 * Cut `text` to at most `maxChars` characters including the marker. In word
 * mode the cut moves back to the last whitespace when there is one.
 */
export function truncateText(
  text: string,
  maxChars: number,
  marker: string,
  boundary: "char" | "word",
): string {
  const room = Math.max(0, maxChars - marker.length);
  let head = text.slice(0, room);
  if (boundary === "word") {
    const lastSpace = head.search(/\s\S*$/);
    if (lastSpace > 0) head = head.slice(0, lastSpace);
  }
  return head + marker;
}

export const truncateTool = defineBuiltin(
  {
    name: "builtin/text.truncate",
    version: "1.0.0",
    description: "Shorten text to a character budget, marking the cut",
    tags: ["text", "builtin"],
    inputSchema: {
      type: "object",
      properties: {
        text: { type: "string" },
        maxChars: { type: "integer", minimum: 1, description: "Budget including the marker" },
        suffix: { type: "string", default: "...", description: "Marker appended after a cut" },
        boundary: { type: "string", enum: ["char", "word"], default: "char" },
      },
      required: ["text", "maxChars"],
      additionalProperties: false,
    },
    outputSchema: {
      type: "object",
      properties: {
        text: { type: "string" },
        truncated: { type: "boolean" },
        originalLength: { type: "integer" },
      },
      required: ["text", "truncated", "originalLength"],
      additionalProperties: false,
    },
  },
  async (args) => {
    const text = stringArg(args, "text");
    const maxChars = numberArg(args, "maxChars");
    const marker = optionalStringArg(args, "suffix") ?? "...";
    const boundary = optionalStringArg(args, "boundary") === "word" ? "word" : "char";

    if (text.length <= maxChars) {
      return { text, truncated: false, originalLength: text.length };
    }
    return {
      text: truncateText(text, maxChars, marker, boundary),
      truncated: true,
      originalLength: text.length,
    };
  },
);
