import { open } from "node:fs/promises";
import { createTaggedError } from "../../core/Retry.js";
import { resolveGrantedPath } from "../../sandbox/pathScope.js";
import { booleanArg, defineBuiltin, optionalNumberArg, stringArg } from "../types.js";

export const readTextTool = defineBuiltin(
  {
    name: "builtin/fs.readText",
    version: "1.0.0",
    description: "Read a UTF-8 text file from the working directory",
    tags: ["filesystem", "read", "builtin"],
    inputSchema: {
      type: "object",
      properties: {
        path: { type: "string", description: "Relative to the granted working directory" },
        maxBytes: { type: "integer", minimum: 1, description: "Defaults to builtinTools.maxReadBytes" },
        truncate: {
          type: "boolean",
          default: false,
          description: "Return the first maxBytes instead of failing on larger files",
        },
      },
      required: ["path"],
      additionalProperties: false,
    },
    outputSchema: {
      type: "object",
      properties: {
        path: { type: "string" },
        text: { type: "string" },
        bytes: { type: "integer" },
        truncated: { type: "boolean" },
      },
      required: ["path", "text", "bytes", "truncated"],
      additionalProperties: false,
    },
  },
  async (args, ctx) => {
    const path = stringArg(args, "path");
    const limit = optionalNumberArg(args, "maxBytes") ?? ctx.config.maxReadBytes;
    const allowPartial = booleanArg(args, "truncate", false);
    const target = await resolveGrantedPath(path, ctx.call.workDir ?? ctx.config.workDir);

    const handle = await open(target, "r");
    try {
      const { size } = await handle.stat();
      if (size > limit && !allowPartial) {
        throw createTaggedError("resource-limit", `File size ${size} bytes exceeds limit of ${limit} bytes`, {
          path,
          size,
          limit,
        });
      }
      const length = Math.min(size, limit);
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, 0);
      return {
        path,
        text: buffer.subarray(0, bytesRead).toString("utf-8"),
        bytes: bytesRead,
        truncated: bytesRead < size,
      };
    } finally {
      await handle.close();
    }
  },
);
