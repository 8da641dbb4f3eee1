import { mkdir, writeFile } from "node:fs/promises";
import { createHash } from "node:crypto";
import { dirname } from "node:path";
import { createTaggedError } from "../../core/Retry.js";
import { resolveGrantedPath } from "../../sandbox/pathScope.js";
import { defineBuiltin, optionalStringArg, stringArg } from "../types.js";

type WriteMode = "create" | "overwrite" | "append";

const FLAGS: Record<WriteMode, string> = {
  create: "wx",
  overwrite: "w",
  append: "a",
};

export const writeTextTool = defineBuiltin(
  {
    name: "builtin/fs.writeText",
    version: "1.0.0",
    description: "Write UTF-8 text to a file in the working directory",
    tags: ["filesystem", "write", "builtin"],
    inputSchema: {
      type: "object",
      properties: {
        path: { type: "string", description: "Relative to the granted working directory" },
        text: { type: "string" },
        mode: {
          type: "string",
          enum: ["create", "overwrite", "append"],
          default: "create",
          description: "create fails when the file already exists",
        },
      },
      required: ["path", "text"],
      additionalProperties: false,
    },
    outputSchema: {
      type: "object",
      properties: {
        path: { type: "string" },
        bytes: { type: "integer" },
        sha256: { type: "string", description: "Digest of the text written by this call" },
      },
      required: ["path", "bytes", "sha256"],
      additionalProperties: false,
    },
  },
  async (args, ctx) => {
    const path = stringArg(args, "path");
    const text = stringArg(args, "text");
    const requested = optionalStringArg(args, "mode") ?? "create";
    const mode = requested === "overwrite" || requested === "append" ? requested : "create";
    const target = await resolveGrantedPath(path, ctx.call.workDir ?? ctx.config.workDir);

    await mkdir(dirname(target), { recursive: true });
    try {
      await writeFile(target, text, { encoding: "utf-8", flag: FLAGS[mode] });
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "EEXIST") {
        throw createTaggedError("tool-error", `File already exists: ${path}`, { path, mode });
      }
      throw err;
    }

    return {
      path,
      bytes: Buffer.byteLength(text, "utf-8"),
      sha256: createHash("sha256").update(text, "utf-8").digest("hex"),
    };
  },
);
