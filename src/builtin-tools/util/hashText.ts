import { createHash, type BinaryToTextEncoding } from "node:crypto";
import { defineBuiltin, optionalStringArg, stringArg } from "../types.js";

const ALGORITHMS = ["sha256", "sha512", "sha1", "md5"] as const;
const ENCODINGS: readonly BinaryToTextEncoding[] = ["hex", "base64", "base64url"];

export const hashTextTool = defineBuiltin(
  {
    name: "builtin/hash.text",
    version: "1.0.0",
    description: "Digest of a UTF-8 string",
    tags: ["hash", "builtin"],
    inputSchema: {
      type: "object",
      properties: {
        text: { type: "string" },
        algorithm: { type: "string", enum: [...ALGORITHMS], default: "sha256" },
        encoding: { type: "string", enum: [...ENCODINGS], default: "hex" },
      },
      required: ["text"],
      additionalProperties: false,
    },
    outputSchema: {
      type: "object",
      properties: {
        digest: { type: "string" },
        algorithm: { type: "string" },
      },
      required: ["digest", "algorithm"],
      additionalProperties: false,
    },
  },
  async (args) => {
    const text = stringArg(args, "text");
    const requested = optionalStringArg(args, "algorithm");
    const algorithm = ALGORITHMS.find((a) => a === requested) ?? "sha256";
    const requestedEncoding = optionalStringArg(args, "encoding");
    const encoding = ENCODINGS.find((e) => e === requestedEncoding) ?? "hex";
    return { digest: createHash(algorithm).update(text, "utf-8").digest(encoding), algorithm };
  },
);
