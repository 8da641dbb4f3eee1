import AjvModule, { type ValidateFunction, type ErrorObject } from "ajv";
import addFormatsModule from "ajv-formats";
import type { JsonSchema } from "../types/ToolDescriptor.js";

const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

/**
 * Schema validation result.
 */
export interface ValidationResult {
  valid: boolean;
  errors?: ErrorObject[];
  data?: unknown;
}

export interface SchemaValidatorOptions {
  /** Coerce scalar types to the schema's type (default: true) */
  coerceTypes?: boolean;
  /** Fill in schema defaults (default: true) */
  useDefaults?: boolean;
  /** Strip additional properties that fail the schema (default: true) */
  removeAdditional?: boolean;
}

/**
 * AJV-based JSON Schema validator with coercion and default enrichment.
 */
export class SchemaValidator {
  private readonly ajv: InstanceType<typeof Ajv>;
  private readonly cache = new Map<string, ValidateFunction>();

  constructor(options: SchemaValidatorOptions = {}) {
    this.ajv = new Ajv({
      allErrors: true,
      coerceTypes: options.coerceTypes ?? true,
      useDefaults: options.useDefaults ?? true,
      removeAdditional: (options.removeAdditional ?? true) ? "failing" : false,
      strict: false,
    });
    addFormats(this.ajv);
  }

  /**
   * Validate data against a JSON Schema.
   * Coerces types and applies defaults on a copy.
   */
  validate(schema: JsonSchema, data: unknown): ValidationResult {
    const validate = this.getOrCompile(schema);
    const cloned: unknown = structuredClone(data);

    if (validate(cloned)) {
      return { valid: true, data: cloned };
    }

    return {
      valid: false,
      errors: validate.errors ?? undefined,
    };
  }

  /**
   * Validate and return coerced data, or throw a descriptive error.
   */
  validateOrThrow(schema: JsonSchema, data: unknown, context: string): unknown {
    const result = this.validate(schema, data);
    if (!result.valid) {
      throw new SchemaValidationError(
        `${context}: ${formatSchemaErrors(result.errors ?? [])}`,
        result.errors ?? [],
      );
    }
    return result.data;
  }

  private getOrCompile(schema: JsonSchema): ValidateFunction {
    const normalized: object = this.normalizeSchema(schema);
    const key = JSON.stringify(normalized);
    let cached = this.cache.get(key);
    if (!cached) {
      cached = this.ajv.compile(normalized);
      this.cache.set(key, cached);
    }
    return cached;
  }

  /** Ensure schema is AJV-compatible (required = string[], nullable handled via type). */
  private normalizeSchema(schema: JsonSchema): JsonSchema {
    const out: JsonSchema = {};

    for (const [key, value] of Object.entries(schema)) {
      if (key === "required") {
        out.required = Array.isArray(value)
          ? value.filter((x): x is string => typeof x === "string")
          : typeof value === "string"
            ? [value]
            : [];
        continue;
      }
      if (key === "nullable") {
        continue;
      }
      if (key === "properties" && isSchemaObject(value)) {
        const props: JsonSchema = {};
        for (const [pk, pv] of Object.entries(value)) {
          props[pk] = isSchemaObject(pv) ? this.normalizeSchema(pv) : pv;
        }
        out.properties = props;
        continue;
      }
      if ((key === "items" || key === "additionalProperties") && isSchemaObject(value)) {
        out[key] = this.normalizeSchema(value);
        continue;
      }
      if ((key === "oneOf" || key === "anyOf" || key === "allOf") && Array.isArray(value)) {
        out[key] = value.map((item: unknown) =>
          isSchemaObject(item) ? this.normalizeSchema(item) : item,
        );
        continue;
      }
      out[key] = value;
    }

    // AJV: "nullable" requires "type". Convert nullable to type including "null".
    if (schema.nullable === true) {
      const existingType = out.type;
      if (existingType === undefined) {
        out.type = "object";
      } else if (Array.isArray(existingType)) {
        if (!existingType.includes("null")) out.type = [...existingType, "null"];
      } else {
        out.type = [existingType, "null"];
      }
    }
    return out;
  }
}

/**
 * Render AJV errors as `path message; path message`.
 */
export function formatSchemaErrors(errors: readonly ErrorObject[]): string {
  return errors.map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`).join("; ");
}

function isSchemaObject(value: unknown): value is JsonSchema {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Error thrown on schema validation failure.
 */
export class SchemaValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: ErrorObject[],
  ) {
    super(message);
    this.name = "SchemaValidationError";
  }
}
