export type RegistryErrorKind = "source-unreachable" | "tool-not-found";

/**
 * Failure to resolve a tool name to a descriptor.
 */
export class RegistryError extends Error {
  constructor(
    public readonly kind: RegistryErrorKind,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = "RegistryError";
  }
}
