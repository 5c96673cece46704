/**
 * Error taxonomy shared by every mdtidy script.
 * All kinds are terminal for the invocation; unparseable dates are not errors.
 */

export type MdToolErrorKind =
  | "input-not-found"
  | "malformed-argument"
  | "structural-mismatch"
  | "missing-header"
  | "io-failure";

export class MdToolError extends Error {
  readonly kind: MdToolErrorKind;

  constructor(kind: MdToolErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MdToolError";
    this.kind = kind;
  }
}

export function isMdToolError(value: unknown): value is MdToolError {
  return value instanceof MdToolError;
}

export function notFound(target: string, what = "File"): MdToolError {
  return new MdToolError("input-not-found", `${what} not found: ${target}`);
}

export function malformedArgument(message: string): MdToolError {
  return new MdToolError("malformed-argument", message);
}

export function structuralMismatch(message: string): MdToolError {
  return new MdToolError("structural-mismatch", message);
}

export function missingHeader(message: string): MdToolError {
  return new MdToolError("missing-header", message);
}

export function ioFailure(
  action: "read" | "write",
  target: string,
  cause: unknown
): MdToolError {
  const detail = cause instanceof Error ? cause.message : String(cause);
  return new MdToolError(
    "io-failure",
    `Failed to ${action} ${target}: ${detail}`,
    { cause }
  );
}
