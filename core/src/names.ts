import { RpcError } from "./errors.js";

/** Operation, field and exception names: an ASCII letter, then word characters. */
export const NAME_PATTERN = /^[A-Za-z]\w*$/;

export function isValidName(name: unknown): name is string {
  return typeof name === "string" && NAME_PATTERN.test(name);
}

/**
 * Throws a VALIDATION_ERROR unless `name` is a valid identifier.
 * Returns the name so it can be used inline.
 */
export function validateName(name: unknown, label = "name"): string {
  if (!isValidName(name)) {
    throw new RpcError({
      code: "VALIDATION_ERROR",
      message: `switchrpc-core:validateName - Invalid ${label}: ${JSON.stringify(name)}`,
      details: { label, name },
    });
  }
  return name;
}
