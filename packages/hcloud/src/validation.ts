import { Result } from "better-result";
import { ValidationError } from "@hcloud-ts/errors";
import type { IdOrName } from "./models";

/**
 * Validate a resource ID before it is put into a request path.
 *
 * @example
 * ```ts
 * const id = validateId(42);
 * if (id.isErr()) {
 *   console.error(id.error.message); // never reached for 42
 * }
 * ```
 */
export function validateId(id: number): Result<number, ValidationError> {
  if (!Number.isSafeInteger(id) || id <= 0) {
    return Result.err(new ValidationError({ message: `invalid id: ${id}` }));
  }
  return Result.ok(id);
}

export function validateName(name: string | undefined, field = "name"): Result<string, ValidationError> {
  if (name === undefined || name.trim() === "") {
    return Result.err(new ValidationError({ message: `missing ${field}` }));
  }
  return Result.ok(name);
}

/**
 * A reference is usable when it carries a positive ID or a non-empty name
 */
export function isUsableRef(ref: IdOrName | undefined): ref is IdOrName {
  if (!ref) return false;
  if ("id" in ref) return Number.isSafeInteger(ref.id) && ref.id > 0;
  return ref.name.trim() !== "";
}

export function validateRef(
  ref: IdOrName | undefined,
  field: string
): Result<IdOrName, ValidationError> {
  if (!isUsableRef(ref)) {
    return Result.err(new ValidationError({ message: `missing ${field}` }));
  }
  return Result.ok(ref);
}
