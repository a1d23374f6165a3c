import Ajv, { type ErrorObject, type SchemaObject } from "ajv";

import { CatalogError } from "./errors.js";

const ajv = new Ajv({ allErrors: true, strict: false });

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) {
    return ["unknown error"];
  }
  return errors.map((error) => {
    const instance = error.instancePath || "/";
    const message = error.message ?? "validation error";
    return `${instance} ${message}`;
  });
}

export type CatalogValidator<T> = (value: unknown) => T;

/**
 * Compiles `schema` once and returns a function that either hands back the
 * value typed as `T` or throws a CatalogError naming every violation.
 */
export function createValidator<T>(schema: SchemaObject, label: string): CatalogValidator<T> {
  const validate = ajv.compile<T>(schema);
  return (value: unknown): T => {
    if (validate(value)) {
      return value;
    }
    throw new CatalogError(`${label} failed validation`, formatErrors(validate.errors));
  };
}
