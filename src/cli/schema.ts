/**
 * Shared Ajv instance
 * Defaults are applied in place and unknown properties are dropped wherever a
 * schema sets additionalProperties: false.
 */

import Ajv from "ajv";
import addFormats from "ajv-formats";

export const ajv = new Ajv({
  allErrors: true,
  useDefaults: true,
  removeAdditional: true,
  allowUnionTypes: true,
});
addFormats(ajv);

/**
 * Format Ajv errors as one line each
 * @param args - Format arguments
 * @param args.errors - Errors from the last validation
 * @param args.label - Prefix naming the validated document
 *
 * @returns Human-readable error lines
 */
export const formatSchemaErrors = (args: {
  errors: ReadonlyArray<{ instancePath: string; message?: string }> | null | undefined;
  label: string;
}): Array<string> => {
  const { errors, label } = args;
  return (errors ?? []).map((error) => {
    const path = error.instancePath || "(root)";
    const message = error.message || "unknown error";
    return `${label} validation error at ${path}: ${message}`;
  });
};
