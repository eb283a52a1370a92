import type { ZodIssue, ZodType, ZodTypeDef } from "zod";

import { err, ok, type Result } from "../types/result.js";
import type { TrailError } from "../types/domain-error.js";

export const formatZodIssues = (issues: ReadonlyArray<ZodIssue>): string =>
  issues
    .map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join(".") : "body";
      return `${field}: ${issue.message}`;
    })
    .join("; ");

/**
 * Parses an input with the given schema and converts validation failures into Result errors.
 */
export const safeParse = <TOutput, TInput = TOutput>(
  schema: ZodType<TOutput, ZodTypeDef, TInput>,
  input: unknown,
  errorFactory: (issues: string) => TrailError,
): Result<TOutput, TrailError> => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    return err(errorFactory(formatZodIssues(parsed.error.issues)));
  }
  return ok(parsed.data);
};
