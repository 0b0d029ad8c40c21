import type { z } from "zod";

/**
 * Raised when bars, configuration or results fail schema validation.
 * The core never repairs input; callers fix the payload and retry.
 */
export class DataValidationError extends Error {
  public readonly label: string;
  public readonly issues: ReadonlyArray<string>;

  public constructor(label: string, issues: ReadonlyArray<string>) {
    super(`Invalid ${label}: ${issues.join("; ")}`);
    this.name = "DataValidationError";
    this.label = label;
    this.issues = issues;
  }
}

export const isDataValidationError = (error: unknown): error is DataValidationError =>
  error instanceof DataValidationError;

/**
 * Validates the supplied payload against the provided schema.
 *
 * @param label - Descriptive label for error reporting.
 * @throws DataValidationError when validation fails.
 */
export function assertValid<Output, Input = Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, Input>,
  value: unknown,
  label = "payload",
): Output {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.join(".") || "(root)";
      return `${path}: ${issue.message}`;
    });
    throw new DataValidationError(label, issues);
  }
  return parsed.data;
}
