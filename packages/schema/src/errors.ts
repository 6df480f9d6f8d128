import { BitPackError } from "@bitpack/core";
import type { z } from "zod";

/**
 * A layout definition failed validation.
 */
export class InvalidLayoutDefinitionError extends BitPackError {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    super(`Invalid layout definition: ${issues.map(formatIssue).join("; ")}`);
    this.name = "InvalidLayoutDefinitionError";
    this.issues = issues;
  }
}

/**
 * A field name that the layout does not declare.
 */
export class UnknownFieldError extends BitPackError {
  readonly field: string;

  constructor(field: string) {
    super(`Unknown field: ${field}`);
    this.name = "UnknownFieldError";
    this.field = field;
  }
}

function formatIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}
