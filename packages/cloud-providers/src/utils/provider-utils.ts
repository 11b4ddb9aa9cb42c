/**
 * Shared utilities for cloud provider implementations
 */

import type { ZodError } from "zod";
import { ValidationError } from "@skyform/adapters-common";

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Convert a zod failure into a ValidationError naming every bad field
 */
export function toValidationError(subject: string, error: ZodError): ValidationError {
  const issues = error.issues.map(issue => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
  const summary = issues
    .map(issue => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join("; ");

  return new ValidationError(`Invalid ${subject}: ${summary}`, issues);
}
