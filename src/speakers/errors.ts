/**
 * Failures raised by the speaker core.
 *
 * Every failure the repository surfaces is one of the four subclasses below.
 * Callers that need a readable string (the tool layer) use `message`;
 * callers that branch on the kind use `instanceof`.
 */

import type { ZodIssue } from "zod";

export abstract class SpeakerTrackerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export interface ValidationIssue {
  /** Domain field path, e.g. "fieldSpecialty" or "potentialTopics.2" */
  field: string;
  message: string;
}

/**
 * Local constraint failure. Always raised before any remote call.
 */
export class ValidationError extends SpeakerTrackerError {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[]) {
    super(issues.length > 0 ? `${message}: ${formatIssues(issues)}` : message);
    this.issues = issues;
  }

  static fromZod(message: string, issues: readonly ZodIssue[]): ValidationError {
    return new ValidationError(
      message,
      issues.map((issue) => ({
        field: issue.path.length > 0 ? issue.path.join(".") : "(input)",
        message: issue.message,
      }))
    );
  }
}

function formatIssues(issues: readonly ValidationIssue[]): string {
  return issues.map((issue) => `${issue.field}: ${issue.message}`).join("; ");
}

/**
 * The remote service has no record with the requested id.
 */
export class NotFoundError extends SpeakerTrackerError {
  constructor(public readonly recordId: string, options?: { cause?: unknown }) {
    super(`Speaker not found: ${recordId}`, options);
  }
}

/**
 * A remote record cannot be mapped to a Speaker (no usable title).
 * Points at remote corruption or schema drift, not a caller mistake.
 */
export class DataIntegrityError extends SpeakerTrackerError {
  constructor(message: string, public readonly recordId: string) {
    super(message);
  }
}

/**
 * Transport, network or API failure. Never retried by the core.
 */
export class RemoteServiceError extends SpeakerTrackerError {
  /** Remote or client error code, e.g. "rate_limited" */
  public readonly code: string | undefined;
  /** HTTP status when the service answered */
  public readonly status: number | undefined;

  constructor(
    message: string,
    details: { code?: string; status?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.code = details.code;
    this.status = details.status;
  }
}
