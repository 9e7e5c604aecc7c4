/**
 * Error taxonomy for the dispatch scheduler.
 *
 * Per-recipient failures (render, permanent, transient) are values recorded on
 * the recipient, not exceptions. The classes below cover the cases that stop a
 * whole cycle or signal a programming error.
 */

/** Template could not be rendered for one recipient. Never reaches the provider. */
export class RenderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RenderError";
  }
}

/** The user has no usable sending configuration. The unit pauses until it is fixed. */
export class ConfigurationMissingError extends Error {
  constructor(
    readonly userId: string,
    readonly reason: string
  ) {
    super(`Sending configuration for user ${userId} is not usable: ${reason}`);
    this.name = "ConfigurationMissingError";
  }
}

export class TemplateNotFoundError extends Error {
  constructor(readonly templateName: string) {
    super(`Template not found: ${templateName}`);
    this.name = "TemplateNotFoundError";
  }
}

/** A write tried to move a recipient along an edge the state machine does not have. */
export class InvalidTransitionError extends Error {
  constructor(
    readonly from: string,
    readonly to: string
  ) {
    super(`Invalid delivery state transition: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

/** Optimistic writes to a quota row kept losing to concurrent writers. */
export class QuotaContentionError extends Error {
  constructor(
    readonly sendConfigId: string,
    readonly attempts: number
  ) {
    super(`Quota row ${sendConfigId} still contended after ${attempts} attempts`);
    this.name = "QuotaContentionError";
  }
}

/**
 * Errors that pause a dispatch unit instead of backing it off as a storage failure.
 */
export function isOperatorError(
  error: unknown
): error is ConfigurationMissingError | TemplateNotFoundError {
  return error instanceof ConfigurationMissingError || error instanceof TemplateNotFoundError;
}
