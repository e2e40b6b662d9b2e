/**
 * Error Taxonomy
 *
 * Every failure raised by the sampler, the policies, the oracle and the
 * simulation runner is one of these classes.
 *
 * Fatal:
 * - InvalidArmError, UnknownArmError, PolicyConfigError, ConfigError
 *
 * Recoverable (handled by the simulation runner):
 * - ExhaustedError (reset the arm and draw again, once)
 * - QuantificationError, OracleRequestError (fall back to the record rating)
 *
 * Propagated:
 * - ClassificationError (there is no safe fallback label)
 */

export class ReviewBanditError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Arm configuration is empty, duplicated, or a record has no arm. */
export class InvalidArmError extends ReviewBanditError {}

export class UnknownArmError extends ReviewBanditError {
  readonly arm: string;

  constructor(arm: string) {
    super(`Arm "${arm}" is not configured.`);
    this.arm = arm;
  }
}

export class ExhaustedError extends ReviewBanditError {
  readonly arm: string;

  constructor(arm: string, message = `All reviews for arm "${arm}" have been dispensed.`) {
    super(message);
    this.arm = arm;
  }
}

export class ClassificationError extends ReviewBanditError {
  readonly response: string;

  constructor(response: string) {
    super(`Invalid classification returned: "${response}"`);
    this.response = response;
  }
}

export class QuantificationError extends ReviewBanditError {
  readonly response: string;

  constructor(response: string, reason: string) {
    super(`Failed to parse valid score from oracle response "${response}": ${reason}`);
    this.response = response;
  }
}

export class OracleRequestError extends ReviewBanditError {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.status = options.status;
  }
}

export class PolicyConfigError extends ReviewBanditError {}

export class ConfigError extends ReviewBanditError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
