/**
 * Error kinds surfaced by the bot.
 *
 * - ValidationError: user-supplied value rejected; the conversation re-prompts.
 * - CollaboratorError: Google Sheets or Telegram call failed; the message is the
 *   underlying cause's text so replies can interpolate it as-is.
 * - ConfigError: environment is missing or malformed at start-up.
 */

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class CollaboratorError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(describeError(cause), { cause });
    this.name = "CollaboratorError";
    this.operation = operation;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Message text of anything thrown.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}
