/**
 * Errors reported to the user without a stack trace.
 */
export class CliError extends Error {
  /** Follow-up shown under the message, e.g. a command to run */
  readonly hint?: string;

  constructor(message: string, hint?: string) {
    super(message);
    this.name = 'CliError';
    this.hint = hint;
  }
}
