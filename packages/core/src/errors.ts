/**
 * Raised for structurally invalid input: a missing, negative or non-finite
 * field, an out-of-range hour, or a malformed signal table. Always caller-triggered;
 * retrying with the same arguments fails the same way.
 */
export class InvalidInputError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [message],
  ) {
    super(message);
    this.name = 'InvalidInputError';
  }
}
