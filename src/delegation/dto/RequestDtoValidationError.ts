/**
 * RequestDtoValidationError
 *
 * Thrown when an incoming message or workflow payload does not match the expected DTO contract.
 */
export class RequestDtoValidationError extends Error {
  public readonly issues: string[];

  public constructor(message: string, issues: string[]) {
    super(message);
    this.name = 'RequestDtoValidationError';
    this.issues = issues;
  }
}
