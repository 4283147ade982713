/**
 * Raised for any malformed schedule specification. `token` is the piece of
 * input that could not be understood.
 */
export class ScheduleSpecError extends Error {
  public readonly token: string;

  constructor(message: string, token: string) {
    super(message);
    this.name = "ScheduleSpecError";
    this.token = token;
  }
}
