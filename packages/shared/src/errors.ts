/**
 * Errors thrown by backends when an upstream service answers badly.
 * Gateways classify these; backends never retry on their own.
 */

export class UpstreamHttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "UpstreamHttpError";
    this.status = status;
  }
}

// The upstream answered, but the answer can never become valid by asking again.
export class UpstreamRejectedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UpstreamRejectedError";
  }
}
