/** Raised when the telemetry API answers with a non-2xx status. */
export class UpstreamHttpError extends Error {
  readonly status: number;
  readonly bodyExcerpt: string;

  constructor(status: number, body: string) {
    const bodyExcerpt = body.length > 200 ? `${body.slice(0, 200)}…` : body;
    super(`telemetry API responded ${status}${bodyExcerpt ? `: ${bodyExcerpt}` : ''}`);
    this.name = 'UpstreamHttpError';
    this.status = status;
    this.bodyExcerpt = bodyExcerpt;
  }
}
