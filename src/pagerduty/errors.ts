/**
 * Failures reported by the remote service. Both map to exit code 1 at the
 * command boundary.
 */

export class PagerDutyApiError extends Error {
  readonly status: number;
  readonly method: string;
  readonly path: string;

  constructor(status: number, method: string, path: string, detail?: string) {
    super(`PagerDuty API ${method} ${path}: ${status}${detail ? ` ${detail}` : ""}`);
    this.name = "PagerDutyApiError";
    this.status = status;
    this.method = method;
    this.path = path;
  }
}

/** HTTP 401/403: the API key is wrong, expired or lacks the scope. */
export class UnauthorizedError extends PagerDutyApiError {
  constructor(status: number, method: string, path: string, detail?: string) {
    super(status, method, path, detail);
    this.name = "UnauthorizedError";
    this.message = `Unauthorized (${status}): check the apikey in your configuration${detail ? `. ${detail}` : ""}`;
  }
}
