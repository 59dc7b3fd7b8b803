/**
 * Errors raised by the generation core. Each carries the HTTP status the
 * control panel answers with; the message is what the user sees.
 */
export class PanelError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/** The generation server did not answer the reachability probe. */
export class ConnectivityError extends PanelError {
  constructor(message = "Start the SD server in API mode first") {
    super(message, 503);
  }
}

/** The server is up but lacks the refinement (ADetailer) extension. */
export class CapabilityError extends PanelError {
  constructor(message = "ADetailer not found on the SD server") {
    super(message, 502);
  }
}

export class SdHttpError extends PanelError {
  readonly upstreamStatus: number;

  constructor(upstreamStatus: number, body = "") {
    super(`API Error: ${upstreamStatus}${body ? ` ${body.slice(0, 200)}` : ""}`, 502);
    this.upstreamStatus = upstreamStatus;
  }
}

export class ModelNotFoundError extends PanelError {
  readonly keyword: string;

  constructor(keyword: string) {
    super(
      `Model '${keyword}' not found. Download it and place it in the models/Stable-diffusion folder.`,
      424
    );
    this.keyword = keyword;
  }
}

export class BatchAlreadyRunningError extends PanelError {
  constructor() {
    super("A batch is already running", 409);
  }
}

export class InvalidRequestError extends PanelError {
  constructor(message: string) {
    super(message, 400);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
