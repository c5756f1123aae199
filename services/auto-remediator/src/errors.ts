export class RemediatorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The inbound payload has no usable resource id or alarm state. */
export class MalformedEventError extends RemediatorError {}

/** Maintenance metadata could not be read for the resource. */
export class LookupError extends RemediatorError {
  constructor(
    readonly resourceId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The remediation command could not be sent. */
export class DispatchError extends RemediatorError {
  constructor(
    readonly resourceId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class NotifyError extends RemediatorError {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
