// --- Error taxonomy ---
// Every error a client can cause carries the HTTP status it maps to and a
// human-readable detail. The request loop turns these into `{ detail }` bodies.

export class HttpError extends Error {
  readonly status: number;
  readonly detail: string;

  constructor(status: number, detail: string) {
    super(detail);
    this.name = 'HttpError';
    this.status = status;
    this.detail = detail;
  }
}

/** Unknown activity name. */
export class ActivityNotFoundError extends HttpError {
  readonly activityName: string;

  constructor(activityName: string) {
    super(404, 'Activity not found');
    this.name = 'ActivityNotFoundError';
    this.activityName = activityName;
  }
}

/** Duplicate signup, or unregister of an email that is not on the roster. */
export class RegistrationStateError extends HttpError {
  readonly reason: 'already_signed_up' | 'not_signed_up';

  constructor(reason: RegistrationStateError['reason']) {
    super(
      400,
      reason === 'already_signed_up'
        ? 'Student is already signed up'
        : 'Student is not signed up for this activity',
    );
    this.name = 'RegistrationStateError';
    this.reason = reason;
  }
}

/** Malformed or incomplete request input. */
export class RequestError extends HttpError {
  constructor(status: number, detail: string) {
    super(status, detail);
    this.name = 'RequestError';
  }
}

/** Catalog definition could not be read or failed validation at load time. */
export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogError';
  }
}
