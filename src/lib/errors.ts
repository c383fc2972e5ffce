export class AppError extends Error {
  readonly error_code: string;
  readonly status: number;

  constructor(error_code: string, message: string, status: number) {
    super(message);
    this.name = new.target.name;
    this.error_code = error_code;
    this.status = status;
  }
}

export class BadRequest extends AppError {
  constructor(message: string) {
    super("BAD_REQUEST", message, 400);
  }
}

export class NotFound extends AppError {
  constructor(message: string) {
    super("NOT_FOUND", message, 404);
  }
}

export class Conflict extends AppError {
  constructor(message: string, error_code = "CONFLICT") {
    super(error_code, message, 409);
  }
}

export class IntakeFailed extends AppError {
  constructor(message: string) {
    super("INTAKE_FAILED", message, 400);
  }
}

export class MalformedFinding extends AppError {
  constructor(message: string) {
    super("MALFORMED_FINDING", message, 422);
  }
}

export class ScanFailed extends AppError {
  constructor(message: string) {
    super("SCAN_FAILED", message, 500);
  }
}

export class InvalidStateTransition extends AppError {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string, detail?: string) {
    super("INVALID_STATE_TRANSITION", detail ?? `cannot move vulnerability from ${from} to ${to}`, 409);
    this.from = from;
    this.to = to;
  }
}

export class ReconciliationConflict extends AppError {
  constructor(message: string) {
    super("RECONCILIATION_CONFLICT", message, 409);
  }
}

export class NotificationDeliveryFailed extends AppError {
  constructor(message: string) {
    super("NOTIFICATION_DELIVERY_FAILED", message, 502);
  }
}

export class AiUnavailable extends AppError {
  constructor(message: string) {
    super("AI_UNAVAILABLE", message, 503);
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

export function isSqliteBusy(e: unknown): boolean {
  if (!(e instanceof Error)) return false;
  const code = "code" in e ? e.code : undefined;
  return code === "SQLITE_BUSY" || code === "SQLITE_BUSY_SNAPSHOT" || code === "SQLITE_LOCKED";
}
