/**
 * Error types raised by the trip planner.
 *
 * Callers only need to catch `TripPlannerError`; the subclasses let them tell
 * a misconfigured deployment apart from bad user input.
 */
export class TripPlannerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TripPlannerError";
  }
}

/** Missing or invalid settings, raised while the planner is being created. */
export class ConfigurationError extends TripPlannerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** Rejected user input. Always raised before any network activity. */
export class InputValidationError extends TripPlannerError {
  constructor(message: string) {
    super(message);
    this.name = "InputValidationError";
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
