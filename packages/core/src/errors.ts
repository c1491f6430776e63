import { z } from "zod";

export class WeekreportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type ConfigErrorCode =
  | "InvalidDate"
  | "InvalidWeekday"
  | "InvalidTimezone"
  | "InvalidOption"
  | "MissingUser";

export class ConfigError extends WeekreportError {
  constructor(
    readonly code: ConfigErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class TransportError extends WeekreportError {
  readonly status: number | undefined;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}

export class MalformedEventError extends WeekreportError {
  readonly eventId: string | undefined;

  constructor(message: string, eventId?: string) {
    super(message);
    this.eventId = eventId;
  }
}

export class RunCancelledError extends WeekreportError {
  constructor(message = "Interrupted before the report was complete.") {
    super(message);
  }
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new RunCancelledError();
  }
}

export function formatError(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues
      .map((issue) => {
        const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
        return `${where}: ${issue.message}`;
      })
      .join("\n");
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
