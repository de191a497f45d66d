/** Base class for everything the notice parser rejects. */
export class OutageParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class DateFormatError extends OutageParseError {
  constructor(readonly dateInfo: string, reason?: string) {
    super(
      reason
        ? `Could not parse date information: ${dateInfo} (${reason})`
        : `Could not parse date information: ${dateInfo}`
    );
  }
}

export class UnknownMonthError extends OutageParseError {
  constructor(readonly monthName: string) {
    super(`Unknown month name: ${monthName}`);
  }
}

export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly statusText: string,
    readonly url: string
  ) {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ""} for ${url}`);
    this.name = "HttpStatusError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
