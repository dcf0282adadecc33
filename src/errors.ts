export class NetworkError extends Error {
  constructor(message: string, public url: string, public cause?: unknown) {
    super(message);
    this.name = "NetworkError";
  }
}

/**
 * Structural or semantic failure while reading the site's pages.
 * Fallback loops treat this kind as "try the next candidate".
 */
export class ScrapeError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "ScrapeError";
  }
}

export class PageNotFoundError extends ScrapeError {
  constructor(public url: string, cause?: unknown) {
    super(`Page '${url}' does not exist.`, cause);
    this.name = "PageNotFoundError";
  }
}

export class TableNotFoundError extends ScrapeError {
  constructor(public tableId: string) {
    super(`Table '${tableId}' was not found on the page.`);
    this.name = "TableNotFoundError";
  }
}

export class EmptyTableError extends ScrapeError {
  constructor(public tableId: string) {
    super(`Table '${tableId}' did not contain any rows.`);
    this.name = "EmptyTableError";
  }
}

export class SeasonNotFoundError extends ScrapeError {
  constructor(message: string, public tried: number[] = [], cause?: unknown) {
    super(message, cause);
    this.name = "SeasonNotFoundError";
  }
}

export class GameLogNotFoundError extends ScrapeError {
  constructor(
    public playerId: string,
    public seasons: number[],
    public lastError?: Error
  ) {
    super(
      `Game log table was not found for player '${playerId}' in seasons ` +
        `[${seasons.join(", ")}]` +
        (lastError ? `: ${lastError.message}` : ""),
      lastError
    );
    this.name = "GameLogNotFoundError";
  }
}

export class InvalidPlayerIdError extends ScrapeError {
  constructor(public playerId: string) {
    super(`Invalid player id '${playerId}'.`);
    this.name = "InvalidPlayerIdError";
  }
}

export class NoRowsError extends ScrapeError {
  constructor() {
    super("No rows to write.");
    this.name = "NoRowsError";
  }
}

export class InputFileError extends ScrapeError {
  constructor(public path: string, cause?: unknown) {
    super(`Input file not found: ${path}`, cause);
    this.name = "InputFileError";
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
