export class ScraperError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Raised before any network access when the team or date range is unusable. */
export class InvalidRequestError extends ScraperError {}

/** The fetched page has no results table: unknown team code, or the team did not exist that season. */
export class DataNotFoundError extends ScraperError {
  constructor(readonly team: string, readonly season: number) {
    super(
      `Data cannot be retrieved for ${team} in ${season}. ` +
        'Verify that the team abbreviation is accurate and that the team existed during that season.'
    );
  }
}

export class PageFetchError extends ScraperError {
  constructor(readonly url: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}
