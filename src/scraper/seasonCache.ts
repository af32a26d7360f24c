/**
 * Raw schedule markup by season year. One instance belongs to one scraper and lives as long as it;
 * nothing is ever evicted.
 */
export class SeasonCache {
  private readonly pages = new Map<number, string>();
  private readonly inFlight = new Map<number, Promise<string>>();

  get(season: number): string | undefined {
    return this.pages.get(season);
  }

  set(season: number, markup: string): void {
    this.pages.set(season, markup);
  }

  /**
   * Returns the cached markup, or fetches it once for all concurrent callers.
   * A rejected fetch is not kept.
   */
  load(season: number, fetchPage: () => Promise<string>): Promise<string> {
    const cached = this.pages.get(season);
    if (cached !== undefined) return Promise.resolve(cached);

    const pending = this.inFlight.get(season);
    if (pending) return pending;

    const request = fetchPage().then(
      markup => {
        // a clear() while fetching means the page belongs to a previous team
        if (this.inFlight.get(season) === request) {
          this.inFlight.delete(season);
          this.pages.set(season, markup);
        }
        return markup;
      },
      (error: unknown) => {
        if (this.inFlight.get(season) === request) {
          this.inFlight.delete(season);
        }
        throw error;
      }
    );
    this.inFlight.set(season, request);
    return request;
  }

  clear(): void {
    this.pages.clear();
    this.inFlight.clear();
  }
}
