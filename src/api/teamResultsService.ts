import { HttpPageFetcher, type PageFetcher } from '../crawler/fetcher';
import { InvalidRequestError } from '../errors';
import { TeamScraper, type TeamScraperOptions } from '../scraper/teamScraper';
import type { ResultSet } from '../types';

export interface TeamResultsQuery {
  team: string;
  season?: number;
  start?: string;
  end?: string;
}

/**
 * Keeps one scraper, and with it one season cache, per team code. A code is only remembered once a
 * scrape for it has succeeded; until then its scraper is shared by in-flight requests only.
 */
export class TeamResultsService {
  private readonly scrapers = new Map<string, TeamScraper>();
  private readonly unconfirmed = new Map<string, TeamScraper>();
  private readonly fetcher: PageFetcher;

  constructor(private readonly options: Omit<TeamScraperOptions, 'cache'> = {}) {
    this.fetcher = options.fetcher ?? new HttpPageFetcher();
  }

  get trackedTeams(): string[] {
    return [...this.scrapers.keys()];
  }

  async getResults(query: TeamResultsQuery): Promise<ResultSet> {
    const { key, scraper } = this.scraperFor(query.team);

    try {
      const games = await this.scrapeQuery(scraper, query);
      this.scrapers.set(key, scraper);
      return games;
    } finally {
      if (this.unconfirmed.get(key) === scraper) {
        this.unconfirmed.delete(key);
      }
    }
  }

  private scrapeQuery(scraper: TeamScraper, query: TeamResultsQuery): Promise<ResultSet> {
    if (query.season !== undefined) {
      return scraper.scrapeRange(`${query.season}-01-01`, `${query.season}-12-31`);
    }
    if (!query.start || !query.end) {
      throw new InvalidRequestError('Provide season, or both start and end');
    }
    return scraper.scrapeRange(query.start, query.end);
  }

  private scraperFor(team: string): { key: string; scraper: TeamScraper } {
    const key = team.trim().toUpperCase();
    if (!key) {
      throw new InvalidRequestError('Must specify a team');
    }

    const known = this.scrapers.get(key) ?? this.unconfirmed.get(key);
    if (known) return { key, scraper: known };

    const scraper = new TeamScraper(key, { fetcher: this.fetcher, now: this.options.now });
    this.unconfirmed.set(key, scraper);
    return { key, scraper };
  }
}
