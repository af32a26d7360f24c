import fs from 'fs';
import path from 'path';
import { DateTime } from 'luxon';
import { HttpPageFetcher, type PageFetcher } from '../crawler/fetcher';
import { InvalidRequestError } from '../errors';
import type { CalendarDate, ResultSet, ScrapeRequest } from '../types';
import { coerceTable } from './fieldCoercer';
import { filterByDateRange } from './rangeFilter';
import { SeasonCache } from './seasonCache';
import { parseScheduleTable } from './tableParser';

export type DateInput = DateTime | CalendarDate;

export interface TeamScraperOptions {
  fetcher?: PageFetcher;
  cache?: SeasonCache;
  /** Clock used to reject seasons that have not started yet. */
  now?: () => DateTime;
}

function toCalendarDate(input: DateInput | null | undefined, label: string): CalendarDate {
  if (input === null || input === undefined || input === '') {
    throw new InvalidRequestError(`Must specify ${label} date`);
  }
  const parsed = typeof input === 'string' ? DateTime.fromISO(input, { zone: 'utc' }) : input;
  const date = parsed.isValid ? parsed.toISODate() : null;
  if (!date) {
    throw new InvalidRequestError(`Invalid ${label} date: ${String(input)}`);
  }
  return date;
}

export function seasonOf(date: CalendarDate): number {
  return Number(date.slice(0, 4));
}

/** Pulls one team's results for a date range within a single season. */
export class TeamScraper {
  private team: string;
  private startDate?: CalendarDate;
  private endDate?: CalendarDate;
  private readonly fetcher: PageFetcher;
  private readonly cache: SeasonCache;
  private readonly now: () => DateTime;

  constructor(team: string, options: TeamScraperOptions = {}) {
    this.team = TeamScraper.normalizeTeam(team);
    this.fetcher = options.fetcher ?? new HttpPageFetcher();
    this.cache = options.cache ?? new SeasonCache();
    this.now = options.now ?? (() => DateTime.now());
  }

  private static normalizeTeam(team: string): string {
    return team.trim().toUpperCase();
  }

  getTeam(): string {
    return this.team;
  }

  /** Cached pages are keyed by season only, so switching team drops them. */
  setTeam(team: string): void {
    const normalized = TeamScraper.normalizeTeam(team);
    if (normalized !== this.team) {
      this.cache.clear();
    }
    this.team = normalized;
  }

  setSeason(season: number): void {
    this.setDateRange(`${season}-01-01`, `${season}-12-31`);
  }

  setDateRange(start: DateInput, end: DateInput): void {
    const request = this.validate(start, end);
    this.startDate = request.startDate;
    this.endDate = request.endDate;
  }

  getRequest(): ScrapeRequest {
    return this.validate(this.startDate, this.endDate);
  }

  async scrape(): Promise<ResultSet> {
    return this.run(this.getRequest());
  }

  /** Scrapes an explicit range without touching the range stored on the scraper. */
  async scrapeRange(start: DateInput, end: DateInput): Promise<ResultSet> {
    return this.run(this.validate(start, end));
  }

  /** Seeds the cache for the current season with markup obtained elsewhere. */
  setSource(markup: string): void {
    const { startDate } = this.getRequest();
    this.cache.set(seasonOf(startDate), markup);
  }

  async saveSource(filePath: string): Promise<void> {
    const season = seasonOf(this.getRequest().startDate);
    const markup = this.cache.get(season);
    if (markup === undefined) {
      throw new InvalidRequestError(`No source cached for the ${season} season; scrape it first`);
    }
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, markup, 'utf8');
  }

  private validate(
    start: DateInput | null | undefined,
    end: DateInput | null | undefined
  ): ScrapeRequest {
    if (!this.team) {
      throw new InvalidRequestError('Must specify a team');
    }
    const startDate = toCalendarDate(start, 'start');
    const endDate = toCalendarDate(end, 'end');

    if (seasonOf(startDate) !== seasonOf(endDate)) {
      throw new InvalidRequestError('Start/end date must be from the same season');
    }
    if (startDate > endDate) {
      throw new InvalidRequestError('Start date must be before end date');
    }
    if (seasonOf(endDate) > this.now().year) {
      throw new InvalidRequestError('Season cannot be past the current year');
    }

    return { team: this.team, startDate, endDate };
  }

  private loadSeason(team: string, season: number): Promise<string> {
    return this.cache.load(season, () => this.fetcher.fetch(team, season));
  }

  private async run(request: ScrapeRequest): Promise<ResultSet> {
    const season = seasonOf(request.startDate);
    const markup = await this.loadSeason(request.team, season);
    const table = parseScheduleTable(markup, { team: request.team, season });
    const records = coerceTable(table, season);
    return filterByDateRange(records, request.startDate, request.endDate);
  }
}
