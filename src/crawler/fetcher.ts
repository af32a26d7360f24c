import got from 'got';
import robotsParser from 'robots-parser';
import { CookieJar } from 'tough-cookie';
import { SCRAPER_CONFIG, type ScraperConfig } from '../config';
import { DataNotFoundError, PageFetchError } from '../errors';

/** Source of raw schedule markup for one team and season. */
export interface PageFetcher {
  fetch(team: string, season: number): Promise<string>;
}

type RobotsTxt = ReturnType<typeof robotsParser>;

export function buildScheduleUrl(team: string, season: number, baseUrl = SCRAPER_CONFIG.baseUrl): string {
  return `${baseUrl}/teams/${encodeURIComponent(team)}/${season}-schedule-scores.shtml`;
}

/** Returns the body of a usable response, otherwise throws the error the scrape should fail with. */
export function acceptResponse(
  response: { statusCode: number; body: string },
  target: { url: string; team: string; season: number }
): string {
  if (response.statusCode === 404) {
    throw new DataNotFoundError(target.team, target.season);
  }
  if (response.statusCode >= 400) {
    throw new PageFetchError(target.url, `Schedule request failed with status ${response.statusCode}`);
  }
  if (!response.body) {
    throw new PageFetchError(target.url, 'Schedule request returned an empty body');
  }
  return response.body;
}

export class HttpPageFetcher implements PageFetcher {
  private readonly cookieJar = new CookieJar();
  private readonly robotsTxtParsers = new Map<string, RobotsTxt>();

  constructor(private readonly config: ScraperConfig = SCRAPER_CONFIG) {}

  async fetch(team: string, season: number): Promise<string> {
    const url = buildScheduleUrl(team, season, this.config.baseUrl);

    if (this.config.respectRobots) {
      const robotsTxt = await this.loadRobotsTxt(new URL(url).origin);
      if (robotsTxt.isAllowed(url, this.config.userAgentHeader) === false) {
        throw new PageFetchError(url, 'Blocked by robots.txt');
      }
    }

    console.log({ url }, 'GET');

    let response: { statusCode: number; body: string };
    try {
      response = await got<string>(url, {
        headers: {
          'user-agent': this.config.userAgentHeader,
          accept: this.config.acceptHeader,
          'accept-language': this.config.languageHeader
        },
        cookieJar: this.cookieJar,
        timeout: { request: this.config.requestTimeoutMs },
        decompress: true,
        throwHttpErrors: false,
        followRedirect: true
      });
    } catch (error) {
      throw new PageFetchError(url, `Schedule request failed: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error
      });
    }

    console.log({ url, status: response.statusCode, bytes: response.body.length }, 'RESP');
    return acceptResponse(response, { url, team, season });
  }

  private async loadRobotsTxt(origin: string): Promise<RobotsTxt> {
    const cached = this.robotsTxtParsers.get(origin);
    if (cached) return cached;

    const robotsUrl = `${origin}/robots.txt`;
    let body = '';
    try {
      const response = await got(robotsUrl, { timeout: { request: 5000 }, throwHttpErrors: false });
      body = response.statusCode >= 400 ? '' : response.body;
    } catch (error) {
      console.log({ robotsUrl, err: error instanceof Error ? error.message : error }, 'robots.txt unavailable, allowing all');
    }

    const robotsTxt = robotsParser(robotsUrl, body);
    this.robotsTxtParsers.set(origin, robotsTxt);
    return robotsTxt;
  }
}
