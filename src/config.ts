import 'dotenv/config';

const DEFAULT_BASE_URL = 'https://www.baseball-reference.com';

function parsePositiveNumber(input: string | undefined, fallback: number): number {
  if (!input) return fallback;
  const value = Number(input.trim());
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

function stripTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, '');
}

export const SCRAPER_CONFIG = {
  baseUrl: stripTrailingSlashes(process.env.SCRAPER_BASE_URL?.trim() || DEFAULT_BASE_URL),
  requestTimeoutMs: parsePositiveNumber(process.env.REQUEST_TIMEOUT_MS, 15000),
  respectRobots: (process.env.RESPECT_ROBOTS ?? 'true').toLowerCase() === 'true',
  userAgentHeader: process.env.SCRAPER_USER_AGENT ?? 'TeamResultsScraper/0.1',
  acceptHeader: 'text/html,application/xhtml+xml',
  languageHeader: 'en-US,en;q=0.9',
  port: parsePositiveNumber(process.env.PORT, 3001)
};

export type ScraperConfig = typeof SCRAPER_CONFIG;
