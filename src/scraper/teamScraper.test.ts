import fs from 'fs';
import os from 'os';
import path from 'path';
import { DateTime } from 'luxon';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DataNotFoundError, InvalidRequestError } from '../errors';
import { TeamScraper } from './teamScraper';

const scheduleHtml = fs.readFileSync(new URL('./__fixtures__/schedule-2023.html', import.meta.url), 'utf8');
const now = () => DateTime.fromISO('2024-06-15T12:00:00Z');

function createScraper(team = 'TST', markup = scheduleHtml) {
  const fetch = vi.fn(async (_team: string, _season: number) => markup);
  const scraper = new TeamScraper(team, { fetcher: { fetch }, now });
  return { scraper, fetch };
}

describe('TeamScraper', () => {
  it('returns every game of the season as typed records', async () => {
    const { scraper } = createScraper();
    scraper.setSeason(2023);

    const games = await scraper.scrape();

    expect(games).toHaveLength(6);
    expect(games[0]).toEqual({
      status: 'completed',
      date: '2023-03-30',
      gameOfDay: null,
      team: 'TST',
      homeAway: 'Home',
      opponent: 'OPA',
      result: 'W',
      runs: 5,
      runsAllowed: 3,
      innings: 9,
      record: '1-0',
      rank: 1,
      gamesBack: 'Tied',
      winningPitcher: 'Adams',
      losingPitcher: 'Baker',
      savingPitcher: 'Clark',
      gameTime: '2:45',
      dayNight: 'D',
      attendance: 39662,
      leverageIndex: 1.05,
      streak: 1,
      originallyScheduled: null
    });
    expect(games.map(game => game.status)).toEqual([
      'completed', 'completed', 'completed', 'completed', 'scheduled', 'scheduled'
    ]);
  });

  it('applies blank-cell defaults to a doubleheader game', async () => {
    const { scraper } = createScraper();
    scraper.setSeason(2023);

    const [, , firstGame, secondGame] = await scraper.scrape();

    expect(firstGame).toMatchObject({
      date: '2023-04-03',
      gameOfDay: 1,
      team: 'TST',
      homeAway: 'Home',
      innings: 9,
      savingPitcher: 'None',
      gameTime: 'Unknown',
      dayNight: 'Unknown',
      attendance: null,
      streak: 2
    });
    expect(secondGame).toMatchObject({
      date: '2023-04-03',
      gameOfDay: 2,
      result: 'T',
      winningPitcher: 'None',
      losingPitcher: 'None',
      attendance: 12001,
      streak: null,
      originallyScheduled: 'Apr 4'
    });
  });

  it('returns only games within the inclusive date range', async () => {
    const { scraper } = createScraper();
    scraper.setDateRange('2023-04-01', '2023-04-03');

    const games = await scraper.scrape();

    expect(games.map(game => game.date)).toEqual(['2023-04-01', '2023-04-03', '2023-04-03']);
    for (const game of games) {
      expect(game.date >= '2023-04-01' && game.date <= '2023-04-03').toBe(true);
    }
  });

  it('accepts luxon dates for the range', async () => {
    const { scraper } = createScraper();
    scraper.setDateRange(DateTime.fromISO('2023-04-05'), DateTime.fromISO('2023-04-07'));

    const games = await scraper.scrape();

    expect(games.map(game => game.opponent)).toEqual(['OPD', 'OPE']);
  });

  it('upper-cases the team code before fetching', async () => {
    const { scraper, fetch } = createScraper('tst');
    scraper.setSeason(2023);

    await scraper.scrape();

    expect(scraper.getTeam()).toBe('TST');
    expect(fetch).toHaveBeenCalledWith('TST', 2023);
  });

  it('reuses the cached page when the same season is scraped again', async () => {
    const { scraper, fetch } = createScraper();
    scraper.setSeason(2023);
    await scraper.scrape();

    scraper.setDateRange('2023-04-01', '2023-04-30');
    await scraper.scrape();

    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('fetches a season once for concurrent scrapes', async () => {
    const fetch = vi.fn(
      (_team: string, _season: number) =>
        new Promise<string>(resolve => setTimeout(() => resolve(scheduleHtml), 10))
    );
    const scraper = new TeamScraper('TST', { fetcher: { fetch }, now });
    scraper.setSeason(2023);

    const [first, second] = await Promise.all([scraper.scrape(), scraper.scrapeRange('2023-04-01', '2023-04-01')]);

    expect(first).toHaveLength(6);
    expect(second.map(game => game.opponent)).toEqual(['OPB']);
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('fetches again after a failed fetch', async () => {
    const fetch = vi
      .fn<(team: string, season: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce(scheduleHtml);
    const scraper = new TeamScraper('TST', { fetcher: { fetch }, now });
    scraper.setSeason(2023);

    await expect(scraper.scrape()).rejects.toThrow('socket hang up');
    await expect(scraper.scrape()).resolves.toHaveLength(6);
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('fetches again after switching team', async () => {
    const { scraper, fetch } = createScraper();
    scraper.setSeason(2023);
    await scraper.scrape();

    scraper.setTeam('oth');
    await scraper.scrape();

    expect(fetch).toHaveBeenCalledTimes(2);
    expect(fetch).toHaveBeenLastCalledWith('OTH', 2023);
  });

  it('raises DataNotFoundError when the page has no results table', async () => {
    const { scraper } = createScraper('XYZ', '<html><body><h1>404 Not Found</h1></body></html>');
    scraper.setSeason(1890);

    await expect(scraper.scrape()).rejects.toBeInstanceOf(DataNotFoundError);
  });

  it('rejects ranges that span two seasons before fetching', () => {
    const { scraper, fetch } = createScraper();

    expect(() => scraper.setDateRange('2022-09-01', '2023-04-01')).toThrow(
      new InvalidRequestError('Start/end date must be from the same season')
    );
    expect(fetch).not.toHaveBeenCalled();
  });

  it('rejects a start date after the end date', () => {
    const { scraper } = createScraper();
    expect(() => scraper.setDateRange('2023-05-02', '2023-05-01')).toThrow(InvalidRequestError);
  });

  it('rejects seasons after the current year', () => {
    const { scraper } = createScraper();
    expect(() => scraper.setSeason(2025)).toThrow('Season cannot be past the current year');
  });

  it('rejects malformed dates', () => {
    const { scraper } = createScraper();
    expect(() => scraper.setDateRange('2023-13-01', '2023-12-31')).toThrow('Invalid start date: 2023-13-01');
  });

  it('requires a date range before scraping', async () => {
    const { scraper, fetch } = createScraper();

    await expect(scraper.scrape()).rejects.toThrow('Must specify start date');
    expect(fetch).not.toHaveBeenCalled();
  });

  it('requires a team', () => {
    const { scraper } = createScraper('  ');
    expect(() => scraper.setSeason(2023)).toThrow('Must specify a team');
  });

  it('scrapes an explicit range without changing the stored one', async () => {
    const { scraper } = createScraper();
    scraper.setSeason(2023);

    const games = await scraper.scrapeRange('2023-04-05', '2023-04-05');

    expect(games.map(game => game.opponent)).toEqual(['OPD']);
    expect(scraper.getRequest()).toEqual({ team: 'TST', startDate: '2023-01-01', endDate: '2023-12-31' });
  });

  it('uses markup provided through setSource instead of fetching', async () => {
    const { scraper, fetch } = createScraper();
    scraper.setSeason(2023);
    scraper.setSource(scheduleHtml);

    const games = await scraper.scrape();

    expect(games).toHaveLength(6);
    expect(fetch).not.toHaveBeenCalled();
  });

  describe('saveSource', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'team-scraper-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('writes the cached markup for the current season', async () => {
      const { scraper } = createScraper();
      scraper.setSeason(2023);
      await scraper.scrape();

      const target = path.join(tempDir, 'nested', 'TST-2023.html');
      await scraper.saveSource(target);

      expect(fs.readFileSync(target, 'utf8')).toBe(scheduleHtml);
    });

    it('fails when the season has not been fetched', async () => {
      const { scraper } = createScraper();
      scraper.setSeason(2023);

      await expect(scraper.saveSource(path.join(tempDir, 'out.html'))).rejects.toBeInstanceOf(
        InvalidRequestError
      );
    });
  });
});
