import { parseCliOptions } from './cli';
import { ScraperError } from './errors';
import { writeGamesToCsv } from './pipelines/csvStore';
import { TeamScraper } from './scraper/teamScraper';

async function main() {
  const options = parseCliOptions(process.argv.slice(2));
  const scraper = new TeamScraper(options.team);

  if (options.season !== undefined) {
    scraper.setSeason(options.season);
  } else if (options.start && options.end) {
    scraper.setDateRange(options.start, options.end);
  }

  const games = await scraper.scrape();
  console.error({ team: scraper.getTeam(), games: games.length }, 'Scrape finished');

  if (options.saveSource) {
    await scraper.saveSource(options.saveSource);
  }

  if (options.csv) {
    await writeGamesToCsv(options.csv, games);
    console.error({ path: options.csv }, 'CSV written');
    return;
  }

  process.stdout.write(`${JSON.stringify(games, null, 2)}\n`);
}

main().catch(error => {
  if (error instanceof ScraperError) {
    console.error(`${error.name}: ${error.message}`);
  } else {
    console.error(error);
  }
  process.exitCode = 1;
});
