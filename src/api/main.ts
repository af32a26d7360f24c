import { SCRAPER_CONFIG } from '../config';
import { createApp } from './server';

const app = createApp();

app.listen(SCRAPER_CONFIG.port, () => {
  console.log(`Team results API listening on http://localhost:${SCRAPER_CONFIG.port}`);
  console.log(`Try: http://localhost:${SCRAPER_CONFIG.port}/teams/NYY/results?season=2023`);
});
