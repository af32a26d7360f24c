import express from 'express';
import cors from 'cors';
import { performance } from 'node:perf_hooks';
import { DataNotFoundError, InvalidRequestError, PageFetchError } from '../errors';
import { TeamResultsService } from './teamResultsService';

function readQueryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

function statusForError(error: unknown): number {
  if (error instanceof InvalidRequestError) return 400;
  if (error instanceof DataNotFoundError) return 404;
  if (error instanceof PageFetchError) return 502;
  return 500;
}

export function createApp(service = new TeamResultsService()) {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy', teams: service.trackedTeams });
  });

  app.get('/teams/:team/results', async (req, res) => {
    const start = performance.now();
    const { team } = req.params;
    const seasonParam = readQueryString(req.query.season);

    let season: number | undefined;
    if (seasonParam !== undefined) {
      season = Number(seasonParam);
      if (!Number.isInteger(season)) {
        return res.status(400).json({ error: `Invalid season: ${seasonParam}` });
      }
    }

    try {
      const games = await service.getResults({
        team,
        season,
        start: readQueryString(req.query.start),
        end: readQueryString(req.query.end)
      });

      res.json({
        team: team.toUpperCase(),
        total: games.length,
        processingTime: Number((performance.now() - start).toFixed(2)),
        games
      });
    } catch (error) {
      const status = statusForError(error);
      if (status === 500) {
        console.error({ team, error }, 'Failed to scrape team results');
        return res.status(500).json({ error: 'Internal server error' });
      }
      const message = error instanceof Error ? error.message : String(error);
      res.status(status).json({ error: message });
    }
  });

  return app;
}
