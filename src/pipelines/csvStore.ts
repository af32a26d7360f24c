import fs from 'fs';
import path from 'path';
import * as CsvWriter from 'csv-writer';
import type { GameRecord } from '../types';

type CsvRecord = {
  date: string;
  gameOfDay: string;
  status: string;
  team: string;
  homeAway: string;
  opponent: string;
  result: string;
  runs: string;
  runsAllowed: string;
  innings: string;
  record: string;
  rank: string;
  gamesBack: string;
  winningPitcher: string;
  losingPitcher: string;
  savingPitcher: string;
  gameTime: string;
  dayNight: string;
  attendance: string;
  leverageIndex: string;
  streak: string;
  originallyScheduled: string;
};

const CSV_HEADER: Array<{ id: keyof CsvRecord; title: string }> = [
  { id: 'date', title: 'Date' },
  { id: 'gameOfDay', title: 'GameOfDay' },
  { id: 'status', title: 'Status' },
  { id: 'team', title: 'Tm' },
  { id: 'homeAway', title: 'Home_Away' },
  { id: 'opponent', title: 'Opp' },
  { id: 'result', title: 'W/L' },
  { id: 'runs', title: 'R' },
  { id: 'runsAllowed', title: 'RA' },
  { id: 'innings', title: 'Inn' },
  { id: 'record', title: 'W-L' },
  { id: 'rank', title: 'Rank' },
  { id: 'gamesBack', title: 'GB' },
  { id: 'winningPitcher', title: 'Win' },
  { id: 'losingPitcher', title: 'Loss' },
  { id: 'savingPitcher', title: 'Save' },
  { id: 'gameTime', title: 'Time' },
  { id: 'dayNight', title: 'D/N' },
  { id: 'attendance', title: 'Attendance' },
  { id: 'leverageIndex', title: 'cLI' },
  { id: 'streak', title: 'Streak' },
  { id: 'originallyScheduled', title: 'Orig. Scheduled' }
];

function formatValue(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return '';
  return String(value);
}

export function mapGameToCsvRecord(game: GameRecord): CsvRecord {
  const common = {
    date: game.date,
    gameOfDay: formatValue(game.gameOfDay),
    status: game.status,
    team: game.team,
    homeAway: game.homeAway,
    opponent: game.opponent
  };

  if (game.status === 'scheduled') {
    return {
      ...common,
      result: '',
      runs: '',
      runsAllowed: '',
      innings: '',
      record: '',
      rank: '',
      gamesBack: '',
      winningPitcher: '',
      losingPitcher: '',
      savingPitcher: '',
      gameTime: '',
      dayNight: '',
      attendance: '',
      leverageIndex: '',
      streak: '',
      originallyScheduled: ''
    };
  }

  return {
    ...common,
    result: formatValue(game.result),
    runs: formatValue(game.runs),
    runsAllowed: formatValue(game.runsAllowed),
    innings: formatValue(game.innings),
    record: formatValue(game.record),
    rank: formatValue(game.rank),
    gamesBack: formatValue(game.gamesBack),
    winningPitcher: formatValue(game.winningPitcher),
    losingPitcher: formatValue(game.losingPitcher),
    savingPitcher: formatValue(game.savingPitcher),
    gameTime: formatValue(game.gameTime),
    dayNight: formatValue(game.dayNight),
    attendance: formatValue(game.attendance),
    leverageIndex: formatValue(game.leverageIndex),
    streak: formatValue(game.streak),
    originallyScheduled: formatValue(game.originallyScheduled)
  };
}

/** Writes the records to `outputPath`, replacing any existing file. */
export async function writeGamesToCsv(outputPath: string, games: readonly GameRecord[]): Promise<void> {
  const outputDir = path.dirname(outputPath);
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }

  const csvWriter = CsvWriter.createObjectCsvWriter({
    path: outputPath,
    header: CSV_HEADER
  });

  await csvWriter.writeRecords(games.map(mapGameToCsvRecord));
}
