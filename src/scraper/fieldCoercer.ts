import { DateTime } from 'luxon';
import type {
  CalendarDate,
  CompletedGameRecord,
  GameRecord,
  ParsedRow,
  ParsedTable,
  ScheduledGameRecord
} from '../types';
import { HOME_AWAY_LABEL } from './tableParser';

export const COLUMN_LABEL = {
  date: 'Date',
  team: 'Tm',
  homeAway: HOME_AWAY_LABEL,
  opponent: 'Opp',
  result: 'W/L',
  runs: 'R',
  runsAllowed: 'RA',
  innings: 'Inn',
  record: 'W-L',
  rank: 'Rank',
  gamesBack: 'GB',
  winningPitcher: 'Win',
  losingPitcher: 'Loss',
  savingPitcher: 'Save',
  gameTime: 'Time',
  dayNight: 'D/N',
  attendance: 'Attendance',
  leverageIndex: 'cLI',
  streak: 'Streak',
  originallyScheduled: 'Orig. Scheduled'
} as const;

const UNKNOWN_SENTINEL = 'Unknown';
const SOURCE_DATE_FORMAT = 'LLL d yyyy';

/** `+++` is a three-game winning run, `--` a two-game losing run. */
export function parseStreak(text: string): number | null {
  const run = text.trim();
  if (!run) return null;
  return run.startsWith('-') ? -run.length : run.length;
}

export function parseNumeric(text: string): number | null {
  const trimmed = text.trim();
  if (!trimmed) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

export function parseAttendance(text: string): number | null {
  const withoutSeparators = text.replace(/,/g, '').trim();
  if (withoutSeparators === UNKNOWN_SENTINEL) return null;
  return parseNumeric(withoutSeparators);
}

export interface GameDate {
  date: CalendarDate;
  gameOfDay: number | null;
}

/**
 * Parses `Weekday, Mon Day` cells, optionally followed by a doubleheader marker such as `(2)`.
 * The page omits the year, so the season is applied. The weekday is ignored.
 */
export function parseGameDate(text: string, season: number): GameDate | null {
  let value = text.trim();
  let gameOfDay: number | null = null;

  const markerIndex = value.indexOf(' (');
  if (markerIndex >= 0) {
    const marker = value.slice(markerIndex).match(/\((\d+)\)/);
    gameOfDay = marker ? Number(marker[1]) : null;
    value = value.slice(0, markerIndex);
  }

  const monthAndDay = value.replace(/^[A-Za-z]+,\s*/, '');
  const parsed = DateTime.fromFormat(`${monthAndDay} ${season}`, SOURCE_DATE_FORMAT, {
    locale: 'en-US',
    zone: 'utc'
  });
  const date = parsed.isValid ? parsed.toISODate() : null;
  if (!date) return null;

  return { date, gameOfDay };
}

function textOrNull(values: Map<string, string>, label: string): string | null {
  const text = values.get(label);
  return text ? text : null;
}

function textOrEmpty(values: Map<string, string>, label: string): string {
  return values.get(label) ?? '';
}

/** Builds one immutable record from a labelled row, or `null` when the date cell is unreadable. */
export function buildGameRecord(row: ParsedRow, season: number): GameRecord | null {
  const { values } = row;
  const gameDate = parseGameDate(textOrEmpty(values, COLUMN_LABEL.date), season);
  if (!gameDate) return null;

  const common = {
    date: gameDate.date,
    gameOfDay: gameDate.gameOfDay,
    team: textOrEmpty(values, COLUMN_LABEL.team),
    homeAway: textOrEmpty(values, COLUMN_LABEL.homeAway),
    opponent: textOrEmpty(values, COLUMN_LABEL.opponent)
  };

  if (row.status === 'scheduled') {
    const scheduled: ScheduledGameRecord = { status: 'scheduled', ...common };
    return Object.freeze(scheduled);
  }

  const numeric = (label: string) => parseNumeric(textOrEmpty(values, label));

  const completed: CompletedGameRecord = {
    status: 'completed',
    ...common,
    result: textOrNull(values, COLUMN_LABEL.result),
    runs: numeric(COLUMN_LABEL.runs),
    runsAllowed: numeric(COLUMN_LABEL.runsAllowed),
    innings: numeric(COLUMN_LABEL.innings),
    record: textOrNull(values, COLUMN_LABEL.record),
    rank: numeric(COLUMN_LABEL.rank),
    gamesBack: textOrNull(values, COLUMN_LABEL.gamesBack),
    winningPitcher: textOrNull(values, COLUMN_LABEL.winningPitcher),
    losingPitcher: textOrNull(values, COLUMN_LABEL.losingPitcher),
    savingPitcher: textOrNull(values, COLUMN_LABEL.savingPitcher),
    gameTime: textOrNull(values, COLUMN_LABEL.gameTime),
    dayNight: textOrNull(values, COLUMN_LABEL.dayNight),
    attendance: parseAttendance(textOrEmpty(values, COLUMN_LABEL.attendance)),
    leverageIndex: numeric(COLUMN_LABEL.leverageIndex),
    streak: parseStreak(textOrEmpty(values, COLUMN_LABEL.streak)),
    originallyScheduled: textOrNull(values, COLUMN_LABEL.originallyScheduled)
  };
  return Object.freeze(completed);
}

export function coerceTable(table: ParsedTable, season: number): GameRecord[] {
  const records: GameRecord[] = [];
  for (const row of table.rows) {
    const record = buildGameRecord(row, season);
    if (!record) {
      console.warn({ date: row.values.get(COLUMN_LABEL.date), season }, 'Skipping row with unreadable date');
      continue;
    }
    records.push(record);
  }
  return records;
}
