/** ISO calendar date, `yyyy-MM-dd`. */
export type CalendarDate = string;

export interface ScrapeRequest {
  team: string;
  startDate: CalendarDate;
  endDate: CalendarDate;
}

/** One table row after upfront classification by cell count. */
export type ClassifiedRow =
  | { kind: 'completed'; cells: string[] }
  | { kind: 'scheduled'; cells: string[] }
  | { kind: 'empty' };

export type GameStatus = 'completed' | 'scheduled';

export interface ParsedRow {
  status: GameStatus;
  /** Cell text keyed by column label, in table order. */
  values: Map<string, string>;
}

export interface ParsedTable {
  columns: string[];
  rows: ParsedRow[];
}

interface GameRecordBase {
  date: CalendarDate;
  /** Doubleheader disambiguator taken from the date cell, e.g. `(2)`. */
  gameOfDay: number | null;
  team: string;
  homeAway: string;
  opponent: string;
}

export interface ScheduledGameRecord extends GameRecordBase {
  status: 'scheduled';
}

export interface CompletedGameRecord extends GameRecordBase {
  status: 'completed';
  result: string | null;
  runs: number | null;
  runsAllowed: number | null;
  innings: number | null;
  record: string | null;
  rank: number | null;
  gamesBack: string | null;
  winningPitcher: string | null;
  losingPitcher: string | null;
  savingPitcher: string | null;
  gameTime: string | null;
  dayNight: string | null;
  attendance: number | null;
  leverageIndex: number | null;
  streak: number | null;
  originallyScheduled: string | null;
}

export type GameRecord = CompletedGameRecord | ScheduledGameRecord;

export type ResultSet = readonly Readonly<GameRecord>[];
