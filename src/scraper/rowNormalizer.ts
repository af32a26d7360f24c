import type { ClassifiedRow } from '../types';

/** Cell positions of the schedule table's data row, counted after the game-number header cell. */
export const CELL_POSITION = {
  date: 0,
  boxscore: 1,
  team: 2,
  homeAway: 3,
  opponent: 4,
  innings: 8,
  winningPitcher: 12,
  losingPitcher: 13,
  savingPitcher: 14,
  gameTime: 15,
  dayNight: 16
} as const;

/** Cells kept from a game that has not been played yet: date, box score link, team, home/away, opponent. */
export const SCHEDULED_CELL_COUNT = 5;

type BlankDefault = { position: number; value: (team: string) => string };

const BLANK_DEFAULTS: BlankDefault[] = [
  // older seasons leave the team abbreviation out
  { position: CELL_POSITION.team, value: team => team },
  // only away games carry a marker
  { position: CELL_POSITION.homeAway, value: () => 'Home' },
  { position: CELL_POSITION.innings, value: () => '9' },
  // ties have no decision
  { position: CELL_POSITION.winningPitcher, value: () => 'None' },
  { position: CELL_POSITION.losingPitcher, value: () => 'None' },
  { position: CELL_POSITION.savingPitcher, value: () => 'None' },
  { position: CELL_POSITION.gameTime, value: () => 'Unknown' },
  { position: CELL_POSITION.dayNight, value: () => 'Unknown' }
];

export const COMPLETED_MIN_CELL_COUNT =
  Math.max(...BLANK_DEFAULTS.map(entry => entry.position)) + 1;

export function normalizeCellText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function applyBlankDefaults(cells: string[], team: string): string[] {
  const filled = [...cells];
  for (const { position, value } of BLANK_DEFAULTS) {
    if (position < filled.length && filled[position] === '') {
      filled[position] = value(team);
    }
  }
  return filled;
}

/**
 * Classifies a row by its cell count and fills the blank cells whose meaning is predictable.
 *
 * Rows too short to be a finished game keep only their scheduling cells; rows with at most
 * one cell (mid-table header repeats, stubs) come back as `empty`.
 */
export function normalizeRow(cellTexts: string[], team: string): ClassifiedRow {
  if (cellTexts.length <= 1) return { kind: 'empty' };

  const cells = applyBlankDefaults(cellTexts.map(normalizeCellText), team);

  if (cells.length < COMPLETED_MIN_CELL_COUNT) {
    return { kind: 'scheduled', cells: cells.slice(0, SCHEDULED_CELL_COUNT) };
  }

  return { kind: 'completed', cells };
}
