import { parseArgs } from 'node:util';

const USAGE = `Usage: team-results --team <code> (--season <year> | --start <yyyy-MM-dd> --end <yyyy-MM-dd>)
       [--csv <path>] [--save-source <path>]`;

export interface CliOptions {
  team: string;
  season?: number;
  start?: string;
  end?: string;
  csv?: string;
  saveSource?: string;
}

export function parseCliOptions(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      team: { type: 'string', short: 't' },
      season: { type: 'string', short: 's' },
      start: { type: 'string' },
      end: { type: 'string' },
      csv: { type: 'string' },
      'save-source': { type: 'string' }
    },
    strict: true
  });

  if (!values.team) {
    throw new Error(`Missing --team\n${USAGE}`);
  }

  let season: number | undefined;
  if (values.season !== undefined) {
    season = Number(values.season);
    if (!Number.isInteger(season)) {
      throw new Error(`Invalid --season: ${values.season}`);
    }
  } else if (!values.start || !values.end) {
    throw new Error(`Provide --season or both --start and --end\n${USAGE}`);
  }

  return {
    team: values.team,
    season,
    start: values.start,
    end: values.end,
    csv: values.csv,
    saveSource: values['save-source']
  };
}
