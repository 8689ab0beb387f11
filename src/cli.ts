/**
 * Command line argument parsing
 */

export interface CliOptions {
  csv?: string;
  db?: string;
  force: boolean;
  refreshAux: boolean;
  stats: boolean;
  help: boolean;
}

export const USAGE = `Usage: space-missions-loader [options]

Options:
  --csv <path-or-url>  Mission CSV (default: MISSIONS_CSV_PATH, then MISSIONS_CSV_URL)
  --db <path>          SQLite database path (default: DB_PATH)
  --force              Rebuild missions even if the database is populated
  --refresh-aux        Only refresh the NASA auxiliary datasets
  --stats              Print database statistics and exit
  --help               Show this message`;

/**
 * Value of a `--name value` or `--name=value` flag
 */
function readValue(args: string[], name: string): string | undefined {
  const inline = args.find((arg) => arg.startsWith(`${name}=`));
  if (inline) {
    return inline.slice(name.length + 1);
  }

  const index = args.indexOf(name);
  if (index === -1) {
    return undefined;
  }

  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`Missing value for ${name}`);
  }
  return value;
}

export function parseArgs(args: string[]): CliOptions {
  return {
    csv: readValue(args, '--csv'),
    db: readValue(args, '--db'),
    force: args.includes('--force'),
    refreshAux: args.includes('--refresh-aux'),
    stats: args.includes('--stats'),
    help: args.includes('--help') || args.includes('-h'),
  };
}
