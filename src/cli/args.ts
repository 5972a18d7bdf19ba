import { ConfigError } from '../errors';

export interface CliArgs {
  /** Deck or collection URL; prompted for when absent */
  url?: string;
  /** Cards per deck, or decks per collection */
  limit?: number;
  /** Output .apkg path; prompted for when absent */
  out?: string;
  /** Extract in the browser one card at a time instead of over HTTP */
  slow: boolean;
  help: boolean;
}

export const USAGE = `Usage: cards-deck-exporter [url] [options]

Arguments:
  url              Deck (/details/{id}?bag_id={id}) or collection (/collection/{id}) URL

Options:
  --limit <n>      Maximum cards per deck, or decks per collection
  --out <path>     Where to write the .apkg
  --slow           Extract cards in the browser instead of over HTTP
  -h, --help       Show this help
`;

/**
 * Parse command-line arguments (without the node and script entries).
 *
 * @throws ConfigError on an unknown flag or a bad value
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const result: CliArgs = { slow: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--limit': {
        const raw = argv[++i];
        const limit = Number(raw);
        if (raw === undefined || !Number.isInteger(limit) || limit <= 0) {
          throw new ConfigError(`--limit needs a positive integer, got ${raw ?? 'nothing'}`);
        }
        result.limit = limit;
        break;
      }
      case '--out': {
        const out = argv[++i];
        if (!out) {
          throw new ConfigError('--out needs a path');
        }
        result.out = out;
        break;
      }
      case '--slow':
        result.slow = true;
        break;
      case '-h':
      case '--help':
        result.help = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new ConfigError(`Unknown option: ${arg}`);
        }
        if (result.url !== undefined) {
          throw new ConfigError(`Unexpected argument: ${arg}`);
        }
        result.url = arg;
    }
  }
  return result;
}
