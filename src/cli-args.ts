export interface CliOptions {
  pages?: number;
  outputFile?: string;
  model?: string;
  listingUrl?: string;
  interactive: boolean;
  verbose: boolean;
  help: boolean;
}

export const USAGE = `Usage: strain-advisor [options]

  --url <template>     Listing URL, {page} is replaced with the page number
  --pages <n>          Number of listing pages to scrape
  --output <file>      Report file (overwritten each run)
  --model <name>       Ollama model to use
  --no-interactive     Skip the recommendation prompt
  -v, --verbose        Print a run summary
  -h, --help           Show this help`;

function valueAfter(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

/** Parse CLI flags (argv without the node and script entries) */
export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = { interactive: true, verbose: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--pages': {
        const raw = valueAfter(args, i++, arg);
        const pages = Number(raw);
        if (!Number.isInteger(pages) || pages < 1) {
          throw new Error(`--pages must be a positive integer, got "${raw}"`);
        }
        options.pages = pages;
        break;
      }
      case '--output':
        options.outputFile = valueAfter(args, i++, arg);
        break;
      case '--model':
        options.model = valueAfter(args, i++, arg);
        break;
      case '--url':
        options.listingUrl = valueAfter(args, i++, arg);
        break;
      case '--no-interactive':
        options.interactive = false;
        break;
      case '-v':
      case '--verbose':
        options.verbose = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return options;
}
