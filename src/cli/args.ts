/**
 * CLI Argument Parsing
 *
 * Parses command-line arguments for a conversion run or the tool server.
 */

/**
 * Options from the command line. Unset values fall back to the environment
 * and then to the configuration defaults.
 */
export interface CliArgs {
  /** Source document */
  input?: string;

  /** Destination; its extension selects the output format */
  output?: string;

  /** Wrap width for text output (`--width` or third positional) */
  width?: number;

  /** Stylesheets given with `--css`, in order */
  css: string[];

  /** Escape all text in HTML output */
  strict: boolean;

  logLevel?: string;

  /** Start the tool server on stdio instead of converting */
  serve: boolean;

  help: boolean;
}

/** Known CLI argument base names for validation */
const KNOWN_ARG_NAMES = new Set(['css', 'width', 'strict', 'log-level', 'serve', 'help']);

export const USAGE = `Usage: tei-convert <input.xml> <output.(txt|html|htm|xhtml|epub)> [width]

Options:
  --css <file>         Apply a stylesheet (repeatable; default: *.css beside the input)
  --width <n>          Wrap width for text output (default: 72)
  --strict             Escape all text in HTML output
  --log-level <level>  debug, info, notice, warning, error, critical, alert, emergency
  --serve              Start the tool server on stdio
  --help               Show this message`;

/**
 * Check if an argument is a known CLI flag (handles --arg and --arg=value forms).
 */
function isKnownArg(arg: string): boolean {
  if (!arg.startsWith('--')) return true;
  const baseName = arg.slice(2).split('=')[0] ?? '';
  return KNOWN_ARG_NAMES.has(baseName);
}

/**
 * NaN for anything that is not a whole number, so validation rejects it.
 */
function parseWidth(value: string): number {
  return /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
}

/**
 * Parse command-line arguments into CliArgs.
 *
 * @param argv - Command line arguments (process.argv.slice(2))
 */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    css: [],
    strict: false,
    serve: false,
    help: false,
  };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    const next = argv[i + 1];

    if (arg === '--strict') {
      args.strict = true;
    } else if (arg === '--serve') {
      args.serve = true;
    } else if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--css' && next) {
      args.css.push(next);
      i++;
    } else if (arg.startsWith('--css=')) {
      args.css.push(arg.slice('--css='.length));
    } else if (arg === '--width' && next) {
      args.width = parseWidth(next);
      i++;
    } else if (arg.startsWith('--width=')) {
      args.width = parseWidth(arg.slice('--width='.length));
    } else if (arg === '--log-level' && next) {
      args.logLevel = next;
      i++;
    } else if (arg.startsWith('--log-level=')) {
      args.logLevel = arg.slice('--log-level='.length);
    } else if (!isKnownArg(arg)) {
      // Catch typos like --stict
      console.warn(`Warning: Unknown argument "${arg}" - ignored`);
    } else if (!arg.startsWith('-')) {
      positional.push(arg);
    }
  }

  const [input, output, width] = positional;
  args.input = input;
  args.output = output;
  if (width !== undefined && args.width === undefined) {
    args.width = parseWidth(width);
  }

  return args;
}
