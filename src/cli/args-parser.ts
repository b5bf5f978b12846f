import { Command, InvalidArgumentError } from 'commander'

/**
 * Parsed command-line arguments
 */
export interface CliArgs {
  /** Path to the configuration file */
  config: string

  /** Configuration overrides in dot notation (e.g., validation.missingThreshold=0.1) */
  override: string[]

  /** Verbosity level for logging */
  verbose: number

  /** Symbols replacing collection.symbols */
  symbols?: string[]

  /** ISO-8601 start replacing collection.start */
  start?: string

  /** ISO-8601 end replacing collection.end */
  end?: string
}

/**
 * Default CLI arguments
 */
export const DEFAULT_ARGS = {
  config: 'config/ingestion.json',
  verbose: 0
} satisfies Partial<CliArgs>

function parseSymbols(value: string): string[] {
  const symbols = value.split(',').map(symbol => symbol.trim()).filter(symbol => symbol.length > 0)
  if (symbols.length === 0) {
    throw new InvalidArgumentError('expected a comma-separated list of symbols')
  }
  return symbols
}

function parseIsoDate(value: string): string {
  if (Number.isNaN(Date.parse(value))) {
    throw new InvalidArgumentError(`not a valid date: ${value}`)
  }
  return new Date(value).toISOString()
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

function increaseVerbosity(_: string, previous: number): number {
  return previous + 1
}

/**
 * Builds the commander program
 * Parse errors throw a CommanderError instead of exiting the process
 */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('ohlcv-ingest')
    .description('Fetch, validate and store OHLCV bars as date-partitioned files')
    .version('1.0.0')
    .usage('[options]')
    .exitOverride()

  program
    .option(
      '-c, --config <file>',
      'path to ingestion configuration file',
      DEFAULT_ARGS.config
    )
    .option(
      '-o, --override <override>',
      'configuration override in dot notation, repeatable (e.g., api.retries=5)',
      collect,
      []
    )
    .option(
      '-v, --verbose',
      'increase verbosity (can be used multiple times: -v, -vv)',
      increaseVerbosity,
      DEFAULT_ARGS.verbose
    )
    .option('-s, --symbols <list>', 'comma-separated symbols, replaces collection.symbols', parseSymbols)
    .option('--start <date>', 'start of the window (ISO-8601), replaces collection.start', parseIsoDate)
    .option('--end <date>', 'end of the window (ISO-8601), replaces collection.end', parseIsoDate)

  program.addHelpText('after', `

Examples:
  $ ohlcv-ingest                                      # Use config/ingestion.json
  $ ohlcv-ingest -c my-ingestion.json                 # Use custom config file
  $ ohlcv-ingest -s BTC/USDT,ETH/USDT --start 2024-01-01
  $ ohlcv-ingest -o storage.format=csv -o api.retries=5
  $ ohlcv-ingest -vv                                  # Debug logging
`)

  return program
}

/**
 * Parse command-line arguments using commander
 * @param argv Full process argv (node binary and script first)
 */
export function parseArgs(argv: string[]): CliArgs {
  const program = createProgram()
  program.parse(argv)

  const options = program.opts<{
    config: string
    override: string[]
    verbose: number
    symbols?: string[]
    start?: string
    end?: string
  }>()

  return {
    config: options.config,
    override: options.override,
    verbose: options.verbose,
    symbols: options.symbols,
    start: options.start,
    end: options.end
  }
}

/**
 * Turns the window and symbol flags into configuration overrides
 */
export function argsToOverrides(args: CliArgs): string[] {
  const overrides = [...args.override]
  if (args.symbols) {
    overrides.push(`collection.symbols=${JSON.stringify(args.symbols)}`)
  }
  if (args.start) {
    overrides.push(`collection.start=${args.start}`)
  }
  if (args.end) {
    overrides.push(`collection.end=${args.end}`)
  }
  return overrides
}
