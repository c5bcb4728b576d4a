import { Command, InvalidArgumentError } from 'commander'
import { isIsoDate, yesterdayUTC } from './dates.js'
import { ComicError } from './errors.js'

export interface CliOptions {
  date: string
  createIssue: boolean
  dryRun: boolean
  open: boolean
}

function parseDate(value: string): string {
  const date = value.trim()
  if (!isIsoDate(date)) {
    throw new InvalidArgumentError('Expected a date in YYYY-MM-DD format.')
  }
  return date
}

export function buildProgram(): Command {
  return new Command()
    .name('daily-comic')
    .description("Draw a 4-panel comic strip of a repository's commits for one day")
    .argument('[date]', 'day to draw, YYYY-MM-DD (default: yesterday, UTC)', parseDate)
    .option('--create-issue', 'publish the saved comic for <date> as a GitHub Issue and exit', false)
    .option('--dry-run', 'fetch commits and write the script only; no images, no files', false)
    .option('--no-open', 'do not open the finished strip in a viewer')
}

export function parseCliArgs(argv: string[], now: Date = new Date()): CliOptions {
  const program = buildProgram()
  program.parse(argv)

  const opts = program.opts<{ createIssue: boolean; dryRun: boolean; open: boolean }>()
  const date: unknown = program.processedArgs[0]
  return {
    date: typeof date === 'string' ? date : yesterdayUTC(now),
    createIssue: opts.createIssue,
    dryRun: opts.dryRun,
    open: opts.open,
  }
}

export function exitCodeFor(err: unknown): number {
  return err instanceof ComicError ? err.exitCode : 1
}
