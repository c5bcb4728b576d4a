/**
 * Fatal errors raised by the comic pipeline. Anything that is recoverable
 * (a flaky panel, a failed upload) is logged where it happens instead.
 */

export class ComicError extends Error {
  readonly exitCode: number

  constructor(message: string, exitCode = 1) {
    super(message)
    this.name = new.target.name
    this.exitCode = exitCode
  }
}

/** Required configuration is missing or invalid. */
export class ConfigError extends ComicError {}

/** The source-control API answered with a non-success status or an unexpected body. */
export class CommitFetchError extends ComicError {
  readonly status: number | null

  constructor(message: string, status: number | null = null) {
    super(message)
    this.status = status
  }
}

/** The text model returned something that is not a 4-panel JSON script. */
export class MalformedScriptError extends ComicError {}

export class InsufficientPanelsError extends ComicError {
  readonly generated: number

  constructor(generated: number, required: number) {
    super(`Only ${generated} panel(s) generated, need at least ${required}`)
    this.generated = generated
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
