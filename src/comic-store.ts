import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs'
import { join } from 'path'
import { MalformedScriptError, errorMessage } from './errors.js'
import { comicRecordSchema } from './types.js'
import type { ComicRecord } from './types.js'

export interface ComicPaths {
  image: string
  record: string
  jpeg: string
}

export function comicPaths(outputDir: string, date: string): ComicPaths {
  return {
    image: join(outputDir, `${date}.png`),
    record: join(outputDir, `${date}.json`),
    jpeg: join(outputDir, `${date}.jpg`),
  }
}

export function ensureOutputDir(outputDir: string): void {
  if (!existsSync(outputDir)) {
    mkdirSync(outputDir, { recursive: true })
  }
}

/** Overwrites any record already saved for the same date. */
export function saveComicRecord(outputDir: string, record: ComicRecord): string {
  ensureOutputDir(outputDir)
  const path = comicPaths(outputDir, record.date).record
  writeFileSync(path, JSON.stringify(record, null, 2) + '\n', 'utf-8')
  return path
}

export function loadComicRecord(outputDir: string, date: string): ComicRecord | null {
  const path = comicPaths(outputDir, date).record
  if (!existsSync(path)) return null

  let data: unknown
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'))
  } catch (err) {
    throw new MalformedScriptError(`${path} is not valid JSON: ${errorMessage(err)}`)
  }

  const parsed = comicRecordSchema.safeParse(data)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new MalformedScriptError(
      `${path} is not a comic record (${issue?.path.join('.') ?? '?'}: ${issue?.message ?? 'invalid'})`,
    )
  }
  return parsed.data
}
