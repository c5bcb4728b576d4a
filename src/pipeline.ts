/**
 * Comic pipeline
 *
 *   1. Fetch    — the day's non-merge commits
 *   2. Script   — one text-model call → exactly 4 panels
 *   3. Panels   — one image-model call per panel, bounded retry, failures dropped
 *   4. Stitch   — common height, 20 px white gap → <date>.png, then <date>.json
 *
 * Strictly sequential. Panel images live in a per-run temp dir that is removed
 * whether or not the run succeeds. Nothing durable is written until at least
 * MIN_PANELS images exist.
 */

import { mkdtempSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { comicPaths, ensureOutputDir, saveComicRecord } from './comic-store.js'
import type { ComicConfig } from './config.js'
import { InsufficientPanelsError } from './errors.js'
import { MIN_PANELS, generateAllPanels } from './generate-panels.js'
import { generateScript } from './generate-script.js'
import type { ImageModel, ScriptModel } from './models.js'
import type { FileOpener } from './open-file.js'
import type { Sleep } from './retry.js'
import { stitchPanels } from './stitch.js'
import type { StripLayout } from './stitch.js'
import type { ComicRecord, CommitRecord, PanelScript } from './types.js'

export interface ComicDeps {
  loadCommits(repo: string, date: string): Promise<CommitRecord[]>
  scriptModel: ScriptModel
  imageModel: ImageModel
  sleep: Sleep
  opener: FileOpener
}

export interface RunOptions {
  dryRun?: boolean
  open?: boolean
}

export type ComicOutcome =
  | { status: 'no-commits' }
  | { status: 'dry-run'; commits: CommitRecord[]; panels: PanelScript[] }
  | {
      status: 'created'
      record: ComicRecord
      imagePath: string
      recordPath: string
      layout: StripLayout
      panelsDrawn: number
    }

async function drawStrip(
  panels: PanelScript[],
  outPath: string,
  config: ComicConfig,
  deps: ComicDeps,
): Promise<{ layout: StripLayout; panelsDrawn: number }> {
  const tmp = mkdtempSync(join(tmpdir(), 'daily-comic-'))
  try {
    console.log('3/4  Generating panel images...')
    const images = await generateAllPanels(panels, tmp, deps.imageModel, config, deps.sleep)
    if (images.length < MIN_PANELS) {
      throw new InsufficientPanelsError(images.length, MIN_PANELS)
    }
    console.log()

    console.log('4/4  Stitching panels...')
    ensureOutputDir(config.outputDir)
    const layout = await stitchPanels(
      images.map((img) => img.path),
      outPath,
      config.panelGap,
    )
    console.log()
    return { layout, panelsDrawn: images.length }
  } finally {
    rmSync(tmp, { recursive: true, force: true })
  }
}

export async function runComic(
  date: string,
  config: ComicConfig,
  deps: ComicDeps,
  options: RunOptions = {},
): Promise<ComicOutcome> {
  // ── 1. Fetch ───────────────────────────────────────────────────────────────
  console.log(`1/4  Fetching commits from ${config.sourceRepo}...`)
  const commits = await deps.loadCommits(config.sourceRepo, date)
  console.log(`     Found ${commits.length} commits`)

  if (commits.length === 0) {
    console.log('     No commits that day. No comic today.')
    return { status: 'no-commits' }
  }
  for (const c of commits) {
    console.log(`     ${c.shortHash} ${c.message}`)
  }
  console.log()

  // ── 2. Script ──────────────────────────────────────────────────────────────
  console.log('2/4  Generating comic script...')
  const panels = await generateScript(commits, deps.scriptModel)
  panels.forEach((p, i) => console.log(`     Panel ${i + 1}: ${p.title}`))
  console.log()

  if (options.dryRun) {
    return { status: 'dry-run', commits, panels }
  }

  // ── 3 + 4. Panels and stitch ───────────────────────────────────────────────
  const paths = comicPaths(config.outputDir, date)
  const { layout, panelsDrawn } = await drawStrip(panels, paths.image, config, deps)

  const record: ComicRecord = { date, commits, panels }
  const recordPath = saveComicRecord(config.outputDir, record)
  console.log(`     Written: ${recordPath}`)

  if (options.open !== false) {
    deps.opener.open(paths.image)
  }

  return { status: 'created', record, imagePath: paths.image, recordPath, layout, panelsDrawn }
}
