/**
 * Publish phase
 *
 * Runs as its own invocation (`--create-issue`), typically after CI has
 * committed the day's comic. Reads the saved record, hosts the image, and
 * opens a GitHub Issue with the strip and its dialogue.
 *
 * Image hosting:
 *   1. PNG → JPEG, uploaded as the asset of release `comic-<date>`. Release
 *      asset URLs render for anyone with repo access, private repos included.
 *   2. Otherwise raw.githubusercontent.com — public repos only.
 *
 * Nothing here is fatal: the PNG and JSON on disk are the real artifacts.
 */

import { execFileSync } from 'child_process'
import { existsSync, statSync } from 'fs'
import { isAbsolute, relative, sep } from 'path'
import sharp from 'sharp'
import { comicPaths, loadComicRecord } from './comic-store.js'
import type { ComicConfig } from './config.js'
import { DEFAULT_COMIC_DIR } from './config.js'
import { errorMessage } from './errors.js'
import type { PanelScript } from './types.js'

const GH_TIMEOUT_MS = 60_000

// ─── gh CLI ───────────────────────────────────────────────────────────────────

export interface GhCli {
  /** Runs `gh <args>` and returns stdout; throws when gh is missing or exits non-zero. */
  run(args: string[]): string
}

export const systemGh: GhCli = {
  run(args) {
    return execFileSync('gh', args, {
      encoding: 'utf-8',
      env: { ...process.env },
      timeout: GH_TIMEOUT_MS,
      stdio: ['ignore', 'pipe', 'pipe'],
    })
  },
}

function ghFailure(err: unknown): string {
  if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
    return 'gh CLI not found'
  }
  if (err && typeof err === 'object' && 'stderr' in err) {
    const stderr = String(err.stderr).trim()
    if (stderr) return stderr
  }
  return errorMessage(err)
}

// ─── Image hosting ────────────────────────────────────────────────────────────

export async function compressToJpeg(pngPath: string, jpegPath: string, quality: number): Promise<void> {
  await sharp(pngPath)
    .flatten({ background: '#ffffff' })
    .jpeg({ quality })
    .toFile(jpegPath)
  const mb = statSync(jpegPath).size / 1024 / 1024
  console.log(`  Compressed → ${jpegPath} (${mb.toFixed(1)}MB)`)
}

export function releaseTag(date: string): string {
  return `comic-${date}`
}

/** Returns the asset's download URL, or null when any gh step fails. */
export function uploadReleaseAsset(
  jpegPath: string,
  date: string,
  repo: string,
  gh: GhCli,
): string | null {
  const tag = releaseTag(date)

  try {
    gh.run([
      'release', 'create', tag, jpegPath,
      '--repo', repo,
      '--title', `Daily Comic ${date}`,
      '--notes', `Auto-generated comic strip for ${date}`,
    ])
  } catch (err) {
    console.warn(`  ⚠ Release creation failed: ${ghFailure(err)}`)
    return null
  }

  try {
    const url = gh
      .run(['release', 'view', tag, '--repo', repo, '--json', 'assets', '--jq', '.assets[0].url'])
      .trim()
    if (!url || url === 'null') {
      console.warn(`  ⚠ Release ${tag} has no asset URL`)
      return null
    }
    console.log(`  Release asset URL: ${url}`)
    return url
  } catch (err) {
    console.warn(`  ⚠ Release asset lookup failed: ${ghFailure(err)}`)
    return null
  }
}

/** Directory of the comics relative to the repo root, in URL form. */
export function repoRelativeDir(outputDir: string, cwd: string = process.cwd()): string {
  const rel = relative(cwd, outputDir)
  if (!rel || rel.startsWith('..') || isAbsolute(rel)) return DEFAULT_COMIC_DIR
  return rel.split(sep).join('/')
}

export function rawContentUrl(repo: string, date: string, dir: string = DEFAULT_COMIC_DIR): string {
  return `https://raw.githubusercontent.com/${repo}/main/${dir}/${date}.png`
}

async function resolveImageUrl(
  date: string,
  config: ComicConfig,
  repo: string,
  gh: GhCli,
): Promise<string> {
  const paths = comicPaths(config.outputDir, date)

  if (existsSync(paths.image)) {
    console.log('  Uploading comic image as release asset...')
    try {
      await compressToJpeg(paths.image, paths.jpeg, config.jpegQuality)
      const url = uploadReleaseAsset(paths.jpeg, date, repo, gh)
      if (url) return url
    } catch (err) {
      console.warn(`  ⚠ Compression failed: ${errorMessage(err)}`)
    }
  } else {
    console.warn(`  ⚠ ${paths.image} not found`)
  }

  // Renders only for public repositories
  console.log('  Falling back to raw.githubusercontent.com URL')
  return rawContentUrl(repo, date, repoRelativeDir(config.outputDir))
}

// ─── Issue ────────────────────────────────────────────────────────────────────

export function buildIssueTitle(date: string, commitCount: number): string {
  return `Daily Comic — ${date} — ${commitCount} commits`
}

export function buildIssueBody(
  date: string,
  imageUrl: string,
  panels: PanelScript[],
  commitCount: number,
): string {
  const lines = [`![Daily Comic — ${date}](${imageUrl})`, '', '---', '']

  panels.forEach((panel, i) => {
    lines.push(`### Panel ${i + 1}: ${panel.title}`)
    for (const bubble of panel.bubbles) {
      lines.push(`> **${bubble.speaker}**: ${bubble.text}`)
    }
    lines.push('')
  })

  lines.push('---', `*${commitCount} commits summarized into ${panels.length} panels.*`)
  return lines.join('\n')
}

// ─── Main export ──────────────────────────────────────────────────────────────

export type PublishOutcome =
  | { status: 'no-record' }
  | { status: 'skipped' }
  | { status: 'failed'; reason: string }
  | { status: 'created'; title: string; issueUrl: string }

export async function publishComic(
  date: string,
  config: ComicConfig,
  gh: GhCli = systemGh,
): Promise<PublishOutcome> {
  const record = loadComicRecord(config.outputDir, date)
  if (!record) {
    console.log(`  No comic record found for ${date}, skipping issue creation`)
    return { status: 'no-record' }
  }

  const repo = config.publishRepo
  if (!repo) {
    console.warn('  ⚠ GITHUB_REPOSITORY not set, skipping issue creation')
    return { status: 'skipped' }
  }

  const imageUrl = await resolveImageUrl(date, config, repo, gh)
  const title = buildIssueTitle(record.date, record.commits.length)
  const body = buildIssueBody(record.date, imageUrl, record.panels, record.commits.length)

  try {
    const out = gh.run(['issue', 'create', '--repo', repo, '--title', title, '--body', body])
    console.log(`  ✓ Created GitHub Issue: ${title}`)
    return { status: 'created', title, issueUrl: out.trim() }
  } catch (err) {
    const reason = ghFailure(err)
    console.warn(`  ⚠ Failed to create issue: ${reason}`)
    return { status: 'failed', reason }
  }
}
