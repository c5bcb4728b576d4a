#!/usr/bin/env node
/**
 * daily-comic
 *
 * Generate mode (default):
 *   1. Fetch   — one UTC day of commits from TARGET_REPO
 *   2. Script  — a text model writes 4 panels (JSON)
 *   3. Panels  — Gemini draws each panel
 *   4. Stitch  — comic-strips/<date>.png + comic-strips/<date>.json
 *
 * Publish mode (--create-issue): reads comic-strips/<date>.json and opens a
 * GitHub Issue in GITHUB_REPOSITORY with the strip and its dialogue.
 *
 * Env vars:
 *   GEMINI_API_KEY       required for generate mode
 *   SCRIPT_PROVIDER      "gemini" (default) or "anthropic"
 *   ANTHROPIC_API_KEY    required when SCRIPT_PROVIDER=anthropic
 *   TARGET_REPO          owner/name, default: "octocat/Hello-World"
 *   GITHUB_TOKEN         optional; raises the GitHub API rate limit
 *   GITHUB_REPOSITORY    publish target (set automatically in GitHub Actions)
 *   COMIC_DIR            output directory, default: ./comic-strips
 *   REQUEST_TIMEOUT_MS   per-call timeout, default: 120000
 */

import { exitCodeFor, parseCliArgs } from './cli.js'
import { loadConfig, requireApiKeys } from './config.js'
import { fetchCommits } from './fetch-commits.js'
import { createImageModel, createScriptModel } from './models.js'
import { createSystemOpener } from './open-file.js'
import { runComic } from './pipeline.js'
import { publishComic } from './publish.js'
import { sleep } from './retry.js'

async function main(): Promise<void> {
  const cli = parseCliArgs(process.argv)
  const config = loadConfig()

  // ── Publish mode ───────────────────────────────────────────────────────────
  if (cli.createIssue) {
    console.log(`\n📰 daily-comic — publishing ${cli.date}`)
    const outcome = await publishComic(cli.date, config)
    console.log(`\n✓ Done (${outcome.status}).`)
    return
  }

  // ── Generate mode ──────────────────────────────────────────────────────────
  console.log(`\n🎨 daily-comic — ${cli.date}`)
  console.log(`   Mode: ${cli.dryRun ? 'dry run' : 'live'}`)

  const keys = requireApiKeys(config)
  if (!config.githubToken) {
    console.warn('⚠  GITHUB_TOKEN not set — unauthenticated GitHub rate limits apply')
  }
  console.log()

  const outcome = await runComic(
    cli.date,
    config,
    {
      loadCommits: (repo, date) => fetchCommits(repo, date, config),
      scriptModel: createScriptModel(config, keys),
      imageModel: createImageModel(config, keys),
      sleep,
      opener: createSystemOpener(),
    },
    { dryRun: cli.dryRun, open: cli.open },
  )

  switch (outcome.status) {
    case 'no-commits':
      console.log('\n✓ Done (no activity).')
      break
    case 'dry-run':
      console.log('─'.repeat(72))
      console.log(JSON.stringify(outcome.panels, null, 2))
      console.log('─'.repeat(72))
      console.log('\n✓ Dry run complete — no files written.')
      break
    case 'created':
      console.log(
        `\n✓ Done! ${outcome.panelsDrawn}-panel comic saved to ${outcome.imagePath} ` +
          `(${outcome.layout.width}×${outcome.layout.height})`,
      )
      break
  }
}

main().catch((err: unknown) => {
  console.error('\n❌ Fatal:', err instanceof Error ? err.message : err)
  process.exit(exitCodeFor(err))
})
