import { writeFileSync } from 'fs'
import { basename, join } from 'path'
import type { ComicConfig } from './config.js'
import { errorMessage } from './errors.js'
import type { ImageModel, ImagePart } from './models.js'
import { sleep as realSleep, withRetry } from './retry.js'
import type { Sleep } from './retry.js'
import type { PanelImage, PanelScript } from './types.js'

export const MIN_PANELS = 2

const IMAGE_STYLE_PREFIX =
  'Cartoon style, warm tones (coral, gold, cream), bold outlines, ' +
  'simple and clear, medieval fantasy village setting. '

type PanelTiming = Pick<ComicConfig, 'panelAttempts' | 'retryDelayMs' | 'panelDelayMs'>

// ─── Prompt ───────────────────────────────────────────────────────────────────

export function buildPanelPrompt(panel: PanelScript): string {
  const bubbles = panel.bubbles.map((b) => `${b.speaker}: "${b.text}"`).join(' ')
  return (
    IMAGE_STYLE_PREFIX +
    `TOP TITLE BAR (black bar with white bold text): '${panel.title}'. ` +
    `${panel.scene} ` +
    `Speech bubbles: ${bubbles}`
  )
}

// ─── Response handling ────────────────────────────────────────────────────────

/** Raw bytes pass through; text payloads are base64. */
export function decodeImagePayload(data: Uint8Array | string): Buffer {
  return typeof data === 'string' ? Buffer.from(data, 'base64') : Buffer.from(data)
}

export function firstImage(parts: ImagePart[]): Buffer | null {
  for (const part of parts) {
    if (part.kind === 'image') {
      const bytes = decodeImagePayload(part.data)
      if (bytes.length > 0) return bytes
    }
  }
  return null
}

// ─── Generation ───────────────────────────────────────────────────────────────

/**
 * Draws one panel into `outPath`. Returns false once every attempt has thrown
 * or come back without an image.
 */
export async function generatePanelImage(
  panel: PanelScript,
  outPath: string,
  model: ImageModel,
  timing: PanelTiming,
  sleep: Sleep = realSleep,
): Promise<boolean> {
  const prompt = buildPanelPrompt(panel)
  console.log(`  Generating: ${panel.title.slice(0, 60)}...`)

  const outcome = await withRetry(
    async () => firstImage(await model.generate(prompt)),
    {
      attempts: timing.panelAttempts,
      delayMs: timing.retryDelayMs,
      sleep,
      onFailure: (attempt, err) => {
        if (err === null) {
          console.warn(`  ⚠ No image in response (attempt ${attempt})`)
        } else {
          console.warn(`  ⚠ Error (attempt ${attempt}): ${errorMessage(err)}`)
        }
      },
    },
  )

  if (!outcome.ok) return false

  writeFileSync(outPath, outcome.value)
  console.log(`  ✓ Saved ${basename(outPath)}`)
  return true
}

/**
 * Panels are drawn one at a time with a pause in between. Failed panels are
 * dropped; the survivors keep their script order.
 */
export async function generateAllPanels(
  panels: PanelScript[],
  dir: string,
  model: ImageModel,
  timing: PanelTiming,
  sleep: Sleep = realSleep,
): Promise<PanelImage[]> {
  const images: PanelImage[] = []

  for (const [i, panel] of panels.entries()) {
    const path = join(dir, `panel_${i + 1}.png`)
    const ok = await generatePanelImage(panel, path, model, timing, sleep)
    if (ok) {
      images.push({ index: i, path })
    } else {
      console.warn(`  ⚠ Failed to generate panel ${i + 1}, skipping`)
    }
    if (i < panels.length - 1) await sleep(timing.panelDelayMs)
  }

  return images
}
