import { z } from 'zod'

// ─── Commits ──────────────────────────────────────────────────────────────────

export const commitRecordSchema = z.object({
  shortHash: z.string().min(1),
  message: z.string(),
  authorName: z.string(),
})

export type CommitRecord = z.infer<typeof commitRecordSchema>

// ─── Script ───────────────────────────────────────────────────────────────────

export const speechBubbleSchema = z.object({
  speaker: z.string(),
  text: z.string(),
})

export const panelScriptSchema = z.object({
  title: z.string(),
  scene: z.string(),
  bubbles: z.array(speechBubbleSchema),
})

export const PANEL_COUNT = 4

export const comicScriptSchema = z.array(panelScriptSchema).length(PANEL_COUNT)

export type SpeechBubble = z.infer<typeof speechBubbleSchema>
export type PanelScript = z.infer<typeof panelScriptSchema>

// ─── Persisted record ─────────────────────────────────────────────────────────

export const comicRecordSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  commits: z.array(commitRecordSchema),
  panels: comicScriptSchema,
})

export type ComicRecord = z.infer<typeof comicRecordSchema>

// ─── Panel images ─────────────────────────────────────────────────────────────

export interface PanelImage {
  index: number   // 0-based position in the script
  path: string    // inside the run's temp dir — invalid once the run ends
}

export interface ImageSize {
  width: number
  height: number
}
