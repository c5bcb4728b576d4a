import sharp from 'sharp'
import type { ComicConfig } from '../config.js'
import type { CommitRecord, PanelScript } from '../types.js'

export const DATE = '2026-03-14'

export const commits: CommitRecord[] = [
  { shortHash: 'a1b2c3d', message: 'Fix login redirect loop', authorName: 'Ada' },
  { shortHash: 'b2c3d4e', message: 'Add search to the settings page', authorName: 'Lin' },
  { shortHash: 'c3d4e5f', message: 'Drop the legacy cache layer', authorName: 'Ada' },
  { shortHash: 'd4e5f6a', message: 'Bump eslint', authorName: 'Sam' },
  { shortHash: 'e5f6a7b', message: 'Rename utils to helpers', authorName: 'Lin' },
]

export const panels: PanelScript[] = [
  {
    title: 'Fix login redirect loop',
    scene: 'A dragon chases its own tail around the castle gate.',
    bubbles: [
      { speaker: 'Villager', text: 'We can finally go home!' },
      { speaker: 'Knight', text: 'It was one missing return.' },
    ],
  },
  {
    title: 'Add search to the settings page',
    scene: 'Villagers hold up a giant magnifying glass.',
    bubbles: [
      { speaker: 'Villager', text: 'I found my sock!' },
      { speaker: 'Knight', text: 'It is a text box.' },
    ],
  },
  {
    title: 'Drop the legacy cache layer',
    scene: 'The knight pushes an old storage tower into a lake.',
    bubbles: [
      { speaker: 'Villager', text: 'My grandmother built that tower!' },
      { speaker: 'Knight', text: 'Nobody used it.' },
    ],
  },
  {
    title: '5 commits. 1 bug. 1 feature.',
    scene: 'The knight naps while villagers carve his statue.',
    bubbles: [
      { speaker: 'Villager', text: 'We will name the baby git-rebase!' },
      { speaker: 'Knight', text: 'Please do not.' },
    ],
  },
]

export function testConfig(outputDir: string, overrides: Partial<ComicConfig> = {}): ComicConfig {
  return {
    geminiApiKey: 'test-key',
    scriptProvider: 'gemini',
    sourceRepo: 'acme/widgets',
    outputDir,
    geminiTextModel: 'text-model',
    geminiImageModel: 'image-model',
    anthropicModel: 'anthropic-model',
    requestTimeoutMs: 1_000,
    perPage: 100,
    panelAttempts: 3,
    retryDelayMs: 5_000,
    panelDelayMs: 2_000,
    panelGap: 20,
    jpegQuality: 85,
    ...overrides,
  }
}

export function solidPng(
  width: number,
  height: number,
  background = { r: 220, g: 40, b: 40 },
): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background } }).png().toBuffer()
}
