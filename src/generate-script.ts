import type { ScriptModel } from './models.js'
import { MalformedScriptError, errorMessage } from './errors.js'
import { PANEL_COUNT, comicScriptSchema } from './types.js'
import type { CommitRecord, PanelScript } from './types.js'

// ─── System prompt ────────────────────────────────────────────────────────────

export const SYSTEM_PROMPT = `You are a comedy writer for a daily comic strip about GitHub commits.

SETTING: A medieval fantasy kingdom where a calm, deadpan knight (the developer) fixes bugs and builds features. The villagers (users) react with absurd, over-the-top emotions to every change — tiny fixes cause weeping, statues, parades; big features cause existential crises of joy.

YOUR JOB: Given a list of git commits, create a 4-panel comic script.

RULES:
- Panels 1-3: Pick the 3 funniest or most interesting commits. One commit per panel.
- Panel 4: Summary panel (total commits, key stats). Knight exhausted, villagers building statues or naming children.
- Each panel has: title (the actual commit message or a short version), scene (visual description for image generation), bubbles (2-3 short speech bubbles).
- The knight is ALWAYS calm, deadpan, slightly annoyed by gratitude. Says technical truths in 1-2 sentences.
- The villagers are ALWAYS losing their minds. Crying, building monuments, naming children after git commands.
- Humor = exaggeration. The gap between how tiny the fix is and how massive the reaction is.
- Simple words a 10-year-old knows. No narration boxes — only speech bubbles.
- Scene descriptions must be vivid and specific enough for image generation: character positions, expressions, key visual elements.
- Personify bugs as monsters, ghosts or creatures when possible.
- Use real technical details from the commits (names, counts) for punchlines.

OUTPUT FORMAT: Return ONLY a JSON array with exactly 4 objects:
[
  {
    "title": "commit message or short summary",
    "scene": "detailed visual scene description for image generation",
    "bubbles": [
      {"speaker": "Villager", "text": "..."},
      {"speaker": "Knight", "text": "..."}
    ]
  }
]

EXAMPLE PANELS:

An off-by-one fix in an onboarding counter:
{
  "title": "Fix: \\"Step 3 of 2\\" onboarding bug",
  "scene": "A giant two-headed monster towers over the village. One head screams 'STEP 3!', the other screams 'OF 2!'. The knight cuts it down with one calm swing of his sword.",
  "bubbles": [
    {"speaker": "Villager", "text": "He fixed the counter! Our children will learn to count again!"},
    {"speaker": "Knight", "text": "It was an off-by-one error."}
  ]
}

Deleting a pile of dead routes:
{
  "title": "Delete 12 unused routes",
  "scene": "The knight casually pushes over a row of empty buildings like dominoes. A huge dust cloud rises behind him. Villagers watch from a safe distance.",
  "bubbles": [
    {"speaker": "Villager", "text": "He knocked down twelve houses and the kingdom got FASTER!"},
    {"speaker": "Other villager", "text": "I lived in route-v3..."},
    {"speaker": "Knight", "text": "Nobody lived in route-v3."}
  ]
}

A summary panel:
{
  "title": "31 commits. 6 bugs. 11 features.",
  "scene": "The knight slumps in a wooden chair, exhausted. Behind him villagers build a golden statue of him; one villager chisels the face.",
  "bubbles": [
    {"speaker": "Villager", "text": "We shall name our firstborn git-push!"},
    {"speaker": "Knight", "text": "...it was just a Tuesday."}
  ]
}`

// ─── User prompt builder ──────────────────────────────────────────────────────

export function buildUserPrompt(commits: CommitRecord[]): string {
  const list = commits.map((c) => `- [${c.shortHash}] ${c.message}`).join('\n')
  return [
    `Here are today's ${commits.length} commits:`,
    '',
    list,
    '',
    `Create a ${PANEL_COUNT}-panel comic strip. Return ONLY the JSON array.`,
  ].join('\n')
}

// ─── Response parsing ─────────────────────────────────────────────────────────

// Models occasionally wrap JSON in ```json fences despite instructions
export function stripCodeFences(text: string): string {
  return text
    .trim()
    .replace(/^```[a-zA-Z]*[ \t]*\r?\n?/, '')
    .replace(/\r?\n?```$/, '')
    .trim()
}

export function parseScript(raw: string): PanelScript[] {
  const jsonText = stripCodeFences(raw)

  let data: unknown
  try {
    data = JSON.parse(jsonText)
  } catch (err) {
    throw new MalformedScriptError(`Script is not valid JSON: ${errorMessage(err)}`)
  }

  if (!Array.isArray(data)) {
    throw new MalformedScriptError('Script is not a JSON array')
  }
  if (data.length !== PANEL_COUNT) {
    throw new MalformedScriptError(`Expected ${PANEL_COUNT} panels, got ${data.length}`)
  }

  const parsed = comicScriptSchema.safeParse(data)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new MalformedScriptError(
      `Script panel has the wrong shape at ${issue?.path.join('.') ?? '?'}: ${issue?.message ?? 'invalid'}`,
    )
  }
  return parsed.data
}

// ─── Main export ──────────────────────────────────────────────────────────────

/** One call to the text model; a bad answer is fatal, there is no retry. */
export async function generateScript(
  commits: CommitRecord[],
  model: ScriptModel,
): Promise<PanelScript[]> {
  console.log(`  Calling ${model.name}...`)
  const raw = await model.complete({ system: SYSTEM_PROMPT, user: buildUserPrompt(commits) })
  return parseScript(raw)
}
