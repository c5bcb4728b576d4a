import { z } from 'zod'
import type { ComicConfig } from './config.js'
import { dayWindow } from './dates.js'
import { CommitFetchError, errorMessage } from './errors.js'
import type { CommitRecord } from './types.js'

const GITHUB_API = 'https://api.github.com'

const MERGE_PREFIXES = ['Merge pull request', 'Merge branch']

// Only the fields we read; GitHub sends far more.
const ghCommitSchema = z.object({
  sha: z.string(),
  commit: z.object({
    message: z.string(),
    author: z
      .object({ name: z.string(), date: z.string().optional() })
      .nullable(),
    committer: z.object({ date: z.string().optional() }).nullable().optional(),
  }),
})

const ghCommitPageSchema = z.array(ghCommitSchema)

type GHCommit = z.infer<typeof ghCommitSchema>

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

// ─── Helpers ──────────────────────────────────────────────────────────────────

export function firstLine(message: string): string {
  return message.split('\n')[0].trim()
}

export function isMergeCommit(message: string): boolean {
  const line = firstLine(message)
  return MERGE_PREFIXES.some((prefix) => line.startsWith(prefix))
}

function commitTimestamp(c: GHCommit): string | undefined {
  return c.commit.committer?.date ?? c.commit.author?.date
}

function inWindow(timestamp: string, since: string, until: string): boolean {
  const t = Date.parse(timestamp)
  if (Number.isNaN(t)) return true
  return t >= Date.parse(since) && t < Date.parse(until)
}

function toCommitRecord(c: GHCommit): CommitRecord {
  return {
    shortHash: c.sha.slice(0, 7),
    message: firstLine(c.commit.message),
    authorName: c.commit.author?.name ?? 'unknown',
  }
}

// ─── GitHub API ───────────────────────────────────────────────────────────────

async function fetchPage(
  url: string,
  headers: Record<string, string>,
  timeoutMs: number,
  fetchImpl: FetchLike,
): Promise<GHCommit[]> {
  let res: Response
  try {
    res = await fetchImpl(url, {
      headers,
      signal: AbortSignal.timeout(timeoutMs),
    })
  } catch (err) {
    throw new CommitFetchError(`GitHub commits request failed: ${errorMessage(err)}`)
  }
  if (!res.ok) {
    throw new CommitFetchError(
      `GitHub commits request failed: ${res.status} ${res.statusText}`,
      res.status,
    )
  }

  let body: unknown
  try {
    body = await res.json()
  } catch (err) {
    throw new CommitFetchError(`GitHub commits response is not JSON: ${errorMessage(err)}`, res.status)
  }

  const parsed = ghCommitPageSchema.safeParse(body)
  if (!parsed.success) {
    throw new CommitFetchError(
      `GitHub commits response has an unexpected shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`,
      res.status,
    )
  }
  return parsed.data
}

/**
 * Non-merge commits of `repo` whose commit timestamp falls inside the UTC day
 * `date`, oldest page first as GitHub returns them.
 */
export async function fetchCommits(
  repo: string,
  date: string,
  config: Pick<ComicConfig, 'githubToken' | 'perPage' | 'requestTimeoutMs'>,
  fetchImpl: FetchLike = fetch,
): Promise<CommitRecord[]> {
  const { since, until } = dayWindow(date)
  const headers: Record<string, string> = {
    Accept: 'application/vnd.github+json',
    'X-GitHub-Api-Version': '2022-11-28',
    'User-Agent': 'daily-comic',
  }
  if (config.githubToken) {
    headers.Authorization = `Bearer ${config.githubToken}`
  }

  const raw: GHCommit[] = []
  for (let page = 1; ; page++) {
    const params = new URLSearchParams({
      since,
      until,
      per_page: String(config.perPage),
      page: String(page),
    })
    const batch = await fetchPage(
      `${GITHUB_API}/repos/${repo}/commits?${params}`,
      headers,
      config.requestTimeoutMs,
      fetchImpl,
    )
    raw.push(...batch)
    if (batch.length < config.perPage) break
  }

  return raw
    .filter((c) => !isMergeCommit(c.commit.message))
    .filter((c) => {
      const ts = commitTimestamp(c)
      return ts === undefined || inWindow(ts, since, until)
    })
    .map(toCommitRecord)
}
