import { describe, it, expect, vi } from 'vitest'
import {
  SYSTEM_PROMPT,
  buildUserPrompt,
  generateScript,
  parseScript,
  stripCodeFences,
} from '../generate-script.js'
import { MalformedScriptError } from '../errors.js'
import type { ScriptModel } from '../models.js'
import { commits, panels } from './fixtures.js'

const json = JSON.stringify(panels)

describe('stripCodeFences', () => {
  it('leaves unfenced input unchanged', () => {
    expect(stripCodeFences(json)).toBe(json)
  })

  it('removes ```json fences', () => {
    expect(stripCodeFences('```json\n' + json + '\n```')).toBe(json)
  })

  it('removes bare ``` fences', () => {
    expect(stripCodeFences('```\n[1, 2]\n```')).toBe('[1, 2]')
  })

  it('is idempotent', () => {
    const once = stripCodeFences('```json\n' + json + '\n```')
    expect(stripCodeFences(once)).toBe(once)
  })
})

describe('parseScript', () => {
  it('parses a 4-panel array', () => {
    expect(parseScript(json)).toEqual(panels)
  })

  it('gives the same result with or without fences', () => {
    expect(parseScript('```json\n' + json + '\n```')).toEqual(parseScript(json))
  })

  it('rejects 3 panels', () => {
    expect(() => parseScript(JSON.stringify(panels.slice(0, 3)))).toThrow(
      new MalformedScriptError('Expected 4 panels, got 3'),
    )
  })

  it('rejects 5 panels instead of truncating', () => {
    expect(() => parseScript(JSON.stringify([...panels, panels[0]]))).toThrow(
      new MalformedScriptError('Expected 4 panels, got 5'),
    )
  })

  it('rejects non-JSON', () => {
    expect(() => parseScript('Sure! Here is your comic:')).toThrow(MalformedScriptError)
  })

  it('rejects a JSON object', () => {
    expect(() => parseScript('{"panels": []}')).toThrow(new MalformedScriptError('Script is not a JSON array'))
  })

  it('rejects a panel without bubbles', () => {
    const broken = panels.map((p, i) => (i === 2 ? { title: p.title, scene: p.scene } : p))
    expect(() => parseScript(JSON.stringify(broken))).toThrow(MalformedScriptError)
  })
})

describe('buildUserPrompt', () => {
  it('lists every commit with its short hash', () => {
    const prompt = buildUserPrompt(commits)
    expect(prompt.split('\n')).toEqual([
      "Here are today's 5 commits:",
      '',
      '- [a1b2c3d] Fix login redirect loop',
      '- [b2c3d4e] Add search to the settings page',
      '- [c3d4e5f] Drop the legacy cache layer',
      '- [d4e5f6a] Bump eslint',
      '- [e5f6a7b] Rename utils to helpers',
      '',
      'Create a 4-panel comic strip. Return ONLY the JSON array.',
    ])
  })
})

describe('generateScript', () => {
  it('makes one call with the fixed system prompt', async () => {
    const complete = vi.fn(async () => '```json\n' + json + '\n```')
    const model: ScriptModel = { name: 'fake', complete }

    const result = await generateScript(commits, model)

    expect(result).toEqual(panels)
    expect(complete).toHaveBeenCalledTimes(1)
    expect(complete).toHaveBeenCalledWith({ system: SYSTEM_PROMPT, user: buildUserPrompt(commits) })
  })

  it('does not retry a malformed answer', async () => {
    const complete = vi.fn(async () => JSON.stringify(panels.slice(0, 2)))
    await expect(generateScript(commits, { name: 'fake', complete })).rejects.toThrow(MalformedScriptError)
    expect(complete).toHaveBeenCalledTimes(1)
  })
})
