import { describe, it, expect, vi, beforeEach } from 'vitest'

// --- mock SDKs -----------------------------------------------------------------

const { generateContent, messagesCreate, geminiOptions, anthropicOptions } = vi.hoisted(() => {
  const geminiOptions: unknown[] = []
  const anthropicOptions: unknown[] = []
  return { generateContent: vi.fn(), messagesCreate: vi.fn(), geminiOptions, anthropicOptions }
})

vi.mock('@google/genai', () => ({
  Modality: { IMAGE: 'IMAGE', TEXT: 'TEXT' },
  GoogleGenAI: class {
    models = { generateContent }
    constructor(options: unknown) {
      geminiOptions.push(options)
    }
  },
}))

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create: messagesCreate }
    constructor(options: unknown) {
      anthropicOptions.push(options)
    }
  },
}))

import {
  createAnthropicScriptModel,
  createGeminiImageModel,
  createGeminiScriptModel,
  createScriptModel,
} from '../models.js'
import { testConfig } from './fixtures.js'

beforeEach(() => {
  generateContent.mockReset()
  messagesCreate.mockReset()
  geminiOptions.length = 0
  anthropicOptions.length = 0
})

// --- tests --------------------------------------------------------------------

describe('Gemini script model', () => {
  it('sends the system instruction and asks for JSON', async () => {
    generateContent.mockResolvedValue({ text: '[]' })
    const model = createGeminiScriptModel('test-key', 'text-model', 5_000)

    const text = await model.complete({ system: 'be funny', user: 'commits...' })

    expect(text).toBe('[]')
    expect(geminiOptions).toEqual([{ apiKey: 'test-key', httpOptions: { timeout: 5_000 } }])
    expect(generateContent).toHaveBeenCalledWith({
      model: 'text-model',
      contents: 'commits...',
      config: { systemInstruction: 'be funny', responseMimeType: 'application/json' },
    })
  })

  it('returns an empty string when the response has no text', async () => {
    generateContent.mockResolvedValue({ text: undefined })
    const model = createGeminiScriptModel('test-key', 'text-model', 5_000)
    await expect(model.complete({ system: '', user: '' })).resolves.toBe('')
  })
})

describe('Gemini image model', () => {
  it('requests image and text and maps inline data to image parts', async () => {
    generateContent.mockResolvedValue({
      candidates: [
        {
          content: {
            parts: [
              { text: 'Here you go' },
              { inlineData: { data: 'iVBORw0=', mimeType: 'image/png' } },
              { inlineData: { mimeType: 'image/png' } },
            ],
          },
        },
      ],
    })
    const model = createGeminiImageModel('test-key', 'image-model', 5_000)

    const parts = await model.generate('draw a knight')

    expect(generateContent).toHaveBeenCalledWith({
      model: 'image-model',
      contents: 'draw a knight',
      config: { responseModalities: ['IMAGE', 'TEXT'] },
    })
    expect(parts).toEqual([
      { kind: 'text', text: 'Here you go' },
      { kind: 'image', data: 'iVBORw0=', mimeType: 'image/png' },
    ])
  })

  it('returns no parts when there are no candidates', async () => {
    generateContent.mockResolvedValue({})
    const model = createGeminiImageModel('test-key', 'image-model', 5_000)
    await expect(model.generate('x')).resolves.toEqual([])
  })
})

describe('Anthropic script model', () => {
  it('returns the first text block from a single request', async () => {
    messagesCreate.mockResolvedValue({ content: [{ type: 'text', text: '[1]' }] })
    const model = createAnthropicScriptModel('test-key', 'anthropic-model', 5_000)

    await expect(model.complete({ system: 'sys', user: 'usr' })).resolves.toBe('[1]')
    expect(anthropicOptions).toEqual([{ apiKey: 'test-key', timeout: 5_000, maxRetries: 0 }])
    expect(messagesCreate).toHaveBeenCalledWith({
      model: 'anthropic-model',
      max_tokens: 4096,
      system: 'sys',
      messages: [{ role: 'user', content: 'usr' }],
    })
  })
})

describe('createScriptModel', () => {
  it('picks the provider from config', () => {
    const gemini = createScriptModel(testConfig('/out'), { gemini: 'test-key' })
    const anthropic = createScriptModel(testConfig('/out', { scriptProvider: 'anthropic' }), {
      gemini: 'test-key',
      anthropic: 'test-key',
    })
    expect(gemini.name).toBe('text-model')
    expect(anthropic.name).toBe('anthropic-model')
  })
})
