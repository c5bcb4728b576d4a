/**
 * Thin adapters over the generative-AI SDKs. The pipeline only ever sees the
 * ScriptModel / ImageModel interfaces, so tests swap in fakes.
 */

import Anthropic from '@anthropic-ai/sdk'
import { GoogleGenAI, Modality } from '@google/genai'
import type { ApiKeys, ComicConfig } from './config.js'
import { ConfigError } from './errors.js'

const ANTHROPIC_MAX_TOKENS = 4096

export interface ScriptRequest {
  system: string
  user: string
}

export interface ScriptModel {
  readonly name: string
  complete(request: ScriptRequest): Promise<string>
}

export type ImagePart =
  | { kind: 'image'; data: Uint8Array | string; mimeType?: string }
  | { kind: 'text'; text: string }

export interface ImageModel {
  readonly name: string
  generate(prompt: string): Promise<ImagePart[]>
}

// ─── Gemini ───────────────────────────────────────────────────────────────────

function geminiClient(apiKey: string, timeoutMs: number): GoogleGenAI {
  return new GoogleGenAI({ apiKey, httpOptions: { timeout: timeoutMs } })
}

export function createGeminiScriptModel(
  apiKey: string,
  model: string,
  timeoutMs: number,
): ScriptModel {
  const client = geminiClient(apiKey, timeoutMs)
  return {
    name: model,
    async complete({ system, user }) {
      const response = await client.models.generateContent({
        model,
        contents: user,
        config: {
          systemInstruction: system,
          responseMimeType: 'application/json',
        },
      })
      return response.text ?? ''
    },
  }
}

export function createGeminiImageModel(
  apiKey: string,
  model: string,
  timeoutMs: number,
): ImageModel {
  const client = geminiClient(apiKey, timeoutMs)
  return {
    name: model,
    async generate(prompt) {
      const response = await client.models.generateContent({
        model,
        contents: prompt,
        config: { responseModalities: [Modality.IMAGE, Modality.TEXT] },
      })

      const parts = response.candidates?.[0]?.content?.parts ?? []
      const out: ImagePart[] = []
      for (const part of parts) {
        if (part.inlineData?.data) {
          out.push({ kind: 'image', data: part.inlineData.data, mimeType: part.inlineData.mimeType })
        } else if (part.text) {
          out.push({ kind: 'text', text: part.text })
        }
      }
      return out
    },
  }
}

// ─── Anthropic ────────────────────────────────────────────────────────────────

export function createAnthropicScriptModel(
  apiKey: string,
  model: string,
  timeoutMs: number,
): ScriptModel {
  const client = new Anthropic({ apiKey, timeout: timeoutMs, maxRetries: 0 })
  return {
    name: model,
    async complete({ system, user }) {
      const message = await client.messages.create({
        model,
        max_tokens: ANTHROPIC_MAX_TOKENS,
        system,
        messages: [{ role: 'user', content: user }],
      })
      const first = message.content[0]
      return first?.type === 'text' ? first.text : ''
    },
  }
}

// ─── Selection ────────────────────────────────────────────────────────────────

export function createScriptModel(config: ComicConfig, keys: ApiKeys): ScriptModel {
  if (config.scriptProvider === 'anthropic') {
    if (!keys.anthropic) throw new ConfigError('ANTHROPIC_API_KEY is not set')
    return createAnthropicScriptModel(keys.anthropic, config.anthropicModel, config.requestTimeoutMs)
  }
  return createGeminiScriptModel(keys.gemini, config.geminiTextModel, config.requestTimeoutMs)
}

export function createImageModel(config: ComicConfig, keys: ApiKeys): ImageModel {
  return createGeminiImageModel(keys.gemini, config.geminiImageModel, config.requestTimeoutMs)
}
