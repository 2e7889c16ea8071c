/**
 * Gemini image generation through the Google AI generateContent API.
 */

import { emptyResponseError, guardedFetch, handleHttpError, handleNetworkError } from '../../http'
import type { FetchFn, Result } from '../../types'

export const GEMINI_IMAGE_MODEL = 'gemini-2.5-flash-image-preview'
export const GEMINI_API_URL = 'https://generativelanguage.googleapis.com/v1beta/models'

interface GeminiPart {
  text?: string
  inlineData?: { mimeType?: string; data?: string }
}

interface GeminiResponse {
  candidates?: Array<{
    content?: { parts?: GeminiPart[] }
  }>
}

export interface GeneratedImage {
  readonly data: Buffer
  readonly mimeType: string
  /** Text the model returned alongside the image, if any */
  readonly text: string
}

export interface GenerateImageOptions {
  readonly apiKey: string
  readonly model?: string | undefined
  readonly fetch?: FetchFn | undefined
}

const EXTENSIONS: Readonly<Record<string, string>> = {
  'image/png': 'png',
  'image/jpeg': 'jpg',
  'image/jpg': 'jpg',
  'image/webp': 'webp',
  'image/gif': 'gif'
}

/**
 * File extension for an image MIME type ('png' when unknown).
 */
export function imageExtension(mimeType: string): string {
  return EXTENSIONS[mimeType.toLowerCase()] ?? 'png'
}

/**
 * Generate an image from a prompt. Returns the first inline image part.
 */
export async function generateImage(
  prompt: string,
  options: GenerateImageOptions
): Promise<Result<GeneratedImage>> {
  const model = options.model ?? GEMINI_IMAGE_MODEL
  const fetchFn = options.fetch ?? guardedFetch
  const url = `${GEMINI_API_URL}/${model}:generateContent?key=${options.apiKey}`

  try {
    const response = await fetchFn(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        generationConfig: { responseModalities: ['TEXT', 'IMAGE'] }
      })
    })

    if (!response.ok) return handleHttpError(response)

    const data = (await response.json()) as GeminiResponse
    const parts = data.candidates?.[0]?.content?.parts
    if (!parts || parts.length === 0) return emptyResponseError()

    const text = parts
      .map((part) => part.text ?? '')
      .filter(Boolean)
      .join('\n')
    const image = parts.find((part) => part.inlineData?.data)?.inlineData
    if (!image?.data) {
      return {
        ok: false,
        error: {
          type: 'invalid_response',
          message: `No image in response${text ? `: ${text}` : ''}`
        }
      }
    }

    return {
      ok: true,
      value: {
        data: Buffer.from(image.data, 'base64'),
        mimeType: image.mimeType ?? 'image/png',
        text
      }
    }
  } catch (error) {
    return handleNetworkError(error)
  }
}
