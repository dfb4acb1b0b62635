/**
 * Response body decoding shared by both transports.
 */

import type { TransportFailureKind } from '../errors.js'

/** Content codings either transport can decompress */
export const SUPPORTED_CONTENT_ENCODINGS: ReadonlySet<string> = new Set(['gzip', 'x-gzip', 'deflate', 'br', 'identity'])

export type DecodeResult =
  | { ok: true; text: string }
  | { ok: false; kind: Extract<TransportFailureKind, 'DecodeError' | 'ProtocolError'>; error: string }

/**
 * First content coding the clients cannot undo, if any.
 * `Content-Encoding: gzip, zstd` lists codings in the order applied.
 */
export function unsupportedContentEncoding(header: string | null | undefined): string | undefined {
  if (!header) return undefined
  return header
    .split(',')
    .map(coding => coding.trim().toLowerCase())
    .filter(coding => coding.length > 0)
    .find(coding => !SUPPORTED_CONTENT_ENCODINGS.has(coding))
}

export function charsetFromContentType(contentType: string | null | undefined): string {
  const match = contentType?.match(/charset\s*=\s*"?([^";\s]+)"?/i)
  return match?.[1]?.toLowerCase() ?? 'utf-8'
}

function createDecoder(charset: string, fatal: boolean): TextDecoder {
  try {
    return new TextDecoder(charset, { fatal })
  } catch {
    // Unknown label: RangeError from the constructor
    return new TextDecoder('utf-8', { fatal })
  }
}

export function replacementRatio(text: string): number {
  if (text.length === 0) return 0
  let replaced = 0
  for (const char of text) {
    if (char === '\uFFFD') replaced++
  }
  return replaced / text.length
}

/**
 * Decode a body with the declared charset. A strict decode failure is
 * tolerated while the best-effort text stays under `maxReplacementRatio`.
 */
export function decodeBody(bytes: Uint8Array, contentType: string | null | undefined, maxReplacementRatio: number): DecodeResult {
  const charset = charsetFromContentType(contentType)

  try {
    return { ok: true, text: createDecoder(charset, true).decode(bytes) }
  } catch (error) {
    const text = createDecoder(charset, false).decode(bytes)
    const ratio = replacementRatio(text)
    if (ratio <= maxReplacementRatio) {
      return { ok: true, text }
    }
    return {
      ok: false,
      kind: 'DecodeError',
      error: `Body is not valid ${charset} (${(ratio * 100).toFixed(1)}% replaced): ${error instanceof Error ? error.message : String(error)}`,
    }
  }
}
