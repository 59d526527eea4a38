import type {
  ByteStream,
  ImageDecoder,
  ImageFormat,
  ImageHandle,
} from '../types/photo.js'
import { DecodeFailureError } from './errors.js'

export interface SniffingImageDecoderConfig {
  /** Largest accepted image in bytes */
  maxBytes?: number
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]

function startsWith(bytes: Uint8Array, signature: number[], offset = 0): boolean {
  if (bytes.length < offset + signature.length) return false
  return signature.every((byte, i) => bytes[offset + i] === byte)
}

function ascii(text: string): number[] {
  return Array.from(text, (char) => char.charCodeAt(0))
}

export function detectImageFormat(bytes: Uint8Array): ImageFormat | null {
  if (startsWith(bytes, PNG_SIGNATURE)) return 'png'
  if (startsWith(bytes, [0xff, 0xd8, 0xff])) return 'jpeg'
  if (startsWith(bytes, ascii('GIF87a')) || startsWith(bytes, ascii('GIF89a'))) {
    return 'gif'
  }
  if (startsWith(bytes, ascii('RIFF')) && startsWith(bytes, ascii('WEBP'), 8)) {
    return 'webp'
  }
  if (startsWith(bytes, ascii('BM'))) return 'bmp'
  return null
}

function readDimensions(
  format: ImageFormat,
  bytes: Uint8Array
): { width: number; height: number } | undefined {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)

  // IHDR is the first chunk: width and height are big-endian at 16 and 20
  if (format === 'png' && bytes.length >= 24) {
    return { width: view.getUint32(16), height: view.getUint32(20) }
  }
  // Logical screen size, little-endian, right after the header
  if (format === 'gif' && bytes.length >= 10) {
    return { width: view.getUint16(6, true), height: view.getUint16(8, true) }
  }
  return undefined
}

/**
 * Reads the whole stream and identifies the image by its signature. It
 * does not decode pixels; the bytes are handed on as they are.
 */
export class SniffingImageDecoder implements ImageDecoder {
  private maxBytes: number

  constructor(config: SniffingImageDecoderConfig = {}) {
    this.maxBytes = config.maxBytes ?? 5 * 1024 * 1024
  }

  async decode(stream: ByteStream, hint: string): Promise<ImageHandle> {
    const chunks: Uint8Array[] = []
    let total = 0

    for await (const chunk of stream) {
      total += chunk.byteLength
      if (total > this.maxBytes) {
        throw new DecodeFailureError(hint, `image exceeds ${this.maxBytes} bytes`)
      }
      chunks.push(chunk)
    }

    if (total === 0) {
      throw new DecodeFailureError(hint, 'empty stream')
    }

    const bytes = Buffer.concat(chunks, total)
    const format = detectImageFormat(bytes)
    if (!format) {
      throw new DecodeFailureError(hint, 'unrecognized image format')
    }

    return {
      format,
      bytes: new Uint8Array(bytes),
      byteLength: total,
      source: hint,
      ...readDimensions(format, bytes),
    }
  }
}
