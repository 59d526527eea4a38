/**
 * In-process stand-ins for the loader's collaborators
 */
import type {
  ByteStream,
  ImageHandle,
  PhotoLoadListener,
  ResourceOpener,
} from '../types/photo.js'
import type { PhotoStoreClient } from '../loader/redis-photo-store.js'

export function pngBytes(width = 1, height = 1): Uint8Array {
  const bytes = new Uint8Array(33)
  bytes.set([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a], 0)
  const view = new DataView(bytes.buffer)
  view.setUint32(8, 13)
  bytes.set([0x49, 0x48, 0x44, 0x52], 12) // IHDR
  view.setUint32(16, width)
  view.setUint32(20, height)
  return bytes
}

export function gifBytes(width = 1, height = 1): Uint8Array {
  const bytes = new Uint8Array(13)
  bytes.set(Array.from('GIF89a', (c) => c.charCodeAt(0)), 0)
  const view = new DataView(bytes.buffer)
  view.setUint16(6, width, true)
  view.setUint16(8, height, true)
  return bytes
}

export async function* streamOf(...chunks: Uint8Array[]): ByteStream {
  for (const chunk of chunks) {
    yield chunk
  }
}

export function deferred<T>(): {
  promise: Promise<T>
  resolve: (value: T) => void
  reject: (error: Error) => void
} {
  let resolve: (value: T) => void = () => {}
  let reject: (error: Error) => void = () => {}
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}

/**
 * Serves photos from memory. Locators listed in `failures` throw.
 */
export class FakeOpener implements ResourceOpener {
  photos = new Map<string, Uint8Array>()
  failures = new Map<string, Error>()
  opened: string[] = []

  async openResourceStream(locator: string): Promise<ByteStream | null> {
    this.opened.push(locator)
    const failure = this.failures.get(locator)
    if (failure) throw failure

    const bytes = this.photos.get(locator)
    return bytes ? streamOf(bytes) : null
  }
}

/**
 * Redis stand-in holding string values in a Map
 */
export class FakeRedis implements PhotoStoreClient {
  values = new Map<string, string>()
  reads: string[] = []
  failWith?: Error

  async get(key: string): Promise<string | null> {
    this.reads.push(key)
    if (this.failWith) throw this.failWith
    return this.values.get(key) ?? null
  }
}

export interface Completion<TCookie> {
  token: number
  cookie: TCookie
  image: ImageHandle | null
}

export function recordingListener<TCookie>(): {
  calls: Completion<TCookie>[]
  listener: PhotoLoadListener<TCookie>
} {
  const calls: Completion<TCookie>[] = []
  return {
    calls,
    listener: {
      onComplete(token, cookie, image) {
        calls.push({ token, cookie, image })
      },
    },
  }
}
