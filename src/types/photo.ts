import type { PhotoLoaderEventEmitter } from './events.js'
import type { IdentityArena } from '../loader/identity-arena.js'
import type { RequestTracker } from '../loader/request-tracker.js'

/**
 * Opaque handle for a target identity (a call, a connection, a caller
 * record). Issued by an {@link IdentityArena} and compared by value.
 */
export type IdentityHandle = number

export type DisplayMode = 'undefined' | 'showing-image' | 'showing-default'

export type ImageFormat = 'png' | 'jpeg' | 'gif' | 'webp' | 'bmp'

export interface ImageHandle {
  format: ImageFormat
  bytes: Uint8Array
  byteLength: number
  /** Decode hint the image was produced under, usually its locator */
  source: string
  width?: number
  height?: number
}

export type ByteStream = AsyncIterable<Uint8Array>

export type Outcome =
  | { kind: 'image'; image: ImageHandle }
  | { kind: 'absent' }

export interface PhotoLoadListener<TCookie = unknown> {
  onComplete(token: number, cookie: TCookie, image: ImageHandle | null): void
}

export interface LoadRequest<TCookie = unknown> {
  readonly token: number
  readonly identity: IdentityHandle | null
  readonly locator: string
  readonly cookie: TCookie
  readonly listener: PhotoLoadListener<TCookie> | null
}

export interface LoadResult<TCookie = unknown> {
  readonly token: number
  readonly cookie: TCookie
  readonly identity: IdentityHandle | null
  readonly outcome: Outcome
  readonly request: LoadRequest<TCookie>
  readonly sequence: number
}

export interface ResourceOpener {
  /**
   * Resolves to `null` when nothing is stored under the locator.
   * Rejects with a `ResourceUnavailableError` when it cannot be read.
   */
  openResourceStream(locator: string): Promise<ByteStream | null>
}

export interface ImageDecoder {
  decode(stream: ByteStream, hint: string): Promise<ImageHandle>
}

export interface DeliveryContext {
  postTask(fn: () => void): void
}

export interface CallerInfoSink {
  attachCachedImage(identity: IdentityHandle, image: ImageHandle): void
  markCacheCurrent(identity: IdentityHandle): void
}

export interface CallerInfoEntry {
  cachedPhoto: ImageHandle | null
  isCachedPhotoCurrent: boolean
}

export interface PhotoLoader extends PhotoLoaderEventEmitter {
  requestLoad: <TCookie>(
    identity: IdentityHandle | null,
    token: number,
    locator: string | null | undefined,
    cookie: TCookie,
    listener: PhotoLoadListener<TCookie> | null
  ) => void

  loadIfChanged: <TCookie>(
    tracker: RequestTracker,
    identity: IdentityHandle | null,
    token: number,
    locator: string | null | undefined,
    cookie: TCookie,
    listener: PhotoLoadListener<TCookie> | null
  ) => boolean

  getCallerInfo: (identity: IdentityHandle) => CallerInfoEntry | undefined
  release: (identity: IdentityHandle) => boolean
  readonly identities: IdentityArena<object>
  idle: () => Promise<void>
  close: () => Promise<void>
}
