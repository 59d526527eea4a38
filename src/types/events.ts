/**
 * Event types for loader observability
 */

import type { IdentityHandle } from './photo.js'

export interface LoadSubmitEvent {
  token: number
  identity: IdentityHandle | null
  locator: string
  timestamp: number
}

export interface LoadFinishedEvent {
  token: number
  locator: string
  present: boolean
  latency: number
  timestamp: number
}

export interface LoadCompleteEvent {
  token: number
  identity: IdentityHandle | null
  present: boolean
  timestamp: number
}

export interface LoadRejectedEvent {
  token: number
  reason: string
  timestamp: number
}

export interface LoadErrorEvent {
  error: Error
  operation: 'open' | 'decode' | 'deliver' | 'submit'
  token?: number
  locator?: string
  timestamp: number
}

export type PhotoLoaderEvent =
  | { type: 'submit'; data: LoadSubmitEvent }
  | { type: 'load'; data: LoadFinishedEvent }
  | { type: 'complete'; data: LoadCompleteEvent }
  | { type: 'rejected'; data: LoadRejectedEvent }
  | { type: 'error'; data: LoadErrorEvent }

export type PhotoLoaderEventName = PhotoLoaderEvent['type']

export type PhotoLoaderEventHandler<T> = (event: T) => void

export type PhotoLoaderListener =
  | PhotoLoaderEventHandler<LoadSubmitEvent>
  | PhotoLoaderEventHandler<LoadFinishedEvent>
  | PhotoLoaderEventHandler<LoadCompleteEvent>
  | PhotoLoaderEventHandler<LoadRejectedEvent>
  | PhotoLoaderEventHandler<LoadErrorEvent>

export interface PhotoLoaderEventEmitter {
  on(event: 'submit', handler: PhotoLoaderEventHandler<LoadSubmitEvent>): this
  on(event: 'load', handler: PhotoLoaderEventHandler<LoadFinishedEvent>): this
  on(
    event: 'complete',
    handler: PhotoLoaderEventHandler<LoadCompleteEvent>
  ): this
  on(
    event: 'rejected',
    handler: PhotoLoaderEventHandler<LoadRejectedEvent>
  ): this
  on(event: 'error', handler: PhotoLoaderEventHandler<LoadErrorEvent>): this

  off(event: PhotoLoaderEventName, handler: PhotoLoaderListener): this
}
