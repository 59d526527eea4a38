import type { ReactNode } from 'react'
import type { DisplayMode, ImageHandle, PhotoLoader } from './photo.js'

export interface PhotoLoaderProviderProps {
  loader: PhotoLoader
  children: ReactNode
}

export interface UsePhotoSlotOptions {
  /** Correlation token passed through to the loader, default 0 */
  token?: number
}

export interface PhotoSlotState {
  image: ImageHandle | null
  displayMode: DisplayMode
}
