import { createContext, useContext } from 'react'
import type { PhotoLoader } from '../types/photo.js'

export interface PhotoLoaderContextValue {
  loader: PhotoLoader
}

export const PhotoLoaderContext = createContext<PhotoLoaderContextValue | null>(
  null
)

export function usePhotoLoaderContext(): PhotoLoaderContextValue {
  const context = useContext(PhotoLoaderContext)
  if (!context) {
    throw new Error('usePhotoLoaderContext must be used within PhotoLoaderProvider')
  }
  return context
}
