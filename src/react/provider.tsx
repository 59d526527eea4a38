import { useMemo } from 'react'
import { PhotoLoaderContext } from './context.js'
import type { PhotoLoaderProviderProps } from '../types/react.js'

export type { PhotoLoaderProviderProps }

export function PhotoLoaderProvider({ loader, children }: PhotoLoaderProviderProps) {
  const value = useMemo(() => ({ loader }), [loader])

  return (
    <PhotoLoaderContext.Provider value={value}>
      {children}
    </PhotoLoaderContext.Provider>
  )
}
