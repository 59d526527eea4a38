// Client-side React exports
export { PhotoLoaderProvider } from './react/provider.js'
export { usePhotoSlot } from './react/use-photo-slot.js'
export { usePhotoLoaderContext } from './react/context.js'
export type {
  PhotoLoaderProviderProps,
  PhotoSlotState,
  UsePhotoSlotOptions,
} from './types/react.js'
