import { useEffect, useRef, useState } from 'react'
import { usePhotoLoaderContext } from './context.js'
import { RequestTracker } from '../loader/request-tracker.js'
import { validateLocator } from '../utils/locator.js'
import type {
  DisplayMode,
  IdentityHandle,
  PhotoLoadListener,
} from '../types/photo.js'
import type { PhotoSlotState, UsePhotoSlotOptions } from '../types/react.js'

export type { PhotoSlotState, UsePhotoSlotOptions }

/**
 * Binds one UI slot to the loader. The slot keeps its own tracker, so it
 * only loads when `identity` changes; a new `locator` for the same
 * identity does not reload. Results that arrive for an identity the slot
 * has since moved past are ignored.
 */
export function usePhotoSlot(
  identity: IdentityHandle | null,
  locator: string | null | undefined,
  options?: UsePhotoSlotOptions
): PhotoSlotState {
  const { loader } = usePhotoLoaderContext()
  const [tracker] = useState(() => new RequestTracker())
  const [state, setState] = useState<PhotoSlotState>({
    image: null,
    displayMode: tracker.getDisplayMode(),
  })
  const mounted = useRef(true)
  const token = options?.token ?? 0

  useEffect(() => {
    mounted.current = true
    return () => {
      mounted.current = false
    }
  }, [])

  useEffect(() => {
    const show = (next: PhotoSlotState) => {
      tracker.setDisplayMode(next.displayMode)
      setState(next)
    }

    // Nothing the loader would accept: show the default for this identity
    if (!locator || !validateLocator(locator).valid) {
      if (tracker.shouldLoad(identity)) {
        tracker.setIdentity(identity)
        show({ image: null, displayMode: 'showing-default' })
      }
      return
    }

    const listener: PhotoLoadListener<IdentityHandle | null> = {
      onComplete(_token, requestedFor, image) {
        if (!mounted.current || tracker.getIdentity() !== requestedFor) {
          return
        }
        const displayMode: DisplayMode = image ? 'showing-image' : 'showing-default'
        show({ image, displayMode })
      },
    }

    loader.loadIfChanged(tracker, identity, token, locator, identity, listener)
  }, [loader, tracker, identity, locator, token])

  return state
}
