import { useSyncExternalStore } from 'react'
import type { ConnectionSnapshot } from '../types'

export type SnapshotSource = {
  latestSnapshot(): ConnectionSnapshot
  subscribe(listener: () => void): () => void
}

/** Re-renders on every published snapshot; reads never block the engine. */
export const useSnapshot = (source: SnapshotSource) =>
  useSyncExternalStore(source.subscribe, source.latestSnapshot)
