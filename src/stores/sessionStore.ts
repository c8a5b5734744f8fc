import { createStore } from 'zustand/vanilla';
import { createJSONStorage, persist, type StateStorage } from 'zustand/middleware';
import type { KeyValueStore } from '../services/cache/kvStore';
import type { TimeRange } from '../services/cache/keys';

export type LivePhase = 'idle' | 'acquiring' | 'streaming' | 'waiting-for-chunk' | 'error';

export interface NetworkStats {
  activeRequests: number;
  totalRequests: number;
  bytesDownloaded: number;
}

export interface SessionState {
  /** Active NEXRAD site */
  site: string | null;
  /** Archive range last requested (UTC ms) */
  range: TimeRange | null;
  livePhase: LivePhase;
  liveError: string | null;
  /** Most recent real-time scan seen */
  liveScanStart: number | null;
  network: NetworkStats;

  setSite: (site: string | null) => void;
  setRange: (range: TimeRange | null) => void;
  setLivePhase: (phase: LivePhase, error?: string | null) => void;
  setLiveScan: (scanStart: number | null) => void;
  requestStarted: () => void;
  requestFinished: (bytes: number) => void;
}

type PersistedSession = Pick<SessionState, 'site' | 'range'>;

const SESSION_NAMESPACE = 'session';

/**
 * zustand StateStorage over the cache's key-value store, so session
 * preferences live next to the data they describe.
 */
function keyValueStateStorage(kv: KeyValueStore): StateStorage {
  const encoder = new TextEncoder();
  const decoder = new TextDecoder();
  return {
    getItem: async (name) => {
      const bytes = await kv.get(SESSION_NAMESPACE, name);
      return bytes ? decoder.decode(bytes) : null;
    },
    setItem: async (name, value) => {
      await kv.put(SESSION_NAMESPACE, name, encoder.encode(value));
    },
    removeItem: async (name) => {
      await kv.delete(SESSION_NAMESPACE, name);
    },
  };
}

function readRange(value: unknown): TimeRange | null {
  if (typeof value !== 'object' || value === null) return null;
  const start = 'start' in value ? value.start : undefined;
  const end = 'end' in value ? value.end : undefined;
  return typeof start === 'number' && typeof end === 'number' ? { start, end } : null;
}

/**
 * Session state. Only the site and requested range are persisted; live
 * phase and network counters are ephemeral. Call `persist.rehydrate()`
 * before first use.
 */
export function createSessionStore(kv: KeyValueStore) {
  return createStore<SessionState>()(
    persist(
      (set) => ({
        site: null,
        range: null,
        livePhase: 'idle',
        liveError: null,
        liveScanStart: null,
        network: { activeRequests: 0, totalRequests: 0, bytesDownloaded: 0 },

        setSite: (site) => set({ site }),
        setRange: (range) => set({ range }),
        setLivePhase: (phase, error = null) => set({ livePhase: phase, liveError: error }),
        setLiveScan: (scanStart) => set({ liveScanStart: scanStart }),

        requestStarted: () => set((s) => ({
          network: {
            ...s.network,
            activeRequests: s.network.activeRequests + 1,
            totalRequests: s.network.totalRequests + 1,
          },
        })),

        requestFinished: (bytes) => set((s) => ({
          network: {
            ...s.network,
            activeRequests: Math.max(0, s.network.activeRequests - 1),
            bytesDownloaded: s.network.bytesDownloaded + bytes,
          },
        })),
      }),
      {
        name: 'radar-cache-session',
        version: 1, // v0 stored the site as `siteId`
        storage: createJSONStorage<PersistedSession>(() => keyValueStateStorage(kv)),
        skipHydration: true,
        partialize: (state): PersistedSession => ({
          site: state.site,
          range: state.range,
        }),
        migrate: (persisted: unknown, version: number): PersistedSession => {
          if (typeof persisted !== 'object' || persisted === null) {
            return { site: null, range: null };
          }
          let site: unknown = null;
          if (version === 0) {
            site = 'siteId' in persisted ? persisted.siteId : null;
          } else {
            site = 'site' in persisted ? persisted.site : null;
          }
          const range = 'range' in persisted ? readRange(persisted.range) : null;
          return { site: typeof site === 'string' ? site : null, range };
        },
      },
    ),
  );
}

export type SessionStore = ReturnType<typeof createSessionStore>;
