import type {
  CacheStats,
  FrameSequence,
  TrackOutline,
} from "../../../shared/types.js";
import type { LapProfileResult } from "../utils/simulation/lap-profile.js";

type Builder<V> = () => V | Promise<V>;

/**
 * Process-lifetime memo with single-flight builds.
 *
 * Concurrent get() calls for a key that is not cached share one build; a
 * failed build is not stored and rejects every waiter. Entries are replaced
 * whole, never mutated.
 */
export class SingleFlightCache<V extends object> {
  private entries = new Map<string, V>();
  private inFlight = new Map<string, Promise<V>>();
  private counters = { hits: 0, misses: 0, builds: 0, failures: 0 };

  constructor(
    public readonly name: string,
    private readonly onBuilt?: (key: string, ms: number) => void
  ) {}

  get(key: string, build: Builder<V>): Promise<V> {
    const cached = this.entries.get(key);
    if (cached !== undefined) {
      this.counters.hits++;
      return Promise.resolve(cached);
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      this.counters.hits++;
      return pending;
    }

    this.counters.misses++;
    return this.startBuild(key, build);
  }

  /**
   * Rebuild an entry. The old value keeps being served until the new one is
   * ready, then it is swapped in; a failed rebuild leaves the old value.
   */
  refresh(key: string, build: Builder<V>): Promise<V> {
    const pending = this.inFlight.get(key);
    if (pending) return pending;
    return this.startBuild(key, build);
  }

  peek(key: string): V | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /** Drop every entry. Builds already running still settle for their waiters but are not stored. */
  clear(): void {
    this.entries.clear();
    this.inFlight.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    return {
      entries: this.entries.size,
      inFlight: this.inFlight.size,
      ...this.counters,
    };
  }

  private startBuild(key: string, build: Builder<V>): Promise<V> {
    this.counters.builds++;
    const started = Date.now();

    const promise: Promise<V> = Promise.resolve()
      .then(build)
      .then(
        (value) => {
          // Not stored if the cache was cleared while this build ran
          if (this.inFlight.get(key) === promise) {
            this.entries.set(key, value);
            this.onBuilt?.(key, Date.now() - started);
          }
          return value;
        },
        (err: unknown) => {
          this.counters.failures++;
          throw err;
        }
      )
      .finally(() => {
        if (this.inFlight.get(key) === promise) {
          this.inFlight.delete(key);
        }
      });

    this.inFlight.set(key, promise);
    return promise;
  }
}

// ─── Race data cache ─────────────────────────────────────────────────────────

export type CacheScope = "profiles" | "frames" | "outlines";

/**
 * The three process-lifetime caches, created once at startup and handed to
 * the services that need them.
 */
export class RaceDataCache {
  readonly profiles: SingleFlightCache<LapProfileResult>;
  readonly frames: SingleFlightCache<FrameSequence>;
  readonly outlines: SingleFlightCache<TrackOutline>;

  constructor(options: { log?: boolean } = {}) {
    const onBuilt = (name: string) =>
      options.log
        ? (key: string, ms: number) =>
            console.log(`[cache] built ${name}:${key} in ${ms}ms`)
        : undefined;

    this.profiles = new SingleFlightCache("profiles", onBuilt("profile"));
    this.frames = new SingleFlightCache("frames", onBuilt("frames"));
    this.outlines = new SingleFlightCache("outlines", onBuilt("outline"));
  }

  clear(scope?: CacheScope): void {
    if (!scope || scope === "profiles") this.profiles.clear();
    if (!scope || scope === "frames") this.frames.clear();
    if (!scope || scope === "outlines") this.outlines.clear();
  }

  stats(): Record<CacheScope, CacheStats> {
    return {
      profiles: this.profiles.stats(),
      frames: this.frames.stats(),
      outlines: this.outlines.stats(),
    };
  }
}
