import {
  IGNORED_APP_NAMES,
  ONE_SECOND_MS,
  SAMPLE_ERROR_LOG_EVERY,
  SAMPLE_INTERVAL_SECONDS,
  SAMPLE_SAFETY_TIMEOUT_MS,
} from '../constants'
import type { WindowSnapshot } from '../types'
import type { SessionMerger } from './session-merger'

/** OS-level foreground window sensor. Resolves null when nothing is focused. */
interface WindowSampler {
  sample(): Promise<WindowSnapshot | null>
}

interface TrackerOptions {
  sampleIntervalSeconds?: number
  ignoredAppNames?: readonly string[]
}

class Tracker {
  sampler: WindowSampler
  merger: SessionMerger
  intervalSeconds: number
  ignoredAppNames: Set<string>
  timer: ReturnType<typeof setInterval> | null
  stopped: boolean
  sampling: boolean
  _consecutiveErrors: number
  _tickId: number

  constructor(sampler: WindowSampler, merger: SessionMerger, options: TrackerOptions = {}) {
    this.sampler = sampler
    this.merger = merger
    this.intervalSeconds = options.sampleIntervalSeconds ?? SAMPLE_INTERVAL_SECONDS
    this.ignoredAppNames = new Set(options.ignoredAppNames ?? IGNORED_APP_NAMES)
    this.timer = null
    this.stopped = true
    this.sampling = false
    this._consecutiveErrors = 0
    this._tickId = 0
  }

  get isRunning(): boolean {
    return this.timer !== null
  }

  start() {
    if (this.timer) return
    this.stopped = false
    void this._tick()
    this.timer = setInterval(() => void this._tick(), this.intervalSeconds * ONE_SECOND_MS)
  }

  /** Stops sampling and closes the open session with its final write. */
  stop() {
    this.stopped = true
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
    this.merger.close()
  }

  async _tick() {
    if (this.stopped || this.sampling) return
    this.sampling = true
    const tick = ++this._tickId

    // Reset the flag even if the sampler never settles
    const safetyTimer = setTimeout(() => {
      console.warn('Tracker: safety timeout fired (sample never settled)')
      this.sampling = false
    }, SAMPLE_SAFETY_TIMEOUT_MS)

    let snapshot: WindowSnapshot | null
    try {
      snapshot = await this.sampler.sample()
    } catch (e) {
      if (tick !== this._tickId) return
      this._consecutiveErrors++
      if (this._consecutiveErrors === 1 || this._consecutiveErrors % SAMPLE_ERROR_LOG_EVERY === 0) {
        console.warn(`Tracker: sample failed (${this._consecutiveErrors} consecutive):`, (e as Error).message)
      }
      return
    } finally {
      clearTimeout(safetyTimer)
      if (tick === this._tickId) this.sampling = false
    }

    // A newer tick took over after the safety timeout; its sample wins
    if (tick !== this._tickId) return
    this._consecutiveErrors = 0
    if (this.stopped || !snapshot || !snapshot.appName) return
    // Skip tracking the ledger itself
    if (this.ignoredAppNames.has(snapshot.appName)) return

    try {
      this.merger.process({ ...snapshot, intervalSeconds: this.intervalSeconds })
    } catch (e) {
      console.error('Tracker: heartbeat processing failed:', (e as Error).message)
    }
  }
}

export { Tracker }
export type { TrackerOptions, WindowSampler }
