/**
 * Tests for the Tracker sampling loop.
 *
 * The sampler is a jest mock resolving snapshots; the merger is a mock that
 * records heartbeats. Timers are faked so interval ticks run on demand.
 */

import type { SessionMerger } from '../src/tracking/session-merger'
import { Tracker, type WindowSampler } from '../src/tracking/tracker'
import type { WindowSnapshot } from '../src/types'

// ── Helpers ──────────────────────────────────────────────────────────────────

const START = new Date(2024, 0, 15, 14, 30).getTime()

function snapshot(overrides: Partial<WindowSnapshot> = {}): WindowSnapshot {
  return {
    appName: 'Code',
    bundleId: 'com.microsoft.VSCode',
    windowTitle: 'main.ts',
    idleSeconds: 0,
    timestamp: START,
    ...overrides,
  }
}

function createMockMerger() {
  return { process: jest.fn(), close: jest.fn() }
}

function createSampler() {
  return { sample: jest.fn<Promise<WindowSnapshot | null>, []>() }
}

// A sample that stays pending until the test resolves it
function deferred() {
  let resolve: (value: WindowSnapshot | null) => void = () => {}
  const promise = new Promise<WindowSnapshot | null>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

async function flushPromises() {
  for (let i = 0; i < 10; i++) await Promise.resolve()
}

// ── Test Suite ──────────────────────────────────────────────────────────────

describe('Tracker', () => {
  let sampler: ReturnType<typeof createSampler>
  let merger: ReturnType<typeof createMockMerger>
  let tracker: Tracker

  beforeEach(() => {
    jest.useFakeTimers()
    sampler = createSampler()
    sampler.sample.mockResolvedValue(snapshot())
    merger = createMockMerger()
    tracker = new Tracker(sampler satisfies WindowSampler, merger as unknown as SessionMerger, {
      sampleIntervalSeconds: 2,
      ignoredAppNames: ['activity-ledger'],
    })
  })

  afterEach(() => {
    tracker.stop()
    jest.clearAllTimers()
    jest.useRealTimers()
  })

  // ── Single ticks ───────────────────────────────────────────────────────

  describe('single ticks', () => {
    beforeEach(() => {
      tracker.stopped = false
    })

    /**
     * EXPECTED: The snapshot reaches the merger as a heartbeat carrying the
     * configured interval.
     */
    test('turns a snapshot into a heartbeat', async () => {
      await tracker._tick()

      expect(merger.process).toHaveBeenCalledTimes(1)
      expect(merger.process).toHaveBeenCalledWith({ ...snapshot(), intervalSeconds: 2 })
    })

    test('skips ticks without a focused window', async () => {
      sampler.sample.mockResolvedValueOnce(null)

      await tracker._tick()

      expect(merger.process).not.toHaveBeenCalled()
    })

    test('skips samples of its own process', async () => {
      sampler.sample.mockResolvedValueOnce(snapshot({ appName: 'activity-ledger' }))

      await tracker._tick()

      expect(merger.process).not.toHaveBeenCalled()
    })

    test('does not overlap ticks while a sample is in flight', async () => {
      const pending = deferred()
      sampler.sample.mockReturnValueOnce(pending.promise)

      const first = tracker._tick()
      await tracker._tick()

      expect(sampler.sample).toHaveBeenCalledTimes(1)

      pending.resolve(snapshot())
      await first

      expect(merger.process).toHaveBeenCalledTimes(1)
      expect(tracker.sampling).toBe(false)
    })

    test('drops a sample that lands after stop', async () => {
      const pending = deferred()
      sampler.sample.mockReturnValueOnce(pending.promise)

      const tick = tracker._tick()
      tracker.stop()
      pending.resolve(snapshot())
      await tick

      expect(merger.process).not.toHaveBeenCalled()
    })

    test('a throwing merger is logged and the loop survives', async () => {
      const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {})
      merger.process.mockImplementationOnce(() => {
        throw new Error('boom')
      })

      await tracker._tick()
      await tracker._tick()

      expect(errorSpy).toHaveBeenCalledWith('Tracker: heartbeat processing failed:', 'boom')
      expect(merger.process).toHaveBeenCalledTimes(2)
      errorSpy.mockRestore()
    })
  })

  // ── Sampler failures ───────────────────────────────────────────────────

  describe('sampler failures', () => {
    let warnSpy: jest.SpyInstance

    beforeEach(() => {
      tracker.stopped = false
      warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {})
      sampler.sample.mockRejectedValue(new Error('accessibility denied'))
    })

    afterEach(() => {
      warnSpy.mockRestore()
    })

    /**
     * EXPECTED: 61 consecutive failures log twice, on the 1st and the 60th.
     */
    test('logs the first failure and every 60th after it', async () => {
      for (let i = 0; i < 61; i++) await tracker._tick()

      expect(warnSpy).toHaveBeenCalledTimes(2)
      expect(warnSpy).toHaveBeenNthCalledWith(1, 'Tracker: sample failed (1 consecutive):', 'accessibility denied')
      expect(warnSpy).toHaveBeenNthCalledWith(2, 'Tracker: sample failed (60 consecutive):', 'accessibility denied')
      expect(merger.process).not.toHaveBeenCalled()
    })

    test('a successful sample resets the failure count', async () => {
      await tracker._tick()
      sampler.sample.mockResolvedValueOnce(snapshot())
      await tracker._tick()
      await tracker._tick()

      expect(warnSpy).toHaveBeenCalledTimes(2)
      expect(warnSpy).toHaveBeenLastCalledWith('Tracker: sample failed (1 consecutive):', 'accessibility denied')
      expect(merger.process).toHaveBeenCalledTimes(1)
    })

    test('the safety timeout frees a sample that never settles', () => {
      sampler.sample.mockReturnValueOnce(new Promise<WindowSnapshot | null>(() => {}))

      void tracker._tick()
      expect(tracker.sampling).toBe(true)

      jest.advanceTimersByTime(5000)

      expect(tracker.sampling).toBe(false)
      expect(warnSpy).toHaveBeenCalledWith('Tracker: safety timeout fired (sample never settled)')
    })

    /**
     * EXPECTED: A sample that settles after the safety timeout is dropped and
     * leaves the newer tick in flight; only the newer sample is processed.
     */
    test('a late sample does not clobber the tick that replaced it', async () => {
      const late = deferred()
      const current = deferred()
      sampler.sample.mockReturnValueOnce(late.promise).mockReturnValueOnce(current.promise)

      const first = tracker._tick()
      jest.advanceTimersByTime(5000)
      const second = tracker._tick()

      late.resolve(snapshot({ windowTitle: 'stale.ts' }))
      await first

      expect(tracker.sampling).toBe(true)
      expect(merger.process).not.toHaveBeenCalled()

      current.resolve(snapshot({ windowTitle: 'fresh.ts' }))
      await second

      expect(tracker.sampling).toBe(false)
      expect(merger.process).toHaveBeenCalledTimes(1)
      expect(merger.process).toHaveBeenCalledWith(expect.objectContaining({ windowTitle: 'fresh.ts', intervalSeconds: 2 }))
    })
  })

  // ── Start and stop ─────────────────────────────────────────────────────

  describe('start and stop', () => {
    test('samples immediately and then once per interval', async () => {
      tracker.start()
      await flushPromises()

      expect(sampler.sample).toHaveBeenCalledTimes(1)

      jest.advanceTimersByTime(2000)
      await flushPromises()
      jest.advanceTimersByTime(2000)
      await flushPromises()

      expect(sampler.sample).toHaveBeenCalledTimes(3)
      expect(merger.process).toHaveBeenCalledTimes(3)
      expect(tracker.isRunning).toBe(true)
    })

    test('a second start does not add a second timer', async () => {
      tracker.start()
      tracker.start()
      await flushPromises()

      jest.advanceTimersByTime(2000)
      await flushPromises()

      expect(sampler.sample).toHaveBeenCalledTimes(2)
    })

    test('stop clears the timer and closes the open session', async () => {
      tracker.start()
      await flushPromises()
      tracker.stop()

      jest.advanceTimersByTime(10000)
      await flushPromises()

      expect(sampler.sample).toHaveBeenCalledTimes(1)
      expect(merger.close).toHaveBeenCalledTimes(1)
      expect(tracker.isRunning).toBe(false)
    })
  })
})
