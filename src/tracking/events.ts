import { EventEmitter } from 'node:events'

interface TrackingEventMap {
  /** Local midnight passed; `date` is the day that just ended. */
  'day-changed': { date: string }
  'session-opened': { id: number; appName: string; date: string }
  'session-closed': { id: number; durationSeconds: number }
}

type TrackingEventKey = keyof TrackingEventMap
type TrackingListener<K extends TrackingEventKey> = (payload: TrackingEventMap[K]) => void | Promise<void>
type EmitterListener = Parameters<EventEmitter['off']>[1]

/**
 * Typed channel between the session merger and whoever reacts to it
 * (report generation, UI refresh). A failing listener is logged and does
 * not reach the emitter or the other listeners.
 */
class TrackingEvents extends EventEmitter {
  _wrapped: Map<TrackingEventKey, Map<object, EmitterListener>>

  constructor() {
    super()
    this._wrapped = new Map()
  }

  emitEvent<K extends TrackingEventKey>(type: K, payload: TrackingEventMap[K]): boolean {
    return this.emit(type, payload)
  }

  subscribe<K extends TrackingEventKey>(type: K, listener: TrackingListener<K>) {
    const report = (err: unknown) => console.error(`Tracking events: error in ${type} listener:`, err)
    const wrapped = (payload: TrackingEventMap[K]) => {
      try {
        const result = listener(payload)
        if (result instanceof Promise) result.catch(report)
      } catch (err) {
        report(err)
      }
    }
    let forType = this._wrapped.get(type)
    if (!forType) {
      forType = new Map()
      this._wrapped.set(type, forType)
    }
    forType.set(listener, wrapped)
    this.on(type, wrapped)
  }

  unsubscribe<K extends TrackingEventKey>(type: K, listener: TrackingListener<K>) {
    const forType = this._wrapped.get(type)
    const wrapped = forType?.get(listener)
    if (!forType || !wrapped) return
    this.off(type, wrapped)
    forType.delete(listener)
  }
}

export { TrackingEvents }
export type { TrackingEventKey, TrackingEventMap, TrackingListener }
