import { IDLE_THRESHOLD_SECONDS, PASSIVE_MEDIA_BUNDLE_IDS } from '../constants'
import { toLocalDate } from '../dates'
import type { ActivityFields, Heartbeat, NewActivity, OpenSession } from '../types'
import type { TrackingEvents } from './events'

/** The two writes the merger needs; ActivityStore satisfies it. */
interface ActivityWriter {
  insert(record: NewActivity): number
  updateDuration(id: number, seconds: number): void
}

interface ProjectClassifier {
  match(activity: ActivityFields): number | null
}

interface SessionMergerOptions {
  idleThresholdSeconds?: number
  passiveMediaBundleIds?: readonly string[]
  classifier?: ProjectClassifier | null
}

function identityOf(heartbeat: Heartbeat): ActivityFields {
  return {
    appName: heartbeat.appName,
    bundleId: heartbeat.bundleId,
    windowTitle: heartbeat.windowTitle,
    url: heartbeat.url ?? null,
    extraInfo: heartbeat.extraInfo ?? null,
  }
}

// Exact, case-sensitive, field for field
function sameIdentity(session: OpenSession, fields: ActivityFields): boolean {
  return (
    session.appName === fields.appName &&
    session.windowTitle === fields.windowTitle &&
    session.url === fields.url &&
    session.extraInfo === fields.extraInfo
  )
}

/**
 * Folds heartbeats into activity records. At most one session is open; each
 * heartbeat either extends it, replaces it, or closes it on idle. Store
 * failures are logged here and never thrown back into the sampling loop.
 */
class SessionMerger {
  store: ActivityWriter
  events: TrackingEvents
  classifier: ProjectClassifier | null
  idleThresholdSeconds: number
  passiveMediaBundleIds: Set<string>
  current: OpenSession | null
  lastDate: string | null

  constructor(store: ActivityWriter, events: TrackingEvents, options: SessionMergerOptions = {}) {
    this.store = store
    this.events = events
    this.classifier = options.classifier ?? null
    this.idleThresholdSeconds = options.idleThresholdSeconds ?? IDLE_THRESHOLD_SECONDS
    this.passiveMediaBundleIds = new Set(options.passiveMediaBundleIds ?? PASSIVE_MEDIA_BUNDLE_IDS)
    this.current = null
    this.lastDate = null
  }

  process(heartbeat: Heartbeat) {
    const date = toLocalDate(heartbeat.timestamp)
    if (this.lastDate !== null && this.lastDate !== date) {
      const completed = this.lastDate
      this.close()
      this.lastDate = date
      this.events.emitEvent('day-changed', { date: completed })
    }
    this.lastDate = date

    const interval = Math.max(0, Math.round(heartbeat.intervalSeconds))
    const idle = heartbeat.idleSeconds >= this.idleThresholdSeconds
    const fields = identityOf(heartbeat)

    if (this.current && sameIdentity(this.current, fields)) {
      // Watching or reading produces no input, so idle does not end passive media
      if (idle && !this.isPassiveMedia(this.current)) {
        this.close()
        return
      }
      this._extend(this.current, interval)
      return
    }

    this.close()
    if (idle) return
    this._open(fields, date, heartbeat.timestamp, interval)
  }

  /** Writes the final duration when it lags and returns to Idle. */
  close() {
    const session = this.current
    if (!session) return
    this.current = null
    if (session.persistedSeconds < session.durationSeconds) {
      try {
        this.store.updateDuration(session.id, session.durationSeconds)
        session.persistedSeconds = session.durationSeconds
      } catch (e) {
        console.error(`Session merger: final write for activity ${session.id} failed:`, (e as Error).message)
      }
    }
    this.events.emitEvent('session-closed', { id: session.id, durationSeconds: session.durationSeconds })
  }

  isPassiveMedia(session: OpenSession): boolean {
    if (this.passiveMediaBundleIds.has(session.bundleId)) return true
    const title = session.windowTitle.toLowerCase()
    return title.endsWith('.pdf') || title.includes('.pdf —') || title.includes('.pdf –')
  }

  _extend(session: OpenSession, interval: number) {
    session.durationSeconds += interval
    try {
      this.store.updateDuration(session.id, session.durationSeconds)
      session.persistedSeconds = session.durationSeconds
    } catch (e) {
      // In-memory duration stays ahead; the next write catches up
      console.error(`Session merger: duration update for activity ${session.id} failed:`, (e as Error).message)
    }
  }

  _open(fields: ActivityFields, date: string, timestamp: number, interval: number) {
    let projectId: number | null = null
    if (this.classifier) {
      try {
        projectId = this.classifier.match(fields)
      } catch (e) {
        console.error('Session merger: classification failed, recording unassigned:', (e as Error).message)
      }
    }

    const record: NewActivity = {
      ...fields,
      timestamp,
      durationSeconds: interval,
      date,
      projectId,
      projectSource: projectId === null ? null : 'auto_rule',
    }
    let id: number
    try {
      id = this.store.insert(record)
    } catch (e) {
      if (projectId === null) {
        console.error(`Session merger: insert for ${fields.appName} failed:`, (e as Error).message)
        return
      }
      // The matched project may have been deleted since the rules were loaded
      console.error(
        `Session merger: insert for ${fields.appName} with project ${projectId} failed, recording unassigned:`,
        (e as Error).message,
      )
      try {
        id = this.store.insert({ ...record, projectId: null, projectSource: null })
      } catch (retryError) {
        console.error(`Session merger: insert for ${fields.appName} failed:`, (retryError as Error).message)
        return
      }
    }

    this.current = { id, ...fields, date, durationSeconds: interval, persistedSeconds: interval }
    this.events.emitEvent('session-opened', { id, appName: fields.appName, date })
  }
}

export { SessionMerger }
export type { ActivityWriter, ProjectClassifier, SessionMergerOptions }
