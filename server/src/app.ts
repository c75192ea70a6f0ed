import express from 'express'
import { loadSettings, type DashboardSettings } from './config/settings.js'
import { loadRegionTable, type RegionCoordinateTable } from './config/regions.js'
import { SessionService } from './services/sessionService.js'
import { createSessionsRouter } from './routes/sessions.js'
import { createHealthRouter } from './routes/health.js'

export interface AppOptions {
  settings?: DashboardSettings
  regionTable?: RegionCoordinateTable
  sessions?: SessionService
}

export function createApp(options: AppOptions = {}) {
  const settings = options.settings ?? loadSettings()
  const regionTable = options.regionTable ?? loadRegionTable(settings.regionCoordinatesFile)
  const sessions = options.sessions ?? new SessionService({ idleTtlMs: settings.sessionIdleMinutes * 60 * 1000 })

  const app = express()
  app.use(express.json())

  app.use('/api/health', createHealthRouter(sessions))
  app.use('/api/sessions', createSessionsRouter({ sessions, settings, regionTable }))

  return app
}
