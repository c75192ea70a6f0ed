import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest'
import { DEFAULT_SETTINGS, loadSettings } from '../settings.js'

describe('loadSettings', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  test('uses defaults when nothing is set', () => {
    expect(loadSettings({})).toEqual(DEFAULT_SETTINGS)
    expect(DEFAULT_SETTINGS.regionCountLimit).toBe(10)
    expect(DEFAULT_SETTINGS.topSalespersonCount).toBe(5)
    expect(DEFAULT_SETTINGS.sessionIdleMinutes).toBe(30)
  })

  test('reads overrides from the environment', () => {
    const settings = loadSettings({
      PORT: '8080',
      UPLOAD_MAX_BYTES: '1024',
      REGION_COORDINATES_FILE: '/etc/dashboard/regions.json',
      REGION_COUNT_LIMIT: '3',
      TOP_SALESPERSON_COUNT: '2',
      SESSION_IDLE_MINUTES: '5'
    })

    expect(settings.port).toBe(8080)
    expect(settings.uploadMaxBytes).toBe(1024)
    expect(settings.regionCoordinatesFile).toBe('/etc/dashboard/regions.json')
    expect(settings.regionCountLimit).toBe(3)
    expect(settings.topSalespersonCount).toBe(2)
    expect(settings.sessionIdleMinutes).toBe(5)
  })

  test('falls back and warns on invalid numbers', () => {
    const settings = loadSettings({ PORT: 'abc', REGION_COUNT_LIMIT: '-4' })

    expect(settings.port).toBe(5001)
    expect(settings.regionCountLimit).toBe(10)
    expect(console.warn).toHaveBeenCalledWith('Ignoring invalid PORT=abc, using 5001')
    expect(console.warn).toHaveBeenCalledWith('Ignoring invalid REGION_COUNT_LIMIT=-4, using 10')
  })
})
