import { afterEach, beforeEach, vi } from 'vitest'
import { setColorMode } from '../src/utils/colors'
import { logger } from '../src/utils/logger'

function resetLogger(): void {
  logger.setLevel('info')
  logger.setJsonOnly(false)
  logger.setNdjson(false)
  logger.setJsonCompact(false)
  logger.setNoEmoji(true)
  logger.setTimestamps(false)
  logger.setRedactors([])
  setColorMode('never')
}

// Silence console output during tests unless a test spies on it explicitly
beforeEach(() => {
  resetLogger()
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'error').mockImplementation(() => {})
  vi.spyOn(console, 'debug').mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
  resetLogger()
})
