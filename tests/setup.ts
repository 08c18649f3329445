import { afterEach, beforeEach, vi } from 'vitest'
import { logger } from '../src/utils/logger'
import { setColorMode } from '../src/utils/colors'

// Silence console output during tests unless a test captures it explicitly
beforeEach(() => {
  setColorMode('never')
  logger.setLevel('info')
  logger.setNoEmoji(true)
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'error').mockImplementation(() => {})
  vi.spyOn(console, 'debug').mockImplementation(() => {})
})

afterEach(() => {
  logger.setRedactors([])
  logger.setFile(undefined)
  logger.setJsonOnly(false)
  logger.setTimestamps(false)
  vi.restoreAllMocks()
})
