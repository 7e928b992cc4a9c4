/**
 * Vitest Test Setup
 *
 * Loaded before every test file. Restores process-wide state (default
 * adapter, namespace, configuration and logger) after each test.
 */

import { afterEach } from 'vitest'
import { config } from 'dotenv'
import { setAdapter } from '../src/adapters/Adapter'
import { resetConfig } from '../src/config'
import { setDefaultNamespace } from '../src/namespaces'
import { noopLogger, setLogger } from '../src/utils/logger'

// Load environment variables from .env file
config()

afterEach(() => {
  setAdapter(null)
  setDefaultNamespace()
  resetConfig()
  setLogger(noopLogger)
})
