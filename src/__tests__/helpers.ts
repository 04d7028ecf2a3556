import {mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import type {BuildEvent, Reporter} from '../cli/reporter.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'jobsub-test-'))
}

/**
 * Reporter that drops every event.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */}
}

/**
 * Returns a reporter that records emit() calls for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: BuildEvent[]} {
  const events: BuildEvent[] = []
  const reporter: Reporter = {
    emit(event: BuildEvent) {
      events.push(event)
    }
  }

  return {reporter, events}
}
