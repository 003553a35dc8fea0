import { cliLogger } from './logger.js'

/**
 * Turn the first SIGINT/SIGTERM into a cancellation request.
 * Files already written stay written; a second signal exits immediately.
 */
export function setupAbortHandler(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController()

  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      process.exit(130)
    }
    cliLogger.warn(`Received ${signal}, stopping after the current file`)
    controller.abort()
  }

  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)

  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onSignal)
      process.off('SIGTERM', onSignal)
    },
  }
}
