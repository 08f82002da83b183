import type { ReconciliationPhase } from '@root/types/playlist-sync.types.js'

/**
 * Base class for every failure of a reconciliation run.
 * Carries the phase the run was in when it stopped.
 */
export class ReconciliationError extends Error {
  readonly code: string = 'RECONCILIATION_ERROR'

  constructor(
    message: string,
    public readonly phase: ReconciliationPhase,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'ReconciliationError'

    // Fix prototype chain – important after TS → JS down-emit
    Object.setPrototypeOf(this, new.target.prototype)

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

/**
 * Invalid run configuration, e.g. the stock playlist used as write target.
 * Never retried.
 */
export class ConfigurationError extends ReconciliationError {
  override readonly code = 'CONFIGURATION_ERROR'

  constructor(message: string, phase: ReconciliationPhase) {
    super(message, phase)
    this.name = 'ConfigurationError'
  }
}

/**
 * A paginated listing or batch read failed
 */
export class RemoteFetchError extends ReconciliationError {
  override readonly code = 'REMOTE_FETCH_ERROR'

  constructor(
    message: string,
    phase: ReconciliationPhase,
    public readonly resourceId: string,
    options?: { cause?: unknown },
  ) {
    super(message, phase, options)
    this.name = 'RemoteFetchError'
  }
}

/**
 * A chunk write or removal failed. The target keeps whatever the last
 * successful chunk produced.
 */
export class RemoteWriteError extends ReconciliationError {
  override readonly code = 'REMOTE_WRITE_ERROR'

  constructor(
    message: string,
    phase: ReconciliationPhase,
    public readonly resourceId: string,
    public readonly chunkIndex: number,
    options?: { cause?: unknown },
  ) {
    super(message, phase, options)
    this.name = 'RemoteWriteError'
  }
}

export class ReconciliationCancelledError extends ReconciliationError {
  override readonly code = 'RECONCILIATION_CANCELLED'

  constructor(phase: ReconciliationPhase, options?: { cause?: unknown }) {
    super(`Reconciliation cancelled during ${phase}`, phase, options)
    this.name = 'ReconciliationCancelledError'
  }
}

export class ReconciliationInProgressError extends ReconciliationError {
  override readonly code = 'RECONCILIATION_IN_PROGRESS'

  constructor(public readonly activeRunId: string) {
    super(
      `Reconciliation ${activeRunId} is already running`,
      'ResolvingCollections',
    )
    this.name = 'ReconciliationInProgressError'
  }
}

/**
 * Throws a cancellation error when the caller's signal has fired
 */
export function throwIfCancelled(
  signal: AbortSignal | undefined,
  phase: ReconciliationPhase,
): void {
  if (signal?.aborted) {
    throw new ReconciliationCancelledError(phase, { cause: signal.reason })
  }
}
