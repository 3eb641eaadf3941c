import pino from 'pino'
import type {BaseImageState, PullDecision} from '../engine/build-invocation.js'
import type {LogFileStatus} from '../engine/log-filter.js'
import type {ManifestAction} from '../types.js'

/**
 * Discriminated union of build events.
 *
 * Lifecycle:
 * 1. BUILD_START - Inputs validated, build begins
 * 2. CONTEXT_CREATED - Temporary context directory exists
 * 3. ENTRY_STAGED - Once per manifest entry
 * 4. BASE_IMAGE - Pull decision for the base image
 * 5. BUILD_COMMAND - Engine command line, right before it starts
 * 6. BUILD_FINISHED (exit code 0) OR BUILD_FAILED
 * 7. LOG_READY / LOG_REMOVED / LOG_MISSING - Log bookkeeping
 *    and CLEANUP_FAILED for each removal that failed
 * 8. CONTEXT_REMOVED - Always, on every exit path
 *
 * INTERRUPTED may occur at any point after BUILD_START.
 */
export type BuildStartEvent = {
  event: 'BUILD_START';
  tag: string;
  baseImage?: string;
  entries: number;
}

export type ContextCreatedEvent = {
  event: 'CONTEXT_CREATED';
  path: string;
}

export type EntryStagedEvent = {
  event: 'ENTRY_STAGED';
  destination: string;
  action: ManifestAction;
  path: string;
}

export type BaseImageEvent = {
  event: 'BASE_IMAGE';
  image: string;
  state: BaseImageState;
  notice: PullDecision['notice'];
}

export type BuildCommandEvent = {
  event: 'BUILD_COMMAND';
  command: string;
}

export type BuildFinishedEvent = {
  event: 'BUILD_FINISHED';
  tag: string;
  durationMs: number;
}

export type BuildFailedEvent = {
  event: 'BUILD_FAILED';
  tag: string;
  exitCode: number;
  durationMs?: number;
  reason?: string;
}

export type LogEvent = {
  event: 'LOG_READY' | 'LOG_REMOVED' | 'LOG_MISSING';
  kind: 'complete' | 'specific';
  path: string;
}

export type CleanupFailedEvent = {
  event: 'CLEANUP_FAILED';
  path: string;
  reason: string;
}

export type ContextRemovedEvent = {
  event: 'CONTEXT_REMOVED';
  path: string;
}

export type InterruptedEvent = {
  event: 'INTERRUPTED';
}

export type BuildEvent =
  | BuildStartEvent
  | ContextCreatedEvent
  | EntryStagedEvent
  | BaseImageEvent
  | BuildCommandEvent
  | BuildFinishedEvent
  | BuildFailedEvent
  | LogEvent
  | CleanupFailedEvent
  | ContextRemovedEvent
  | InterruptedEvent

/**
 * Interface for reporting build events. Engine output itself does not go
 * through the reporter: the log multiplexer writes it to the console.
 */
export type Reporter = {
  emit(event: BuildEvent): void;
}

/** Maps a finalization status to the event reporting it. */
export function logStatusEvent(status: LogFileStatus): LogEvent['event'] {
  switch (status) {
    case 'ready': {
      return 'LOG_READY'
    }

    case 'removed': {
      return 'LOG_REMOVED'
    }

    case 'missing': {
      return 'LOG_MISSING'
    }
  }
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Writes to stderr so that stdout carries only the engine output.
 * Suitable for CI/CD environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger: pino.Logger

  constructor(destination: pino.DestinationStream = pino.destination(2)) {
    this.logger = pino({level: 'info'}, destination)
  }

  emit(event: BuildEvent): void {
    switch (event.event) {
      case 'BUILD_FAILED':
      case 'CLEANUP_FAILED': {
        this.logger.error(event)
        break
      }

      case 'INTERRUPTED': {
        this.logger.warn(event)
        break
      }

      default: {
        this.logger.info(event)
      }
    }
  }
}
