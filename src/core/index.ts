export {BuildRunner, type BuildRunnerOptions, type BuildOutcome} from './build-runner.js'
export {Manifest, entryMode, executableMode, dataFileMode} from './manifest.js'
export {ManifestLoader, parseBuildFile, readContextFile, toStringRecord, createdLabel} from './manifest-loader.js'
export {isValidImageReference, assertImageReference, sanitizeTag} from './image-reference.js'
export {ConsoleReporter, logStatusEvent} from './reporter.js'
export type {
  Reporter,
  BuildEvent,
  BuildStartEvent,
  ContextCreatedEvent,
  EntryStagedEvent,
  BaseImageEvent,
  BuildCommandEvent,
  BuildFinishedEvent,
  BuildFailedEvent,
  LogEvent,
  CleanupFailedEvent,
  ContextRemovedEvent,
  InterruptedEvent
} from './reporter.js'
export {isRecord, formatDuration, parseKeyValues} from './utils.js'
