export {BuildContext, withBuildContext, type BuildContextHooks} from './build-context.js'
export {ContextStager, type OnEntryStaged} from './context-stager.js'
export {TemplateRenderer, isTemplateContext} from './renderer.js'
export {
  createInvocation,
  buildCommandArgs,
  formatCommand,
  resolvePullPolicy,
  type BuildInvocation,
  type BuildInvocationInit,
  type BaseImageState,
  type PullDecision
} from './build-invocation.js'
export {BuildExecutor, type BuildProcess} from './executor.js'
export {DockerCliExecutor, dockerCliEnv} from './docker-executor.js'
export {BuildInvoker, type InvocationResult} from './build-invoker.js'
export {LogMultiplexer, type ConsoleSink} from './log-multiplexer.js'
export {createLogArtifact, formatLogTimestamp, type LogArtifact} from './log-artifact.js'
export {finalizeLogs, extractSpecificLines, specificLogPattern, type LogFinalization, type LogFileStatus} from './log-filter.js'
