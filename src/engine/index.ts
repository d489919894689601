export {StageRunner, type LogLine, type OnLogLine, type RunStageRequest, type RunStageResult} from './stage-runner.js'
export {ShellStageRunner, type ShellStageRunnerOptions} from './shell-runner.js'
export {LocalFileAccess, type FileAccess} from './file-access.js'
