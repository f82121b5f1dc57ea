export {ToolRunner, type LogLine, type OnLogLine} from './executor.js'
export {ExecaToolRunner} from './execa-runner.js'
export {invoke, assertArtifact} from './invoke.js'
export {StagingArea, withStagingArea, type StagingOptions} from './staging.js'
export {FileLock, type LockInfo, type FileLockOptions} from './file-lock.js'
export {
  type ValidationGate,
  zipLocalFileHeader,
  pathExists,
  isFile,
  isDirectory,
  hasExtension,
  zipHeader,
  markerFile,
  containsFiles,
  listFiles,
  checkGates,
  apkGates
} from './gates.js'
export {
  type ToolResolver,
  resolveFirst,
  expandHome,
  findInPath,
  fromPath,
  fromValue,
  isExecutable,
  isRegularFile,
  isDirectoryPath
} from './resolvers.js'
export type {ToolInvocation, ToolRunResult, ExpectedArtifact} from './types.js'
