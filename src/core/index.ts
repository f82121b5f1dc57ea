export {
  ConfigSchema,
  configFileName,
  debugKeystoreDefaults,
  droidsmithHome,
  instrumentationDefaults,
  loadConfig,
  resolveSettings,
  toolNames,
  type DroidsmithConfig,
  type InstrumentationSettings,
  type KeystoreSettings,
  type Settings,
  type ToolName
} from './config.js'
export {ConsoleReporter, CompositeReporter, silentReporter} from './reporter.js'
export type {
  Reporter,
  StageRef,
  RunContext,
  PipelineName,
  PipelineEvent,
  PipelineStartEvent,
  StageStartingEvent,
  StageLogEvent,
  StageFinishedEvent,
  StageSkippedEvent,
  StageFailedEvent,
  PipelineWarningEvent,
  PipelineFinishedEvent,
  PipelineFailedEvent
} from './reporter.js'
export {PipelineRun, type PipelineDeps, type ToolStage, type ArtifactStage, type FailureMapper} from './pipeline-run.js'
export {findAndroidHome, findBuildTools, parseVersion, compareVersions, minBuildToolsVersion} from './android-sdk.js'
export {SystemToolLocator, installHints, jarCommand, toolCall, apkeditorEnvVar, type ToolLocator} from './tool-locator.js'
export {DebugKeystoreProvider, type SigningIdentity, type ProvisionedIdentity} from './keystore.js'
export {BuildPipeline, defaultBuildOutput, projectMarker, type BuildOptions} from './build-pipeline.js'
export {DecompilePipeline, defaultDecompileOutput, type DecompileOptions} from './decompile-pipeline.js'
export {MergePipeline, defaultMergeOutput, type MergeOptions} from './merge-pipeline.js'
export {classifySplits, isSplitName, readSplitDirectory} from './split-artifacts.js'
export {
  ZipFrameworkDetector,
  analyzeApk,
  frameworkSignatures,
  listZipEntries,
  matchFrameworks,
  type AnalyzeOptions,
  type FrameworkAnalysis,
  type FrameworkDetector,
  type FrameworkMatch,
  type FrameworkReport
} from './framework-detector.js'
export {PackageResolver, packageFromFilename, parseBadging, type ResolvedPackage} from './package-resolver.js'
export {AdbCommands, launcherCategory, type AdbOptions} from './adb.js'
export {DumpService, assertPackageName, defaultDumpOutput, formatJson, jsonCopyPath, type DumpOptions} from './dump-service.js'
export {
  InstrumentationWorkflow,
  signedApkName,
  type InstrumentOptions,
  type InstrumentationCollaborators,
  type UserPrompt
} from './instrumentation.js'
