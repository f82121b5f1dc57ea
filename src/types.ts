// ---------------------------------------------------------------------------
// Pipeline result types.
//
// Every result is built incrementally while its pipeline runs and returned
// once; callers never receive a partially filled result.
// ---------------------------------------------------------------------------

import type {DumpFailureReason} from './errors.js'

// -- Building blocks --------------------------------------------------------

/** Which stages of one pipeline run ran, and whether they succeeded. */
export type StageSummary = {
  id: string;
  ran: boolean;
  ok: boolean;
  /** Path the stage produced, when it has one. */
  artifact?: string;
  durationMs?: number;
}

/**
 * Outcome of an optional stage whose failure does not abort its pipeline.
 */
export type StageOutcome =
  | {ok: true; path: string}
  | {ok: false; error: Error}

// -- Build-Align-Sign -------------------------------------------------------

export type BuildResult = {
  sourceDir: string;
  outputPath: string;
  aligned: boolean;
  signed: boolean;
  /** Undefined when verification was not attempted. */
  verified?: boolean;
  /** True when the debug keystore was created during this run. */
  keystoreGenerated: boolean;
  /** Keystore used to sign, when signing ran. */
  keystorePath?: string;
  stages: StageSummary[];
}

// -- Decompile --------------------------------------------------------------

export type DecompileResult = {
  apkPath: string;
  outputDir: string;
  /** Undefined when Java extraction was not requested. */
  java?: StageOutcome;
  /** Undefined when smali extraction was not requested. */
  smali?: StageOutcome;
  javaSuccess: boolean;
  smaliSuccess: boolean;
  stages: StageSummary[];
}

// -- Split-Merge ------------------------------------------------------------

/**
 * APK files of one split application: one base plus its splits, each list
 * in directory order.
 */
export type SplitArtifacts = {
  base: string;
  splits: string[];
}

export type MergeResult = {
  inputDir: string;
  outputPath: string;
  artifacts: SplitArtifacts;
  /** True when an existing file at the output path was removed first. */
  replacedExisting: boolean;
  stages: StageSummary[];
}

// -- Instrumentation --------------------------------------------------------

/** How the app was started before the dump. */
export type StartMode = 'manual' | 'auto' | 'auto-fallback-manual' | 'skipped'

export type DumpResult = {
  packageName: string;
  /** Raw dump as read from the device. */
  dumpPath: string;
  /** Indented JSON copy, present only when the dump parsed as JSON. */
  jsonPath?: string;
  bytes: number;
}

export type DumpFailure = {
  reason: DumpFailureReason;
  message: string;
}

export type InstrumentationResult = {
  packageName: string;
  originalApk: string;
  signedApk: string;
  /** Frameworks found in the input APK; empty when detection was skipped. */
  frameworks: string[];
  build: BuildResult;
  installed: boolean;
  start: StartMode;
  dump?: DumpResult;
  dumpError?: DumpFailure;
}
