/**
 * Library entry point.
 *
 * The engine runs external tools behind validation gates and staging areas;
 * the core composes them into the build, decompile, merge, instrument and
 * dump pipelines.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {BuildPipeline, ConsoleReporter, ExecaToolRunner, SystemToolLocator, droidsmithHome, loadConfig, resolveSettings} from 'droidsmith'
 *
 * const home = droidsmithHome()
 * const settings = resolveSettings(await loadConfig(home), {home})
 * const pipeline = new BuildPipeline({
 *   runner: new ExecaToolRunner(),
 *   tools: new SystemToolLocator(settings),
 *   reporter: new ConsoleReporter(),
 *   settings
 * })
 *
 * const result = await pipeline.run({sourceDir: './app-decoded', verify: true})
 * console.log(result.outputPath, result.verified)
 * ```
 */

export * from './engine/index.js'
export * from './core/index.js'
export * from './errors.js'
export * from './types.js'
