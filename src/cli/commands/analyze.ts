import chalk from 'chalk'
import type {Command} from 'commander'
import {analyzeApk} from '../../core/framework-detector.js'
import {getGlobalOptions} from '../utils.js'

type AnalyzeCommandOptions = {
  nativeLibs: boolean;
}

export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze')
    .description('Detect the cross-platform frameworks an APK was built with')
    .argument('<apk>', 'APK file')
    .option('--no-native-libs', 'Leave out the native library listing')
    .action(async (apk: string, options: AnalyzeCommandOptions, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const analysis = await analyzeApk(apk, {nativeLibraries: options.nativeLibs})

      if (json) {
        console.log(JSON.stringify(analysis, null, 2))
        return
      }

      if (analysis.frameworks.length === 0) {
        console.log(chalk.yellow('No frameworks detected'))
      } else {
        console.log(chalk.bold('Frameworks:'))
        for (const framework of analysis.frameworks) {
          console.log(`  ${chalk.cyan(framework.name)}`)
          for (const evidence of framework.evidence) {
            console.log(chalk.gray(`    - ${evidence}`))
          }
        }
      }

      const libraries = analysis.nativeLibraries ?? []
      if (libraries.length > 0) {
        console.log(chalk.bold(`\nNative libraries (${libraries.length}):`))
        for (const library of libraries) {
          console.log(`  ${library}`)
        }
      }
    })
}
