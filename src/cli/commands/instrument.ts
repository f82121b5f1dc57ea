import type {Command} from 'commander'
import {InstrumentationWorkflow} from '../../core/instrumentation.js'
import {TerminalPrompt} from '../prompt.js'
import {createDeps, printResult, yesNo} from '../utils.js'

type InstrumentCommandOptions = {
  package?: string;
  output?: string;
  device?: string;
  skipDump?: boolean;
  wait?: boolean;
  force?: boolean;
  rootCheck: boolean;
  format: boolean;
}

export function registerInstrumentCommand(program: Command): void {
  program
    .command('instrument')
    .description('Instrument a Flutter APK with reFlutter, re-sign it, install it and dump its runtime data')
    .argument('<apk>', 'Flutter APK')
    .option('-p, --package <name>', 'Package name (default: read from the APK)')
    .option('-o, --output <dir>', 'Directory for the signed APK and the dump (default: current directory)')
    .option('-d, --device <serial>', 'Target device')
    .option('--skip-dump', 'Stop after installing')
    .option('--wait', 'Wait for you to start the app instead of launching it')
    .option('--force', 'Skip the Flutter check')
    .option('--no-root-check', 'Read the dump without checking for root first')
    .option('--no-format', 'Do not write the JSON copy of the dump')
    .action(async (apk: string, options: InstrumentCommandOptions, cmd: Command) => {
      const {json, ...deps} = await createDeps(cmd)
      const workflow = new InstrumentationWorkflow(deps, {prompt: new TerminalPrompt()})
      const result = await workflow.run({
        apkPath: apk,
        packageName: options.package,
        outputDir: options.output,
        deviceId: options.device,
        skipDump: options.skipDump,
        waitForUser: options.wait,
        force: options.force,
        checkRoot: options.rootCheck,
        format: options.format
      })

      printResult(json, result, [
        ['Package', result.packageName],
        ['Signed APK', result.signedApk],
        ['Installed', yesNo(result.installed)],
        ['Started', result.start],
        ['Dump', result.dump?.dumpPath ?? (result.dumpError ? `failed (${result.dumpError.reason})` : undefined)],
        ['JSON', result.dump?.jsonPath]
      ])
    })
}
