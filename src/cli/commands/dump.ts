import type {Command} from 'commander'
import {DumpService} from '../../core/dump-service.js'
import {createDeps, formatSize, printResult} from '../utils.js'

type DumpCommandOptions = {
  output?: string;
  device?: string;
  rootCheck: boolean;
  format: boolean;
}

export function registerDumpCommand(program: Command): void {
  program
    .command('dump')
    .description('Read the runtime dump of an instrumented app from the device')
    .argument('<package>', 'Package name')
    .option('-o, --output <path>', 'Dump file (default: ./<package>_dump.dart)')
    .option('-d, --device <serial>', 'Target device')
    .option('--no-root-check', 'Read without checking for root first')
    .option('--no-format', 'Do not write the JSON copy')
    .action(async (packageName: string, options: DumpCommandOptions, cmd: Command) => {
      const {json, ...deps} = await createDeps(cmd)
      const result = await new DumpService(deps).dump({
        packageName,
        outputPath: options.output,
        deviceId: options.device,
        checkRoot: options.rootCheck,
        format: options.format
      })

      printResult(json, result, [
        ['Dump', `${result.dumpPath} (${formatSize(result.bytes)})`],
        ['JSON', result.jsonPath]
      ])
    })
}
