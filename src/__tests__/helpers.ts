import {mkdir, mkdtemp, readFile, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {dirname, join} from 'node:path'
import {ToolRunner, type OnLogLine} from '../engine/executor.js'
import type {ToolInvocation, ToolRunResult} from '../engine/types.js'
import {resolveSettings, type Settings, type ToolName} from '../core/config.js'
import type {PipelineDeps} from '../core/pipeline-run.js'
import type {PipelineEvent, Reporter} from '../core/reporter.js'
import type {ToolLocator} from '../core/tool-locator.js'
import type {UserPrompt} from '../core/instrumentation.js'
import {ToolNotFoundError} from '../errors.js'

/** ZIP local file header followed by filler bytes. */
export const fakeApkBytes = Buffer.concat([Buffer.from([0x50, 0x4B, 0x03, 0x04]), Buffer.from('fake-apk')])

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'droidsmith-test-'))
}

/**
 * Returns a reporter that records every event for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: PipelineEvent[]} {
  const events: PipelineEvent[] = []
  const reporter: Reporter = {
    emit(event) {
      events.push(event)
    }
  }

  return {reporter, events}
}

/** Event names in emission order, with the stage id for stage events. */
export function eventTrail(events: readonly PipelineEvent[]): string[] {
  return events.map(event => ('stage' in event ? `${event.event}:${event.stage.id}` : event.event))
}

export type ToolBehavior = (invocation: ToolInvocation) => Promise<Partial<ToolRunResult> | void> | Partial<ToolRunResult> | void

/**
 * In-process runner: each tool is simulated by a behavior that writes the
 * files the real tool would write. Every invocation is recorded.
 */
export class FakeToolRunner extends ToolRunner {
  readonly calls: ToolInvocation[] = []
  private readonly behaviors = new Map<string, ToolBehavior>()

  on(tool: string, behavior: ToolBehavior): this {
    this.behaviors.set(tool, behavior)
    return this
  }

  /** Makes a tool exit with a code and stderr, writing nothing. */
  fail(tool: string, exitCode = 1, stderr = `${tool}: simulated failure`): this {
    return this.on(tool, () => ({exitCode, stderr}))
  }

  /** Commands run for one tool, in order. */
  commands(tool: string): string[][] {
    return this.calls.filter(call => call.tool === tool).map(call => [...call.command])
  }

  async run(invocation: ToolInvocation, onLogLine?: OnLogLine): Promise<ToolRunResult> {
    this.calls.push(invocation)
    const startedAt = new Date()
    const behavior = this.behaviors.get(invocation.tool)
    const outcome: Partial<ToolRunResult> = {}
    if (behavior) {
      Object.assign(outcome, await behavior(invocation))
    }

    const result: ToolRunResult = {exitCode: 0, stdout: '', stderr: '', ...outcome, startedAt, finishedAt: new Date()}

    for (const line of result.stderr.split('\n').filter(Boolean)) {
      onLogLine?.({stream: 'stderr', line})
    }

    return result
  }
}

/** Value following a flag in a command vector. */
export function argAfter(command: readonly string[], flag: string): string {
  const index = command.indexOf(flag)
  const value = command[index + 1]
  if (index === -1 || value === undefined) {
    throw new Error(`Missing ${flag} in ${command.join(' ')}`)
  }

  return value
}

async function writeArtifact(path: string, content: string | Buffer): Promise<void> {
  await mkdir(dirname(path), {recursive: true})
  await writeFile(path, content)
}

/**
 * Installs behaviors simulating the Android tools on a fake runner.
 * Commands are expected as located by `fixedLocator` (`[tool, ...args]`).
 */
export function simulateAndroidTools(runner: FakeToolRunner): FakeToolRunner {
  return runner
    .on('apktool', async ({command}) => {
      if (command[1] === 'b') {
        await writeArtifact(argAfter(command, '-o'), Buffer.concat([fakeApkBytes, Buffer.from(`built:${command[2]}`)]))
      } else {
        const out = argAfter(command, '-o')
        await mkdir(join(out, 'smali'), {recursive: true})
        await writeFile(join(out, 'apktool.yml'), 'version: 2.9.3\n')
      }
    })
    .on('zipalign', async ({command}) => {
      const [input, output] = command.slice(-2)
      await writeArtifact(output, Buffer.concat([await readFile(input), Buffer.from(':aligned')]))
    })
    .on('apksigner', async ({command}) => {
      if (command[1] === 'verify') {
        return {stdout: 'Verifies'}
      }

      await writeArtifact(argAfter(command, '--out'), Buffer.concat([await readFile(command.at(-1) ?? ''), Buffer.from(':signed')]))
    })
    .on('keytool', async ({command}) => {
      await writeArtifact(argAfter(command, '-keystore'), 'test-keystore')
    })
    .on('jadx', async ({command}) => {
      await mkdir(join(argAfter(command, '-d'), 'sources'), {recursive: true})
    })
    .on('reflutter', async ({cwd}) => {
      await writeArtifact(join(cwd ?? '.', 'release.RE.apk'), fakeApkBytes)
    })
    .on('apkeditor', async ({command}) => {
      await writeArtifact(argAfter(command, '-o'), fakeApkBytes)
    })
    .fail('aapt', 1, 'aapt: unavailable in tests')
}

export type DeviceScript = {
  /** Content of the runtime dump on the device */
  dump?: string;
  uninstall?: Partial<ToolRunResult>;
  install?: Partial<ToolRunResult>;
  launch?: Partial<ToolRunResult>;
  root?: Partial<ToolRunResult>;
  read?: Partial<ToolRunResult>;
}

/**
 * Simulates a rooted device behind adb. Each command answers with its
 * scripted result, or succeeds.
 */
export function simulateDevice(runner: FakeToolRunner, script: DeviceScript = {}): FakeToolRunner {
  return runner.on('adb', ({command}) => {
    if (command.includes('uninstall')) {
      return script.uninstall ?? {stdout: 'Success'}
    }

    if (command.includes('install')) {
      return script.install ?? {stdout: 'Success'}
    }

    if (command.includes('monkey')) {
      return script.launch ?? {stdout: 'Events injected: 1'}
    }

    if (command.at(-1) === 'id') {
      return script.root ?? {stdout: 'uid=0(root) gid=0(root)'}
    }

    return script.read ?? {stdout: script.dump ?? ''}
  })
}

/**
 * Locator resolving every tool to its bare name, except the ones listed as
 * missing.
 */
export function fixedLocator(...missing: ToolName[]): ToolLocator {
  return {
    async command(tool) {
      if (missing.includes(tool)) {
        throw new ToolNotFoundError(tool)
      }

      return [tool]
    }
  }
}

/** Prompt recording the messages it was asked to show. */
export function fakePrompt(): UserPrompt & {messages: string[]} {
  const messages: string[] = []
  return {
    messages,
    async waitForUser(message) {
      messages.push(message)
    }
  }
}

/**
 * Settings rooted in a temporary directory, with no grace period after a
 * launch.
 */
export function testSettings(home: string): Settings {
  const settings = resolveSettings({}, {home, env: {}})
  settings.instrumentation.startGraceMs = 0
  return settings
}

/**
 * Pipeline collaborators for tests: fake runner with simulated tools,
 * recording reporter and a dedicated staging root.
 */
export async function createTestDeps(): Promise<PipelineDeps & {
  tmpDir: string;
  runner: FakeToolRunner;
  events: PipelineEvent[];
  stagingRoot: string;
}> {
  const tmpDir = await createTmpDir()
  const stagingRoot = join(tmpDir, 'staging')
  await mkdir(stagingRoot)
  const {reporter, events} = recordingReporter()
  return {
    tmpDir,
    runner: simulateAndroidTools(new FakeToolRunner()),
    tools: fixedLocator(),
    reporter,
    events,
    settings: testSettings(join(tmpDir, 'home')),
    stagingRoot
  }
}

/** Writes a decoded project directory containing the apktool marker. */
export async function createProject(parent: string, name = 'app'): Promise<string> {
  const dir = join(parent, name)
  await mkdir(join(dir, 'smali'), {recursive: true})
  await writeFile(join(dir, 'apktool.yml'), 'version: 2.9.3\n')
  return dir
}

/** Writes a file starting with the ZIP header. */
export async function createApk(path: string): Promise<string> {
  await writeArtifact(path, fakeApkBytes)
  return path
}

/**
 * Builds an archive that starts with the ZIP header and holds a central
 * directory listing the given entry names. Enough for readers that never
 * open an entry.
 */
export function zipWithEntries(names: readonly string[]): Buffer {
  const records = names.map(name => {
    const fileName = Buffer.from(name, 'utf8')
    const header = Buffer.alloc(46)
    header.writeUInt32LE(0x02_01_4B_50, 0)
    header.writeUInt16LE(20, 4)
    header.writeUInt16LE(20, 6)
    header.writeUInt16LE(fileName.length, 28)
    return Buffer.concat([header, fileName])
  })
  const centralDirectory = Buffer.concat(records)
  const end = Buffer.alloc(22)
  end.writeUInt32LE(0x06_05_4B_50, 0)
  end.writeUInt16LE(names.length, 8)
  end.writeUInt16LE(names.length, 10)
  end.writeUInt32LE(centralDirectory.length, 12)
  end.writeUInt32LE(fakeApkBytes.length, 16)
  return Buffer.concat([fakeApkBytes, centralDirectory, end])
}
