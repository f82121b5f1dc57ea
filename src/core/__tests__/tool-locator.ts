import {chmod, mkdir, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {ToolNotFoundError} from '../../errors.js'
import {jarCommand, SystemToolLocator, toolCall} from '../tool-locator.js'
import {createTmpDir, fixedLocator} from '../../__tests__/helpers.js'

async function executable(dir: string, name: string): Promise<string> {
  const path = join(dir, name)
  await mkdir(dir, {recursive: true})
  await writeFile(path, '#!/bin/sh\n')
  await chmod(path, 0o755)
  return path
}

test('APKEditor resolves from the environment, then config, then PATH', async t => {
  const dir = await createTmpDir()
  const envJar = join(dir, 'env', 'APKEditor-1.4.jar')
  const configDir = join(dir, 'config')
  await mkdir(join(dir, 'env'))
  await mkdir(configDir)
  await writeFile(envJar, 'jar')
  await writeFile(join(configDir, 'APKEditor.jar'), 'jar')
  const wrapper = await executable(join(dir, 'bin'), 'APKEditor')
  const PATH = join(dir, 'bin')

  const all = new SystemToolLocator({apkeditorPath: configDir, env: {APKEDITOR_JAR: envJar, PATH}, tools: undefined}, 'linux')
  t.deepEqual(await all.command('apkeditor'), ['java', '-jar', envJar])

  const configOnly = new SystemToolLocator({apkeditorPath: configDir, env: {PATH}, tools: undefined}, 'linux')
  t.deepEqual(await configOnly.command('apkeditor'), ['java', '-jar', join(configDir, 'APKEditor.jar')])

  const staleEnv = new SystemToolLocator({env: {APKEDITOR_JAR: join(dir, 'missing.jar'), PATH}, tools: undefined}, 'linux')
  t.deepEqual(await staleEnv.command('apkeditor'), [wrapper])
})

test('a missing APKEditor reports every way to provide it', async t => {
  const locator = new SystemToolLocator({env: {PATH: ''}, tools: undefined}, 'linux')
  const error = await t.throwsAsync(locator.command('apkeditor'), {instanceOf: ToolNotFoundError})
  t.is(error?.message, 'Required tool not found: apkeditor\nInstall: https://github.com/REAndroid/APKEditor (set APKEDITOR_JAR, configure apkeditorPath in config.yml, or add an APKEditor wrapper to PATH)')
})

test('config overrides win over PATH', async t => {
  const dir = await createTmpDir()
  await executable(dir, 'jadx')

  const locator = new SystemToolLocator({env: {PATH: dir}, tools: {jadx: '/opt/jadx/bin/jadx', adb: 'adb-wrapper'}}, 'linux')
  t.deepEqual(await locator.command('jadx'), ['/opt/jadx/bin/jadx'])
  t.deepEqual(await locator.command('adb'), ['adb-wrapper'])
})

test('build-tools binaries come from the newest SDK build-tools', async t => {
  const dir = await createTmpDir()
  const sdk = join(dir, 'sdk')
  await executable(join(sdk, 'build-tools', '30.0.3'), 'zipalign')
  const newest = await executable(join(sdk, 'build-tools', '34.0.0'), 'zipalign')
  const onPath = await executable(join(dir, 'bin'), 'zipalign')

  const locator = new SystemToolLocator({androidHome: sdk, env: {PATH: join(dir, 'bin')}, tools: undefined}, 'linux')
  t.deepEqual(await locator.command('zipalign'), [newest])

  const withoutSdk = new SystemToolLocator({androidHome: join(dir, 'missing'), env: {PATH: join(dir, 'bin')}, tools: undefined}, 'linux')
  t.deepEqual(await withoutSdk.command('zipalign'), [onPath])
})

test('other tools are looked up on PATH and cached', async t => {
  const dir = await createTmpDir()
  const apktool = await executable(dir, 'apktool')
  const locator = new SystemToolLocator({env: {PATH: dir}, tools: undefined}, 'linux')

  const first = await locator.command('apktool')
  t.deepEqual(first, [apktool])
  t.is(await locator.command('apktool'), first)

  const error = await t.throwsAsync(locator.command('adb'), {instanceOf: ToolNotFoundError})
  t.is(error?.tool, 'adb')
  t.is(error?.installHint, 'https://developer.android.com/tools/releases/platform-tools')
})

test('jarCommand accepts a jar or a directory holding APKEditor.jar', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, 'APKEditor.jar'), 'jar')

  t.deepEqual(await jarCommand(join(dir, 'APKEditor.jar')), ['java', '-jar', join(dir, 'APKEditor.jar')])
  t.deepEqual(await jarCommand(dir), ['java', '-jar', join(dir, 'APKEditor.jar')])
  t.is(await jarCommand(join(dir, 'other')), undefined)
})

test('toolCall locates the tool only when called', async t => {
  const call = toolCall(fixedLocator('reflutter'), 'apktool', ['b', 'app'], {timeoutSec: 30})
  t.deepEqual(await call(), {timeoutSec: 30, tool: 'apktool', command: ['apktool', 'b', 'app']})

  const missing = toolCall(fixedLocator('reflutter'), 'reflutter', ['app.apk'])
  await t.throwsAsync(missing(), {instanceOf: ToolNotFoundError})
})
