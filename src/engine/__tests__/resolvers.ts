import {chmod, mkdir, writeFile} from 'node:fs/promises'
import {homedir} from 'node:os'
import {delimiter, join, resolve} from 'node:path'
import test from 'ava'
import {expandHome, findInPath, fromPath, fromValue, isExecutable, resolveFirst} from '../resolvers.js'
import {createTmpDir} from '../../__tests__/helpers.js'

test('resolveFirst returns the first non-empty command', async t => {
  const order: string[] = []
  const command = await resolveFirst([
    async () => {
      order.push('env')
      return undefined
    },
    async () => {
      order.push('config')
      return []
    },
    async () => {
      order.push('path')
      return ['/usr/bin/apktool']
    },
    async () => {
      order.push('unreached')
      return ['other']
    }
  ])

  t.deepEqual(command, ['/usr/bin/apktool'])
  t.deepEqual(order, ['env', 'config', 'path'])
})

test('resolveFirst returns undefined when nothing resolves', async t => {
  t.is(await resolveFirst([async () => undefined]), undefined)
})

test('expandHome expands a leading tilde only', t => {
  t.is(expandHome('~'), resolve(homedir()))
  t.is(expandHome('~/tools/APKEditor.jar'), join(homedir(), 'tools/APKEditor.jar'))
  t.is(expandHome('/opt/~/jar'), '/opt/~/jar')
})

test('findInPath skips non-executable files and returns the first executable', async t => {
  const dir = await createTmpDir()
  const first = join(dir, 'a')
  const second = join(dir, 'b')
  await mkdir(first)
  await mkdir(second)
  await writeFile(join(first, 'zipalign'), 'not executable')
  await writeFile(join(second, 'zipalign'), '#!/bin/sh\n')
  await chmod(join(second, 'zipalign'), 0o755)

  t.false(await isExecutable(join(first, 'zipalign')))
  t.is(await findInPath('zipalign', [first, second].join(delimiter)), join(second, 'zipalign'))
  t.is(await findInPath('apksigner', [first, second].join(delimiter)), undefined)
  t.is(await findInPath('zipalign', undefined), undefined)
})

test('findInPath tries each extension', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, 'apksigner.bat'), '@echo off\n')
  await chmod(join(dir, 'apksigner.bat'), 0o755)

  t.is(await findInPath('apksigner', dir, ['.exe', '.bat']), join(dir, 'apksigner.bat'))
})

test('fromPath and fromValue wrap their lookups', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, 'jadx'), '#!/bin/sh\n')
  await chmod(join(dir, 'jadx'), 0o755)

  t.deepEqual(await fromPath('jadx', dir)(), [join(dir, 'jadx')])
  t.is(await fromPath('adb', dir)(), undefined)
  t.deepEqual(await fromValue('/opt/APKEditor.jar', async value => ['java', '-jar', value])(), ['java', '-jar', '/opt/APKEditor.jar'])
  t.is(await fromValue(undefined, async value => [value])(), undefined)
})
