import test from 'ava'
import {AdbCommands} from '../adb.js'
import {fixedLocator} from '../../__tests__/helpers.js'

const device = new AdbCommands(fixedLocator(), {deviceId: 'emulator-5554', timeoutSec: 30})
const anyDevice = new AdbCommands(fixedLocator(), {timeoutSec: 30})

test('every command targets the selected device', async t => {
  t.deepEqual(await device.uninstall('com.example.shop')(), {
    tool: 'adb',
    command: ['adb', '-s', 'emulator-5554', 'uninstall', 'com.example.shop'],
    timeoutSec: 30,
    check: false
  })
  t.deepEqual((await device.install('/tmp/app.apk')()).command, ['adb', '-s', 'emulator-5554', 'install', '/tmp/app.apk'])
  t.is(device.deviceId, 'emulator-5554')
})

test('commands without a device leave the choice to adb', async t => {
  t.deepEqual((await anyDevice.install('/tmp/app.apk', {replace: true})()).command, ['adb', 'install', '-r', '/tmp/app.apk'])
  t.deepEqual((await anyDevice.launch('com.example.shop')()).command, [
    'adb',
    'shell',
    'monkey',
    '-p',
    'com.example.shop',
    '-c',
    'android.intent.category.LAUNCHER',
    '1'
  ])
  t.is(anyDevice.deviceId, undefined)
})

test('root commands go through su', async t => {
  const rootCheck = await anyDevice.rootCheck()()
  t.deepEqual(rootCheck.command, ['adb', 'shell', 'su', '-c', 'id'])
  t.is(rootCheck.check, undefined)
  t.deepEqual((await anyDevice.readFile('/data/data/com.example.shop/dump.dart')()).command, [
    'adb',
    'shell',
    'su',
    '-c',
    '\'cat /data/data/com.example.shop/dump.dart\''
  ])
})
