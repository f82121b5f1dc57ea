import {access, readFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {SignError} from '../../errors.js'
import {DebugKeystoreProvider} from '../keystore.js'
import {PipelineRun} from '../pipeline-run.js'
import {createTestDeps, eventTrail, fixedLocator} from '../../__tests__/helpers.js'

test('the debug keystore is generated once and reused', async t => {
  const deps = await createTestDeps()
  const provider = new DebugKeystoreProvider(deps.runner, deps.tools, deps.settings.keystore)
  const run = PipelineRun.start(deps.reporter, 'build', 'app')

  const first = await provider.provision(run)
  const second = await provider.provision(run)

  const keystore = join(deps.tmpDir, 'home', 'debug.keystore')
  t.true(first.generated)
  t.false(second.generated)
  t.deepEqual(first.identity, {keystore, alias: 'androiddebugkey', storePassword: 'android', keyPassword: 'android'})
  t.deepEqual(second.identity, first.identity)
  t.is(await readFile(keystore, 'utf8'), 'test-keystore')
  t.is(deps.runner.commands('keytool').length, 1)
  t.deepEqual(eventTrail(deps.events), ['PIPELINE_START', 'STAGE_STARTING:keystore', 'STAGE_FINISHED:keystore', 'STAGE_SKIPPED:keystore'])
  await t.throwsAsync(access(`${keystore}.lock`))
})

test('keytool receives the configured identity', async t => {
  const deps = await createTestDeps()
  const provider = new DebugKeystoreProvider(deps.runner, deps.tools, deps.settings.keystore)
  await provider.provision(PipelineRun.start(deps.reporter, 'build', 'app'), 60)

  const keystore = join(deps.tmpDir, 'home', 'debug.keystore')
  t.deepEqual(deps.runner.commands('keytool'), [[
    'keytool',
    '-genkey',
    '-v',
    '-keystore',
    keystore,
    '-alias',
    'androiddebugkey',
    '-keyalg',
    'RSA',
    '-keysize',
    '2048',
    '-validity',
    '10000',
    '-storepass',
    'android',
    '-keypass',
    'android',
    '-dname',
    'CN=Debug, OU=Debug, O=Debug, L=Debug, ST=Debug, C=US'
  ]])
  t.is(deps.runner.calls[0]?.timeoutSec, 60)
})

test('concurrent first use generates the keystore once', async t => {
  const deps = await createTestDeps()
  const provider = new DebugKeystoreProvider(deps.runner, deps.tools, deps.settings.keystore, {pollMs: 10})
  const run = PipelineRun.start(deps.reporter, 'build', 'app')

  const results = await Promise.all([provider.provision(run), provider.provision(run)])

  t.deepEqual(results.map(result => result.generated).sort(), [false, true])
  t.is(deps.runner.commands('keytool').length, 1)
})

test('a missing keytool fails with SignError', async t => {
  const deps = await createTestDeps()
  const provider = new DebugKeystoreProvider(deps.runner, fixedLocator('keytool'), deps.settings.keystore)

  const error = await t.throwsAsync(provider.provision(PipelineRun.start(deps.reporter, 'build', 'app')), {instanceOf: SignError})
  t.is(error?.reason, 'unresolved')
  t.is(error?.stage, 'keystore')
  t.is(error?.message, 'Failed to generate debug keystore: Required tool not found: keytool')
})

test('a keytool failure leaves no keystore behind', async t => {
  const deps = await createTestDeps()
  deps.runner.fail('keytool', 1, 'keytool error: java.lang.Exception')
  const provider = new DebugKeystoreProvider(deps.runner, deps.tools, deps.settings.keystore)

  const error = await t.throwsAsync(provider.provision(PipelineRun.start(deps.reporter, 'build', 'app')), {instanceOf: SignError})
  t.is(error?.reason, 'exit')
  await t.throwsAsync(access(provider.keystorePath))
})
