import {access, readdir, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {StagingError} from '../../errors.js'
import {StagingArea, withStagingArea} from '../staging.js'
import {createTmpDir} from '../../__tests__/helpers.js'

test('withStagingArea removes the area after a normal return', async t => {
  const root = await createTmpDir()
  const seen = await withStagingArea('build-', async area => {
    await writeFile(area.file('built.apk'), 'x')
    return area.path
  }, {root})

  t.true(seen.startsWith(join(root, 'build-')))
  await t.throwsAsync(access(seen))
  t.deepEqual(await readdir(root), [])
})

test('withStagingArea removes the area and rethrows when fn fails', async t => {
  const root = await createTmpDir()
  let path = ''
  const error = await t.throwsAsync(withStagingArea('build-', async area => {
    path = area.path
    await writeFile(area.file('partial.apk'), 'x')
    throw new Error('stage failed')
  }, {root}))

  t.is(error?.message, 'stage failed')
  await t.throwsAsync(access(path))
})

test('concurrent staging areas are distinct', async t => {
  const root = await createTmpDir()
  const paths = await Promise.all([1, 2, 3].map(async () => withStagingArea('run-', async area => area.path, {root})))
  t.is(new Set(paths).size, 3)
})

test('StagingArea.file rejects traversal and absolute paths', t => {
  const area = new StagingArea('/tmp/area')
  t.is(area.file('decoded/apktool.yml'), '/tmp/area/decoded/apktool.yml')
  t.throws(() => area.file('../outside.apk'), {instanceOf: StagingError})
  t.throws(() => area.file('/etc/passwd'), {instanceOf: StagingError})
})

test('withStagingArea reports a root it cannot create in', async t => {
  await t.throwsAsync(withStagingArea('x-', async () => undefined, {root: '/nonexistent/droidsmith'}), {instanceOf: StagingError})
})
