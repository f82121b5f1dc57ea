import {mkdir, readFile, utimes, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import process from 'node:process'
import test from 'ava'
import {LockTimeoutError} from '../../errors.js'
import {FileLock} from '../file-lock.js'
import {createTmpDir} from '../../__tests__/helpers.js'

test('acquire writes the holder pid and release removes the file', async t => {
  const dir = await createTmpDir()
  const lockPath = join(dir, 'debug.keystore.lock')
  const lock = await FileLock.acquire(lockPath)

  t.is(await readFile(lockPath, 'utf8'), JSON.stringify(lock.info))
  t.is(lock.info.pid, process.pid)

  await lock.release()
  await lock.release()
  t.is(await FileLock.check(lockPath), undefined)
})

test('acquire times out while a live process holds the lock', async t => {
  const dir = await createTmpDir()
  const lockPath = join(dir, 'held.lock')
  const held = await FileLock.acquire(lockPath)

  const error = await t.throwsAsync(FileLock.acquire(lockPath, {timeoutMs: 150, pollMs: 20}), {instanceOf: LockTimeoutError})
  t.is(error?.holderPid, process.pid)
  t.is(error?.code, 'LOCK_TIMEOUT')
  await held.release()
})

test('a second acquire succeeds once the holder releases', async t => {
  const dir = await createTmpDir()
  const lockPath = join(dir, 'handoff.lock')
  const first = await FileLock.acquire(lockPath)
  const second = FileLock.acquire(lockPath, {timeoutMs: 2000, pollMs: 10})
  setTimeout(() => {
    void first.release()
  }, 50)

  const lock = await second
  t.is(lock.info.pid, process.pid)
  await lock.release()
})

test('a lock left by a dead process is reclaimed', async t => {
  const dir = await createTmpDir()
  const lockPath = join(dir, 'stale.lock')
  await writeFile(lockPath, JSON.stringify({pid: 2_147_483_646, acquiredAt: '2020-01-01T00:00:00.000Z'}))

  const lock = await FileLock.acquire(lockPath, {timeoutMs: 100})
  t.is(lock.info.pid, process.pid)
  await lock.release()
})

test('a recent malformed lock counts as held', async t => {
  const dir = await createTmpDir()
  const lockPath = join(dir, 'writing.lock')
  await writeFile(lockPath, '')

  const holder = await FileLock.check(lockPath)
  t.is(holder?.pid, 0)
})

test('an old malformed lock is removed', async t => {
  const dir = await createTmpDir()
  const lockPath = join(dir, 'garbage.lock')
  await writeFile(lockPath, 'not json')
  const old = new Date(Date.now() - 60_000)
  await utimes(lockPath, old, old)

  t.is(await FileLock.check(lockPath), undefined)
  const lock = await FileLock.acquire(lockPath, {timeoutMs: 100})
  await lock.release()
  t.pass()
})

test('a lock path that cannot be read fails instead of waiting', async t => {
  const dir = await createTmpDir()
  const lockPath = join(dir, 'occupied.lock')
  await mkdir(lockPath)

  await t.throwsAsync(FileLock.acquire(lockPath, {timeoutMs: 200, pollMs: 10}), {code: 'EISDIR'})
  await t.throwsAsync(FileLock.check(lockPath), {code: 'EISDIR'})
})
