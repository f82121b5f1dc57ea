import test from 'ava'
import {InvalidArgumentError} from 'commander'
import {formatSize, parsePositive} from '../utils.js'

test('parsePositive accepts positive numbers', t => {
  t.is(parsePositive('90'), 90)
  t.is(parsePositive('0.5'), 0.5)
})

test('parsePositive rejects zero, negatives and text', t => {
  for (const value of ['0', '-3', 'soon', '']) {
    const error = t.throws(() => parsePositive(value), {instanceOf: InvalidArgumentError})
    t.is(error?.message, `Expected a positive number, got: ${value}`)
  }
})

test('formatSize keeps bytes exact and rounds larger sizes to a tenth', t => {
  t.is(formatSize(0), '0 B')
  t.is(formatSize(1023), '1023 B')
  t.is(formatSize(2560), '2.5 KB')
  t.is(formatSize(12 * 1024 * 1024), '12.0 MB')
  t.is(formatSize(5 * 1024 ** 4), '5120.0 GB')
})
