import test from 'ava'
import {ValidationError} from '../../errors.js'
import {formatDuration, isRecord, parseKeyValues} from '../utils.js'

test('isRecord accepts plain objects only', t => {
  t.true(isRecord({a: 1}))
  t.false(isRecord([1]))
  t.false(isRecord(null))
  t.false(isRecord(new Date()))
})

test('formatDuration: milliseconds, seconds, minutes', t => {
  t.is(formatDuration(250), '250ms')
  t.is(formatDuration(1500), '1.5s')
  t.is(formatDuration(125_000), '2m 5s')
})

test('parseKeyValues splits on the first equals sign', t => {
  t.deepEqual(parseKeyValues(['USER=dev', 'OPTS=a=b', 'EMPTY='], '--build-arg'), {USER: 'dev', OPTS: 'a=b', EMPTY: ''})
})

test('parseKeyValues returns an empty record for no values', t => {
  t.deepEqual(parseKeyValues(undefined, '--label'), {})
})

test('parseKeyValues rejects values without a key', t => {
  const error = t.throws(() => parseKeyValues(['=x'], '--build-arg'), {instanceOf: ValidationError})
  t.is(error?.message, '--build-arg expects KEY=VALUE, got \'=x\'')
  t.throws(() => parseKeyValues(['novalue'], '--label'), {instanceOf: ValidationError})
})
