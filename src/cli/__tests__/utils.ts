import {writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {collect, resolveBuildFile} from '../utils.js'
import {ValidationError} from '../../errors.js'
import {createTmpDir} from '../../__tests__/helpers.js'

test('collect accumulates repeated option values', t => {
  t.deepEqual(collect('b=2', collect('a=1')), ['a=1', 'b=2'])
})

test('resolveBuildFile returns a file path as is', async t => {
  const dir = await createTmpDir()
  const file = join(dir, 'custom.yml')
  await writeFile(file, 'tag: app\n')
  t.is(await resolveBuildFile(file), file)
})

test('resolveBuildFile finds the build file in a directory', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, 'imgkiln.json'), '{}')
  await writeFile(join(dir, 'imgkiln.yaml'), '')
  t.is(await resolveBuildFile(dir), join(dir, 'imgkiln.yaml'))
})

test('resolveBuildFile throws when no build file is present', async t => {
  const dir = await createTmpDir()
  const error = await t.throwsAsync(async () => resolveBuildFile(dir), {instanceOf: ValidationError})
  t.is(error?.message, `No build file found in ${dir}. Expected one of: imgkiln.yml, imgkiln.yaml, imgkiln.json`)
})

test('resolveBuildFile throws for a missing path', async t => {
  const dir = await createTmpDir()
  const missing = join(dir, 'nope')
  const error = await t.throwsAsync(async () => resolveBuildFile(missing), {instanceOf: ValidationError})
  t.is(error?.message, `Path does not exist: ${missing}`)
})
