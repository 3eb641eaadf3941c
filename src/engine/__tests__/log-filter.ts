import {access, mkdir, readFile, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {extractSpecificLines, finalizeLogs, specificLogPattern} from '../log-filter.js'
import {createLogArtifact} from '../log-artifact.js'
import {CleanupError} from '../../errors.js'
import {createTmpDir} from '../../__tests__/helpers.js'

async function artifactIn() {
  const dir = await createTmpDir()
  return createLogArtifact(dir, 'app:1', new Date(Date.UTC(2024, 0, 1)))
}

test('specificLogPattern matches a bracketed timestamp anywhere in the line', t => {
  t.true(specificLogPattern.test('[2024-01-01_00-00-00] start'))
  t.true(specificLogPattern.test('#5 0.3 [2024-12-31_23-59-59] step'))
  t.false(specificLogPattern.test('2024-01-01_00-00-00 no brackets'))
  t.false(specificLogPattern.test('[2024-01-01 00:00:00] wrong separators'))
})

test('finalizeLogs keeps only marked lines in the specific log', async t => {
  const artifact = await artifactIn()
  await writeFile(artifact.completeLogPath, '[2024-01-01_00-00-00] start\nnoise\n[2024-01-01_00-00-05] done\n')
  const result = await finalizeLogs(artifact, 0)
  t.is(await readFile(artifact.specificLogPath, 'utf8'), '[2024-01-01_00-00-00] start\n[2024-01-01_00-00-05] done\n')
  t.is(await readFile(artifact.completeLogPath, 'utf8'), '[2024-01-01_00-00-00] start\nnoise\n[2024-01-01_00-00-05] done\n')
  t.deepEqual(result, {complete: 'ready', specific: 'ready', matches: 2, exitCode: 0, errors: []})
})

test('finalizeLogs removes the specific log when nothing matches', async t => {
  const artifact = await artifactIn()
  await writeFile(artifact.completeLogPath, 'noise\nmore noise\n')
  const result = await finalizeLogs(artifact, 0)
  t.is(result.complete, 'ready')
  t.is(result.specific, 'removed')
  t.is(result.matches, 0)
  await t.throwsAsync(async () => access(artifact.specificLogPath))
})

test('finalizeLogs removes an empty complete log', async t => {
  const artifact = await artifactIn()
  await writeFile(artifact.completeLogPath, '')
  const result = await finalizeLogs(artifact, 0)
  t.is(result.complete, 'removed')
  t.is(result.specific, 'missing')
  await t.throwsAsync(async () => access(artifact.completeLogPath))
  await t.throwsAsync(async () => access(artifact.specificLogPath))
})

test('finalizeLogs reports a missing complete log', async t => {
  const artifact = await artifactIn()
  const result = await finalizeLogs(artifact, 0)
  t.deepEqual(result, {complete: 'missing', specific: 'missing', matches: 0, exitCode: 0, errors: []})
})

test('finalizeLogs keeps a non-zero build exit code', async t => {
  const artifact = await artifactIn()
  await writeFile(artifact.completeLogPath, 'error: step failed\n')
  const result = await finalizeLogs(artifact, 17)
  t.is(result.exitCode, 17)
})

// -- cleanup failures --------------------------------------------------------

test('finalizeLogs turns a successful build into exit code 1 when a removal fails', async t => {
  const artifact = await artifactIn()
  await writeFile(artifact.completeLogPath, 'noise\n')
  // A directory cannot be unlinked
  await mkdir(artifact.specificLogPath)
  const result = await finalizeLogs(artifact, 0)
  t.is(result.exitCode, 1)
  t.is(result.errors.length, 1)
  t.true(result.errors[0] instanceof CleanupError)
  t.is(result.errors[0].path, artifact.specificLogPath)
  t.is(result.errors[0].message, `Could not remove '${artifact.specificLogPath}'`)
})

test('finalizeLogs keeps a failed build exit code when a removal fails', async t => {
  const artifact = await artifactIn()
  await writeFile(artifact.completeLogPath, 'noise\n')
  await mkdir(artifact.specificLogPath)
  const result = await finalizeLogs(artifact, 17)
  t.is(result.exitCode, 17)
  t.is(result.errors.length, 1)
})

test('finalizeLogs records a specific log that cannot be written', async t => {
  const artifact = await artifactIn()
  await writeFile(artifact.completeLogPath, '[2024-01-01_00-00-00] start\n')
  await mkdir(artifact.specificLogPath)
  const result = await finalizeLogs(artifact, 0)
  t.is(result.complete, 'ready')
  t.is(result.specific, 'missing')
  t.is(result.exitCode, 1)
  t.is(result.errors[0].message, `Could not write '${artifact.specificLogPath}'`)
})

test('extractSpecificLines creates no file without a match', async t => {
  const dir = await createTmpDir()
  const input = join(dir, 'in.log')
  const output = join(dir, 'out.log')
  await writeFile(input, 'noise\n')
  t.is(await extractSpecificLines(input, output), 0)
  await t.throwsAsync(async () => access(output))
})

test('extractSpecificLines accepts a custom pattern', async t => {
  const dir = await createTmpDir()
  const input = join(dir, 'in.log')
  const output = join(dir, 'out.log')
  await writeFile(input, 'INFO a\nWARN b\nINFO c')
  const matches = await extractSpecificLines(input, output, /^WARN/)
  t.is(matches, 1)
  t.is(await readFile(output, 'utf8'), 'WARN b\n')
})
