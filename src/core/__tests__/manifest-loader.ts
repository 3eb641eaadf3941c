import {mkdir, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {ManifestLoader, createdLabel, readContextFile, toStringRecord} from '../manifest-loader.js'
import {ValidationError} from '../../errors.js'
import {createTmpDir} from '../../__tests__/helpers.js'

const fixedNow = () => new Date(Date.UTC(2024, 0, 2, 3, 4, 5))
const loader = new ManifestLoader(fixedNow)

test('load parses a YAML build file', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, 'imgkiln.yml'), [
    'tag: myrepo/tooling:dev',
    'baseImage: ubuntu:22.04',
    'buildArgs:',
    '  REQUESTED_USER: dev',
    '  UID: 1000',
    'files:',
    '  Dockerfile:',
    '    render: Dockerfile.hbs',
    '    context: {user: dev, packages: [git, curl]}',
    '  entrypoint.sh: {copy: entrypoint.sh, executable: true}',
    '  scripts: {copyDir: scripts}',
    '  workspace: {createDir: true}',
    '  .env: {createFile: true}',
    ''
  ].join('\n'))

  const definition = await loader.load(join(dir, 'imgkiln.yml'))
  t.is(definition.tag, 'myrepo/tooling:dev')
  t.is(definition.baseImage, 'ubuntu:22.04')
  t.is(definition.buildFile, 'Dockerfile')
  t.is(definition.root, dir)
  t.deepEqual(definition.buildArgs, {REQUESTED_USER: 'dev', UID: '1000'})
  t.deepEqual(definition.labels, {[createdLabel]: '2024-01-02T03:04:05.000Z'})
  t.deepEqual(definition.entries, {
    Dockerfile: {action: 'render', source: join(dir, 'Dockerfile.hbs'), context: {user: 'dev', packages: ['git', 'curl']}, executable: false},
    'entrypoint.sh': {action: 'copy', source: join(dir, 'entrypoint.sh'), executable: true},
    scripts: {action: 'copy-dir', source: join(dir, 'scripts')},
    workspace: {action: 'create-dir'},
    '.env': {action: 'create-file', executable: false}
  })
})

test('parse accepts JSON build files', async t => {
  const definition = await loader.parse(JSON.stringify({
    tag: 'app:1',
    buildFile: 'build/Dockerfile',
    labels: {team: 'ops'},
    files: {'build/Dockerfile': {copy: '/abs/Dockerfile'}}
  }), '/project/imgkiln.json')
  t.is(definition.buildFile, 'build/Dockerfile')
  t.is(definition.baseImage, undefined)
  t.deepEqual(definition.entries, {'build/Dockerfile': {action: 'copy', source: '/abs/Dockerfile', executable: false}})
  t.deepEqual(definition.labels, {team: 'ops', [createdLabel]: '2024-01-02T03:04:05.000Z'})
})

test('parse keeps an explicit created label', async t => {
  const definition = await loader.parse(`tag: app\nlabels:\n  ${createdLabel}: fixed\nfiles:\n  a: {createDir: true}\n`, '/p/imgkiln.yml')
  t.is(definition.labels[createdLabel], 'fixed')
})

test('load throws ValidationError for a missing file', async t => {
  const dir = await createTmpDir()
  const path = join(dir, 'imgkiln.yml')
  const error = await t.throwsAsync(async () => loader.load(path), {instanceOf: ValidationError})
  t.is(error?.message, `Build file '${path}' not found`)
})

test('parse requires a tag', async t => {
  const error = await t.throwsAsync(async () => loader.parse('files:\n  a: {createDir: true}\n', '/p/imgkiln.yml'), {instanceOf: ValidationError})
  t.is(error?.message, 'Invalid build file: "tag" is required')
})

test('parse requires a non-empty files mapping', async t => {
  const error = await t.throwsAsync(async () => loader.parse('tag: app\nfiles: {}\n', '/p/imgkiln.yml'), {instanceOf: ValidationError})
  t.is(error?.message, 'Invalid build file: "files" must be a non-empty mapping')
})

test('parse rejects an entry with two actions', async t => {
  const error = await t.throwsAsync(async () => loader.parse('tag: app\nfiles:\n  a: {copy: x, createDir: true}\n', '/p/imgkiln.yml'), {instanceOf: ValidationError})
  t.is(error?.message, 'File \'a\': exactly one of copy, copyDir, render, createFile, createDir is required')
})

test('parse rejects a non-boolean executable flag', async t => {
  const error = await t.throwsAsync(async () => loader.parse('tag: app\nfiles:\n  a: {copy: x, executable: "yes"}\n', '/p/imgkiln.yml'), {instanceOf: ValidationError})
  t.is(error?.message, 'File \'a\': "executable" must be a boolean')
})

test('parse rejects a render entry without context', async t => {
  const error = await t.throwsAsync(async () => loader.parse('tag: app\nfiles:\n  Dockerfile: {render: Dockerfile.hbs}\n', '/p/imgkiln.yml'), {instanceOf: ValidationError})
  t.is(error?.message, 'File \'Dockerfile\': template context can\'t be empty')
})

test('parse rejects a null render context', async t => {
  const error = await t.throwsAsync(async () => loader.parse('tag: app\nfiles:\n  Dockerfile: {render: Dockerfile.hbs, context: null}\n', '/p/imgkiln.yml'), {instanceOf: ValidationError})
  t.is(error?.message, 'File \'Dockerfile\': template context can\'t be empty')
})

test('parse reads contextFiles into the template context', async t => {
  const dir = await createTmpDir()
  await mkdir(join(dir, 'keys'))
  await writeFile(join(dir, 'keys', 'id.pub'), 'ssh-ed25519 AAAA test-key\n')
  const definition = await loader.parse(
    'tag: app\nfiles:\n  authorized_keys:\n    render: keys.hbs\n    context: {user: dev}\n    contextFiles: {key: keys/id.pub}\n',
    join(dir, 'imgkiln.yml')
  )
  t.deepEqual(definition.entries.authorized_keys, {
    action: 'render',
    source: join(dir, 'keys.hbs'),
    context: {user: 'dev', key: 'ssh-ed25519 AAAA test-key\n'},
    executable: false
  })
})

test('readContextFile rejects a blank file', async t => {
  const dir = await createTmpDir()
  const path = join(dir, 'blank.txt')
  await writeFile(path, '  \n')
  const error = await t.throwsAsync(async () => readContextFile(path), {instanceOf: ValidationError})
  t.is(error?.message, `File '${path}' is empty`)
})

test('readContextFile rejects a missing file', async t => {
  const dir = await createTmpDir()
  const path = join(dir, 'missing.txt')
  const error = await t.throwsAsync(async () => readContextFile(path), {instanceOf: ValidationError})
  t.is(error?.message, `File '${path}' not found`)
})

test('parse reports malformed YAML as ValidationError', async t => {
  await t.throwsAsync(async () => loader.parse('tag: [unclosed\n', '/p/imgkiln.yml'), {instanceOf: ValidationError})
})

test('toStringRecord stringifies scalars and rejects nested values', t => {
  t.deepEqual(toStringRecord({A: 1, B: true, C: 'x'}, 'buildArgs'), {A: '1', B: 'true', C: 'x'})
  t.deepEqual(toStringRecord(undefined, 'labels'), {})
  const error = t.throws(() => toStringRecord({A: {nested: 1}}, 'buildArgs'), {instanceOf: ValidationError})
  t.is(error?.message, 'Invalid build file: "buildArgs.A" must be a scalar')
})
