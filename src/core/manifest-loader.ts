import {readFile} from 'node:fs/promises'
import {dirname, extname, isAbsolute, resolve} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {ValidationError} from '../errors.js'
import {isRecord} from './utils.js'
import type {BuildDefinition, ManifestEntry, TemplateContext, TemplateValue} from '../types.js'

export const createdLabel = 'org.opencontainers.image.created'

/**
 * Loads a build file (YAML or JSON) into a BuildDefinition.
 *
 * Paths in the file are relative to the file's directory. Template
 * variables can be given inline (`context`) or read from text files
 * (`contextFiles`); a missing or blank context file is rejected.
 *
 * @example
 * ```yaml
 * tag: myrepo/tooling:dev
 * baseImage: ubuntu:22.04
 * buildArgs: {REQUESTED_USER: dev}
 * files:
 *   Dockerfile: {render: Dockerfile.hbs, context: {user: dev}}
 *   entrypoint.sh: {copy: entrypoint.sh, executable: true}
 *   scripts: {copyDir: scripts}
 *   workspace: {createDir: true}
 * ```
 */
export class ManifestLoader {
  constructor(private readonly now: () => Date = () => new Date()) {}

  async load(filePath: string): Promise<BuildDefinition> {
    const absolutePath = resolve(filePath)
    let content: string
    try {
      content = await readFile(absolutePath, 'utf8')
    } catch (error) {
      throw new ValidationError(`Build file '${absolutePath}' not found`, {cause: error})
    }

    return this.parse(content, absolutePath)
  }

  async parse(content: string, filePath: string): Promise<BuildDefinition> {
    let input: unknown
    try {
      input = parseBuildFile(content, filePath)
    } catch (error) {
      throw new ValidationError(`Invalid build file '${filePath}': ${error instanceof Error ? error.message : String(error)}`, {cause: error})
    }

    if (!isRecord(input)) {
      throw new ValidationError(`Invalid build file '${filePath}': expected a mapping`)
    }

    const root = dirname(resolve(filePath))

    if (typeof input.tag !== 'string' || !input.tag.trim()) {
      throw new ValidationError('Invalid build file: "tag" is required')
    }

    if (input.baseImage !== undefined && typeof input.baseImage !== 'string') {
      throw new ValidationError('Invalid build file: "baseImage" must be a string')
    }

    if (input.buildFile !== undefined && (typeof input.buildFile !== 'string' || !input.buildFile)) {
      throw new ValidationError('Invalid build file: "buildFile" must be a non-empty string')
    }

    if (!isRecord(input.files) || Object.keys(input.files).length === 0) {
      throw new ValidationError('Invalid build file: "files" must be a non-empty mapping')
    }

    const entries: Record<string, ManifestEntry> = {}
    for (const [destination, spec] of Object.entries(input.files)) {
      entries[destination] = await this.parseEntry(destination, spec, root)
    }

    const labels = toStringRecord(input.labels, 'labels')
    labels[createdLabel] ??= this.now().toISOString()

    return {
      tag: input.tag.trim(),
      baseImage: input.baseImage?.trim() || undefined,
      buildFile: input.buildFile ?? 'Dockerfile',
      buildArgs: toStringRecord(input.buildArgs, 'buildArgs'),
      labels,
      root,
      entries
    }
  }

  private async parseEntry(destination: string, spec: unknown, root: string): Promise<ManifestEntry> {
    if (!isRecord(spec)) {
      throw new ValidationError(`File '${destination}': expected a mapping`)
    }

    const actions = ['copy', 'copyDir', 'render', 'createFile', 'createDir'].filter(key => spec[key] !== undefined)
    if (actions.length !== 1) {
      throw new ValidationError(`File '${destination}': exactly one of copy, copyDir, render, createFile, createDir is required`)
    }

    const executable = spec.executable ?? false
    if (typeof executable !== 'boolean') {
      throw new ValidationError(`File '${destination}': "executable" must be a boolean`)
    }

    switch (actions[0]) {
      case 'copy': {
        return {action: 'copy', source: sourcePath(spec.copy, destination, root), executable}
      }

      case 'copyDir': {
        return {action: 'copy-dir', source: sourcePath(spec.copyDir, destination, root)}
      }

      case 'render': {
        const context = await this.templateContext(spec, destination, root)
        return {action: 'render', source: sourcePath(spec.render, destination, root), context, executable}
      }

      case 'createFile': {
        return {action: 'create-file', executable}
      }

      default: {
        return {action: 'create-dir'}
      }
    }
  }

  private async templateContext(spec: Record<string, unknown>, destination: string, root: string): Promise<TemplateContext> {
    if (spec.context === null || (spec.context === undefined && spec.contextFiles === undefined)) {
      throw new ValidationError(`File '${destination}': template context can't be empty`)
    }

    const context: TemplateContext = {}
    if (spec.context !== undefined) {
      if (!isRecord(spec.context)) {
        throw new ValidationError(`File '${destination}': template context must be a mapping`)
      }

      for (const [key, value] of Object.entries(spec.context)) {
        context[key] = toTemplateValue(value, `${destination}: context.${key}`)
      }
    }

    if (spec.contextFiles !== undefined) {
      if (!isRecord(spec.contextFiles)) {
        throw new ValidationError(`File '${destination}': "contextFiles" must be a mapping`)
      }

      for (const [key, value] of Object.entries(spec.contextFiles)) {
        context[key] = await readContextFile(sourcePath(value, destination, root))
      }
    }

    return context
  }
}

export function parseBuildFile(content: string, filePath: string): unknown {
  const ext = extname(filePath).toLowerCase()
  if (ext === '.yaml' || ext === '.yml') {
    return parseYaml(content)
  }

  return JSON.parse(content)
}

/**
 * Reads a text file whose content becomes a template variable.
 * @throws {ValidationError} If the file is missing or blank
 */
export async function readContextFile(path: string): Promise<string> {
  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (error) {
    throw new ValidationError(`File '${path}' not found`, {cause: error})
  }

  if (!content.trim()) {
    throw new ValidationError(`File '${path}' is empty`)
  }

  return content
}

function sourcePath(value: unknown, destination: string, root: string): string {
  if (typeof value !== 'string' || !value.trim()) {
    throw new ValidationError(`File '${destination}': source path must be a non-empty string`)
  }

  return isAbsolute(value) ? value : resolve(root, value)
}

function toTemplateValue(value: unknown, path: string): TemplateValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => toTemplateValue(item, `${path}[${index}]`))
  }

  if (isRecord(value)) {
    const result: Record<string, TemplateValue> = {}
    for (const [key, item] of Object.entries(value)) {
      result[key] = toTemplateValue(item, `${path}.${key}`)
    }

    return result
  }

  throw new ValidationError(`${path}: unsupported template value`)
}

/**
 * Build args and labels: scalar values are stringified.
 */
export function toStringRecord(value: unknown, name: string): Record<string, string> {
  if (value === undefined || value === null) {
    return {}
  }

  if (!isRecord(value)) {
    throw new ValidationError(`Invalid build file: "${name}" must be a mapping`)
  }

  const result: Record<string, string> = {}
  for (const [key, item] of Object.entries(value)) {
    if (typeof item !== 'string' && typeof item !== 'number' && typeof item !== 'boolean') {
      throw new ValidationError(`Invalid build file: "${name}.${key}" must be a scalar`)
    }

    result[key] = String(item)
  }

  return result
}
