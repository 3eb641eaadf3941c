import {chmod, copyFile, cp, mkdir, readdir, stat, writeFile} from 'node:fs/promises'
import type {Stats} from 'node:fs'
import {dirname, isAbsolute, join, relative, resolve, sep} from 'node:path'
import {ImgkilnError, SourceKindMismatchError, SourceNotFoundError, StagingError} from '../errors.js'
import {dataFileMode, entryMode, executableMode, type Manifest} from '../core/manifest.js'
import type {ManifestEntry} from '../types.js'
import {TemplateRenderer} from './renderer.js'

/**
 * Called after each entry has been written and permissioned.
 */
export type OnEntryStaged = (destination: string, entry: ManifestEntry, path: string) => void

/**
 * Produces the entries of a manifest inside a build context directory.
 *
 * Entries are staged in manifest order (lexicographic by destination).
 * For each entry the source is checked before anything is written; the
 * first invalid entry aborts staging and later entries are not produced.
 *
 * Permission bits are forced after writing (0o775 for executables and
 * directories, 0o664 for data files), so the result does not depend on the
 * umask or on the source file modes. Parent directories created on the way
 * get 0o775 as well. Inside a copied directory, a file is an executable when
 * its source has the owner execute bit; symbolic links are kept verbatim.
 */
export class ContextStager {
  constructor(private readonly renderer = new TemplateRenderer()) {}

  /**
   * @param manifest - Entries to produce
   * @param root - Existing, empty directory
   * @param onEntryStaged - Progress callback
   * @returns Absolute paths of the staged entries, in staging order
   * @throws {StagingError} On an invalid root, a missing or mismatched source, or a render failure
   */
  async stage(manifest: Manifest, root: string, onEntryStaged?: OnEntryStaged): Promise<string[]> {
    const rootPath = resolve(root)
    await this.validateRoot(rootPath)

    const staged: string[] = []
    for (const [destination, entry] of manifest.entries()) {
      const target = this.resolveTarget(rootPath, destination)
      try {
        await this.stageEntry(rootPath, destination, entry, target)
      } catch (error) {
        if (error instanceof ImgkilnError) {
          throw error
        }

        throw new StagingError(destination, `Failed to stage '${destination}'`, 'STAGING_FAILED', {cause: error})
      }

      staged.push(target)
      onEntryStaged?.(destination, entry, target)
    }

    return staged
  }

  private async stageEntry(root: string, destination: string, entry: ManifestEntry, target: string): Promise<void> {
    switch (entry.action) {
      case 'copy': {
        await this.requireSource(destination, entry.source, 'file')
        await this.ensureParents(root, target)
        await copyFile(entry.source, target)
        break
      }

      case 'copy-dir': {
        await this.requireSource(destination, entry.source, 'directory')
        await this.ensureParents(root, target)
        await cp(entry.source, target, {recursive: true, errorOnExist: true, force: false, verbatimSymlinks: true})
        await this.normalizeTree(target)
        break
      }

      case 'render': {
        await this.requireSource(destination, entry.source, 'file')
        // Rendered fully in memory first: a failing render leaves nothing on disk
        const text = await this.renderer.renderFile(entry.source, entry.context, destination)
        await this.ensureParents(root, target)
        await writeFile(target, text, 'utf8')
        break
      }

      case 'create-file': {
        await this.ensureParents(root, target)
        await writeFile(target, '', 'utf8')
        break
      }

      case 'create-dir': {
        await this.ensureParents(root, target)
        await mkdir(target, {recursive: true})
        break
      }
    }

    await chmod(target, entryMode(entry))
  }

  /**
   * Forces the permission classes on everything below a copied directory.
   */
  private async normalizeTree(dir: string): Promise<void> {
    const entries = await readdir(dir, {withFileTypes: true})
    for (const entry of entries) {
      const path = join(dir, entry.name)
      if (entry.isDirectory()) {
        await chmod(path, executableMode)
        await this.normalizeTree(path)
      } else if (entry.isFile()) {
        const {mode} = await stat(path)
        await chmod(path, (mode & 0o100) === 0 ? dataFileMode : executableMode)
      }
    }
  }

  private async requireSource(destination: string, source: string, kind: 'file' | 'directory'): Promise<void> {
    let stats: Stats
    try {
      stats = await stat(source)
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new SourceNotFoundError(destination, source, {cause: error})
      }

      throw new StagingError(destination, `Cannot read resource '${source}' for '${destination}'`, 'STAGING_FAILED', {cause: error})
    }

    const matches = kind === 'file' ? stats.isFile() : stats.isDirectory()
    if (!matches) {
      throw new SourceKindMismatchError(destination, source, kind)
    }
  }

  /**
   * Creates the missing directories between root and the target's parent,
   * one level at a time so each new level can be permissioned.
   */
  private async ensureParents(root: string, target: string): Promise<void> {
    const parent = relative(root, dirname(target))
    if (!parent) {
      return
    }

    let current = root
    for (const segment of parent.split(sep)) {
      current = resolve(current, segment)
      try {
        await mkdir(current)
        await chmod(current, executableMode)
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code !== 'EEXIST') {
          throw error
        }
      }
    }
  }

  private resolveTarget(root: string, destination: string): string {
    const target = resolve(root, destination)
    const rel = relative(root, target)
    if (!rel || rel.startsWith('..') || isAbsolute(rel)) {
      throw new StagingError(destination, `Destination '${destination}' resolves outside the build context`, 'INVALID_DESTINATION')
    }

    return target
  }

  private async validateRoot(root: string): Promise<void> {
    let entries: string[]
    try {
      entries = await readdir(root)
    } catch (error) {
      throw new StagingError('.', `Build context '${root}' does not exist or is not a directory`, 'INVALID_CONTEXT_ROOT', {cause: error})
    }

    if (entries.length > 0) {
      throw new StagingError('.', `Build context '${root}' is not empty`, 'INVALID_CONTEXT_ROOT')
    }
  }
}
