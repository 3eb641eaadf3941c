import {isAbsolute, normalize, sep} from 'node:path'
import {ValidationError} from '../errors.js'
import type {ManifestEntry} from '../types.js'

export const executableMode = 0o775
export const dataFileMode = 0o664

/**
 * Permission bits for a staged entry. Directories and executables share
 * the executable class.
 */
export function entryMode(entry: ManifestEntry): number {
  switch (entry.action) {
    case 'copy-dir':
    case 'create-dir': {
      return executableMode
    }

    case 'copy':
    case 'render':
    case 'create-file': {
      return entry.executable ? executableMode : dataFileMode
    }
  }
}

/** Code-unit order, independent of the host locale. */
function compareNames(a: string, b: string): number {
  if (a < b) {
    return -1
  }

  return a > b ? 1 : 0
}

/**
 * Ordered set of entries to produce in a build context, keyed by
 * destination name.
 *
 * Iteration is lexicographic by destination, not insertion order, so two
 * stagings of the same manifest touch the filesystem in the same order.
 */
export class Manifest {
  static from(entries: Record<string, ManifestEntry>): Manifest {
    const manifest = new Manifest()
    for (const [destination, entry] of Object.entries(entries)) {
      manifest.add(destination, entry)
    }

    return manifest
  }

  private readonly items = new Map<string, ManifestEntry>()

  get size(): number {
    return this.items.size
  }

  /**
   * @throws {ValidationError} On a duplicate or unsafe destination name.
   */
  add(destination: string, entry: ManifestEntry): this {
    Manifest.validateDestination(destination)
    if (this.items.has(destination)) {
      throw new ValidationError(`Duplicate manifest destination: '${destination}'`)
    }

    this.items.set(destination, entry)
    return this
  }

  get(destination: string): ManifestEntry | undefined {
    return this.items.get(destination)
  }

  has(destination: string): boolean {
    return this.items.has(destination)
  }

  destinations(): string[] {
    return [...this.items.keys()].sort(compareNames)
  }

  * entries(): Generator<[string, ManifestEntry]> {
    for (const destination of this.destinations()) {
      const entry = this.items.get(destination)
      if (entry) {
        yield [destination, entry]
      }
    }
  }

  /**
   * Destinations are relative paths that stay inside the context root.
   */
  private static validateDestination(destination: string): void {
    if (!destination || destination.trim() !== destination) {
      throw new ValidationError(`Invalid manifest destination: '${destination}'`)
    }

    if (isAbsolute(destination)) {
      throw new ValidationError(`Manifest destination '${destination}' must be a relative path`)
    }

    const normalized = normalize(destination)
    if (normalized === '.' || normalized === '..' || normalized.startsWith(`..${sep}`) || destination.split(/[\\/]/).includes('..')) {
      throw new ValidationError(`Manifest destination '${destination}' must not contain '..'`)
    }
  }
}
