import {InvalidImageReferenceError} from '../errors.js'

// [HOST[:PORT]/]PATH[:TAG]
const hostAndPort = String.raw`([a-z0-9.-]+(:[0-9]+)?/)?`
// Between alphanumerics: a dot, one or two underscores, or a run of dashes.
const separator = String.raw`(?:\.|_{1,2}|-+)`
const component = String.raw`[a-z0-9]+(?:${separator}[a-z0-9]+)*`
const path = `${component}(/${component})*`
const tag = String.raw`(:[a-zA-Z0-9_.-]+)?`

const imageReferencePattern = new RegExp(`^${hostAndPort}${path}${tag}$`)

/**
 * Checks an image reference (base image or target tag) against the
 * registry naming rules.
 */
export function isValidImageReference(reference: string): boolean {
  return imageReferencePattern.test(reference)
}

/**
 * @throws {InvalidImageReferenceError} When the reference does not match.
 */
export function assertImageReference(reference: string, what = 'image'): void {
  if (!isValidImageReference(reference)) {
    throw new InvalidImageReferenceError(reference, what)
  }
}

/** Makes a tag safe to embed in a file name. */
export function sanitizeTag(reference: string): string {
  return reference.replaceAll(':', '_').replaceAll('/', '_')
}
