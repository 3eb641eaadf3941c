// ---------------------------------------------------------------------------
// Shared build domain types.
//
// These types describe what goes into a build context and how the build is
// invoked. They are consumed by the engine layer (staging, invocation, logs)
// and by the manifest loader.
// ---------------------------------------------------------------------------

// -- Template values ---------------------------------------------------------

export type TemplateValue =
  | string
  | number
  | boolean
  | null
  | TemplateValue[]
  | {[key: string]: TemplateValue}

/** Variables available to a rendered template. */
export type TemplateContext = Record<string, TemplateValue>

// -- Manifest entries --------------------------------------------------------

/** Byte-for-byte copy of a regular file. */
export type CopyFileEntry = {
  action: 'copy';
  /** Absolute path of the source file. */
  source: string;
  executable: boolean;
}

/** Recursive copy of a directory. */
export type CopyDirectoryEntry = {
  action: 'copy-dir';
  /** Absolute path of the source directory. */
  source: string;
}

/** Template expanded against a context, written fresh to the destination. */
export type RenderEntry = {
  action: 'render';
  /** Absolute path of the template file. */
  source: string;
  context: TemplateContext;
  executable: boolean;
}

export type CreateFileEntry = {
  action: 'create-file';
  executable: boolean;
}

export type CreateDirectoryEntry = {
  action: 'create-dir';
}

export type ManifestEntry =
  | CopyFileEntry
  | CopyDirectoryEntry
  | RenderEntry
  | CreateFileEntry
  | CreateDirectoryEntry

export type ManifestAction = ManifestEntry['action']

// -- Build definition --------------------------------------------------------

/** Ordered key/value pairs passed as `--build-arg` or `--label`. */
export type KeyValueList = Array<[key: string, value: string]>

/**
 * A build file after loading: what to stage and how to call the engine.
 * Produced by ManifestLoader, consumed by BuildRunner.
 */
export type BuildDefinition = {
  /** Tag of the image to build. */
  tag: string;
  /** Base image, exported to the build file as `BASE_IMG`. */
  baseImage?: string;
  /** Build file path inside the context (default: "Dockerfile"). */
  buildFile: string;
  buildArgs: Record<string, string>;
  labels: Record<string, string>;
  /** Directory the build file was loaded from. */
  root: string;
  entries: Record<string, ManifestEntry>;
}

/** Options that change how a single build runs, usually from the CLI. */
export type BuildOptions = {
  /** Reuse cached layers (default: build with `--no-cache`). */
  cache?: boolean;
  /** Always ask the engine to refresh the base image. */
  pull?: boolean;
  /** Overrides the definition's tag. */
  tag?: string;
  /** Overrides the definition's base image. */
  baseImage?: string;
  buildArgs?: Record<string, string>;
  labels?: Record<string, string>;
}
