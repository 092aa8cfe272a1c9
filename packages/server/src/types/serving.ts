/**
 * Serving Types
 *
 * Values shared between the supervisor, the serving line and the
 * watch-and-rebuild line, plus the two collaborator interfaces.
 */

export interface ResolvedAddress {
  address: string
  family: number
  port: number
}

/**
 * Startup-derived and frozen; read-only for the lifetime of the server.
 */
export interface ServingContext {
  readonly address: ResolvedAddress
  readonly host: string
  readonly port: number
  readonly outputDir: string
  readonly locale: string | null
  /** Path of the 404 document relative to the (localized) output directory */
  readonly notFoundPath: string
  readonly servingUrl: string
  readonly liveReloadUrl: string
}

/**
 * Build configuration passed to every build, initial and rebuilds alike.
 */
export interface BuildSettings {
  readonly root: string
  readonly configFile: string | null
  readonly command: string | null
  readonly buildDir: string
  readonly sourceDirs: readonly string[]
  readonly ignore: readonly string[]
  /** Language requested on the command line; the build then sits at the output root */
  readonly language: string | null
  readonly defaultLanguage: string | null
  readonly input404: string | null
  readonly siteUrl: string | null
  readonly liveReloadUrl: string | null
}

export interface ChangeSet {
  root: string
  paths: string[]
}

/**
 * Builds the whole document set into `settings.buildDir`, in place.
 */
export interface DocumentBuilder {
  build(settings: BuildSettings): Promise<void>
}

export type ChangeHandler = (changes: ChangeSet) => Promise<unknown>

/**
 * Watches a root and delivers batches of changes one at a time: the next
 * batch is delivered only after the previous handler's promise settles.
 */
export interface ChangeWatcher {
  watch(root: string, onChange: ChangeHandler): void
  close(): Promise<void>
}
