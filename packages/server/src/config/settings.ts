/**
 * Build Settings
 *
 * Turns the loaded configuration and command-line overrides into the frozen
 * BuildSettings value handed to every build.
 */

import path from 'node:path'
import { loadConfig } from './loader.js'
import type { PagewatchConfig } from './schema.js'
import type { BuildSettings } from '../types/index.js'

export interface BuildOverrides {
  /** Output directory; relative paths resolve against the project root */
  destDir?: string
  language?: string
}

export function resolveBuildSettings(
  root: string,
  config: PagewatchConfig,
  configFile: string | null,
  overrides: BuildOverrides = {}
): BuildSettings {
  const absoluteRoot = path.resolve(root)
  const buildDir = overrides.destDir ?? config.build['build-dir']

  return Object.freeze({
    root: absoluteRoot,
    configFile,
    command: config.build.command ?? null,
    buildDir: path.resolve(absoluteRoot, buildDir),
    sourceDirs: Object.freeze(config.build.src.map((dir) => path.resolve(absoluteRoot, dir))),
    ignore: Object.freeze([...config.build.ignore]),
    language: overrides.language ?? null,
    defaultLanguage: config.language.default ?? null,
    input404: config.output.html['input-404'] ?? null,
    siteUrl: config.output.html['site-url'] ?? null,
    liveReloadUrl: null,
  })
}

/**
 * Load pagewatch.toml from the root and resolve it with the command-line
 * overrides. Runs at startup and again before every rebuild.
 */
export async function loadBuildSettings(root: string, overrides: BuildOverrides = {}): Promise<BuildSettings> {
  const { config, file } = await loadConfig(root)
  return resolveBuildSettings(root, config, file, overrides)
}

/**
 * Re-apply the serve-time overrides. Builds run in separate processes and keep
 * no state, so this runs before every build, not once.
 */
export function applyLiveReload(settings: BuildSettings, liveReloadUrl: string): BuildSettings {
  return Object.freeze({
    ...settings,
    liveReloadUrl,
    // 404 pages are served from arbitrary depths, so links must be root-relative
    siteUrl: '/',
  })
}
