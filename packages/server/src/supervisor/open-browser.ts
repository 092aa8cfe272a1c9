import { exec } from 'node:child_process'

export type BrowserOpener = (url: string) => Promise<boolean>

function openCommand(url: string, platform: NodeJS.Platform): string {
  switch (platform) {
    case 'darwin':
      return `open "${url}"`
    case 'win32':
      return `start "" "${url}"`
    default:
      return `xdg-open "${url}"`
  }
}

/**
 * Try to open a URL in the default browser. Resolves false when the
 * platform opener fails.
 */
export const openBrowser: BrowserOpener = (url) => {
  return new Promise((resolve) => {
    exec(openCommand(url, process.platform), (error) => {
      resolve(!error)
    })
  })
}
