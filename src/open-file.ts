import { spawn } from 'child_process'

export interface FileOpener {
  open(path: string): void
}

function openCommand(platform: NodeJS.Platform, path: string): [string, string[]] | null {
  switch (platform) {
    case 'darwin':
      return ['open', [path]]
    case 'win32':
      return ['cmd', ['/c', 'start', '', path]]
    case 'linux':
      return ['xdg-open', [path]]
    default:
      return null
  }
}

/**
 * Opens a file in the desktop's default viewer. Headless machines (CI) have no
 * viewer, so every failure is ignored.
 */
export function createSystemOpener(platform: NodeJS.Platform = process.platform): FileOpener {
  return {
    open(path) {
      const cmd = openCommand(platform, path)
      if (!cmd) return
      try {
        const child = spawn(cmd[0], cmd[1], { detached: true, stdio: 'ignore' })
        child.on('error', () => {
          // no viewer available
        })
        child.unref()
      } catch {
        // no viewer available
      }
    },
  }
}
