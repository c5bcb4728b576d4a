import { describe, it, expect, vi, beforeEach } from 'vitest'

const { spawn } = vi.hoisted(() => ({ spawn: vi.fn() }))

vi.mock('child_process', () => ({ spawn }))

import { createSystemOpener } from '../open-file.js'

function fakeChild() {
  return { on: vi.fn(), unref: vi.fn() }
}

beforeEach(() => {
  spawn.mockReset()
})

describe('createSystemOpener', () => {
  it('uses xdg-open on Linux', () => {
    const child = fakeChild()
    spawn.mockReturnValue(child)

    createSystemOpener('linux').open('/out/2026-03-14.png')

    expect(spawn).toHaveBeenCalledWith('xdg-open', ['/out/2026-03-14.png'], {
      detached: true,
      stdio: 'ignore',
    })
    expect(child.unref).toHaveBeenCalled()
  })

  it('uses open on macOS', () => {
    spawn.mockReturnValue(fakeChild())
    createSystemOpener('darwin').open('/out/x.png')
    expect(spawn.mock.calls[0][0]).toBe('open')
  })

  it('passes an empty window title to start on Windows', () => {
    spawn.mockReturnValue(fakeChild())
    createSystemOpener('win32').open('C:\\out\\x.png')
    expect(spawn.mock.calls[0].slice(0, 2)).toEqual(['cmd', ['/c', 'start', '', 'C:\\out\\x.png']])
  })

  it('does nothing on platforms without a known viewer', () => {
    createSystemOpener('aix').open('/out/x.png')
    expect(spawn).not.toHaveBeenCalled()
  })

  it('swallows spawn failures', () => {
    spawn.mockImplementation(() => {
      throw new Error('spawn xdg-open ENOENT')
    })
    expect(() => createSystemOpener('linux').open('/out/x.png')).not.toThrow()
  })
})
