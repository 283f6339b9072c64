import { vi, describe, it, expect, beforeEach } from 'vitest'
import { vol, fs as memfs } from 'memfs'

vi.mock('node:fs', async () => {
  const m = await vi.importActual<typeof import('memfs')>('memfs')
  return { default: m.fs, ...m.fs }
})
vi.mock('node:fs/promises', async () => {
  const m = await vi.importActual<typeof import('memfs')>('memfs')
  return { default: m.fs.promises, ...m.fs.promises }
})

import { isEnoent, atomicWrite, readFileOrNull, readBytesOrNull } from '../../src/utils/fs.js'

// ---------------------------------------------------------------------------
// isEnoent
// ---------------------------------------------------------------------------

describe('isEnoent', () => {
  it('returns true for an error with code ENOENT', () => {
    const err = Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT' })
    expect(isEnoent(err)).toBe(true)
  })

  it('returns false for an error with a different code (EACCES)', () => {
    const err = Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' })
    expect(isEnoent(err)).toBe(false)
  })

  it('returns false for null and bare strings', () => {
    expect(isEnoent(null)).toBe(false)
    expect(isEnoent('ENOENT')).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// readFileOrNull / readBytesOrNull
// ---------------------------------------------------------------------------

describe('readFileOrNull / readBytesOrNull', () => {
  beforeEach(() => {
    vol.reset()
    vol.fromJSON({ '/data/taxonomy.yaml': '- name: A\n' })
  })

  it('reads text and bytes', async () => {
    expect(await readFileOrNull('/data/taxonomy.yaml')).toBe('- name: A\n')
    const bytes = await readBytesOrNull('/data/taxonomy.yaml')
    expect(bytes?.toString('utf-8')).toBe('- name: A\n')
  })

  it('returns null for a missing file', async () => {
    expect(await readFileOrNull('/data/none.yaml')).toBeNull()
    expect(await readBytesOrNull('/data/none.yaml')).toBeNull()
  })

  it('rethrows errors other than ENOENT', async () => {
    await expect(readFileOrNull('/data')).rejects.toThrow()
  })
})

// ---------------------------------------------------------------------------
// atomicWrite
// ---------------------------------------------------------------------------

describe('atomicWrite', () => {
  beforeEach(() => {
    vol.reset()
    vol.fromJSON({ '/target/placeholder': '' })
  })

  it('writes text to the target path', async () => {
    await atomicWrite('/target/tree.json', 'hello world')
    expect(memfs.readFileSync('/target/tree.json', 'utf-8')).toBe('hello world')
  })

  it('writes bytes to the target path', async () => {
    await atomicWrite('/target/tree.bin', new Uint8Array([1, 2, 3]))
    expect([...memfs.readFileSync('/target/tree.bin') as Buffer]).toEqual([1, 2, 3])
  })

  it('throws "Atomic write failed" and leaves no temp files when rename fails', async () => {
    const renameError = Object.assign(new Error('EXDEV: cross-device link'), { code: 'EXDEV' })
    const renameSpy = vi.spyOn(memfs.promises, 'rename').mockRejectedValueOnce(renameError)

    await expect(atomicWrite('/target/tree.json', 'content')).rejects.toThrow('Atomic write failed')

    const entries = memfs.readdirSync('/target') as string[]
    expect(entries.filter((e) => e.startsWith('.tmp-'))).toHaveLength(0)

    renameSpy.mockRestore()
  })

  it('overwrites an existing file', async () => {
    vol.fromJSON({ '/target/tree.json': 'old content' })
    await atomicWrite('/target/tree.json', 'new content')
    expect(memfs.readFileSync('/target/tree.json', 'utf-8')).toBe('new content')
  })
})
