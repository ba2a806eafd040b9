import { readdir, readFile } from 'node:fs/promises'
import { NotFoundError } from '@lenslab/shared'

function isMissingPath(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Names of the regular files in a folder, sorted
 */
export async function listFiles(folder: string): Promise<string[]> {
  const entries = await readdir(folder, { withFileTypes: true }).catch(
    (error: unknown) => {
      if (isMissingPath(error)) {
        throw new NotFoundError('Folder', folder)
      }
      throw error
    },
  )
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort()
}

export async function readBytes(path: string): Promise<Buffer> {
  return readFile(path).catch((error: unknown) => {
    if (isMissingPath(error)) {
      throw new NotFoundError('File', path)
    }
    throw error
  })
}

export async function readText(path: string): Promise<string> {
  return readFile(path, 'utf-8').catch((error: unknown) => {
    if (isMissingPath(error)) {
      throw new NotFoundError('File', path)
    }
    throw error
  })
}
