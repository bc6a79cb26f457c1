import fs from 'fs'

// Matches on `code`: fs errors may come from another realm
export function isFileNotFoundError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'EISDIR')
  )
}

/**
 * Read a UTF-8 file, mapping a missing path to the caller's exception.
 * Every other read failure propagates unchanged.
 */
export async function readTextFile(filePath: string, onMissing: (filePath: string) => Error): Promise<string> {
  try {
    return await fs.promises.readFile(filePath, 'utf8')
  } catch (error) {
    if (isFileNotFoundError(error)) {
      throw onMissing(filePath)
    }
    throw error
  }
}
