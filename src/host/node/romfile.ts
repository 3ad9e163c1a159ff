import fs from 'node:fs'
import { RomReadError } from '@core/cpu/errors'

// Reads a ROM image from disk; any I/O failure surfaces as RomReadError
export function readRomFile(path: string): Uint8Array {
  try {
    return new Uint8Array(fs.readFileSync(path))
  } catch (e) {
    throw new RomReadError(path, e)
  }
}
