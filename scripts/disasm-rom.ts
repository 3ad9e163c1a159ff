/* eslint-disable no-console */
import { readRomFile } from '@host/node/romfile'
import { disassemble } from '@utils/disasm'

const romPath = process.argv[2]
if (!romPath) {
  console.error('Usage: tsx scripts/disasm-rom.ts <rom.ch8>')
  process.exit(2)
}

try {
  for (const line of disassemble(readRomFile(romPath))) console.log(line)
} catch (e) {
  console.error(e instanceof Error ? e.message : e)
  process.exit(1)
}
