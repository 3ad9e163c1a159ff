#!/usr/bin/env node
/* eslint-disable no-console */
import path from 'node:path'
import { Chip8System, FRAME_MS } from '@core/system/system'
import { readRomFile } from '@host/node/romfile'
import { disasmAt, formatTraceLine } from '@utils/disasm'

function getEnv(name: string): string | null { const v = process.env[name]; return v && v.length > 0 ? v : null }

function parseArgs() {
  const argv = process.argv.slice(2)
  let rom = getEnv('ROM') || path.resolve('roms/test.ch8')
  let max = parseInt(getEnv('TRACE_MAX') || '1000', 10)
  let keys = getEnv('TRACE_KEYS') || ''
  for (const a of argv) {
    if (a.startsWith('--rom=')) rom = a.slice(6)
    else if (a.startsWith('--max=')) max = parseInt(a.slice(6), 10)
    else if (a.startsWith('--keys=')) keys = a.slice(7)
    else if (!a.startsWith('--')) rom = a
  }
  if (!Number.isFinite(max) || max <= 0) max = 1000
  // Hex digits of keys held down for the whole run, e.g. --keys=5A
  const held = [...keys].map((c) => parseInt(c, 16)).filter((k) => Number.isInteger(k) && k >= 0 && k < 16)
  return { rom, max, held }
}

async function main() {
  const args = parseArgs()
  const sys = new Chip8System()
  sys.load(readRomFile(args.rom))
  for (const k of args.held) sys.keypad.setKey(k, true)

  const cpu = sys.cpu
  const read = (addr: number) => cpu.memory.read(addr)
  const perFrame = sys.options.instructionsPerFrame
  for (let i = 0; i < args.max; i++) {
    const s = cpu.state
    if (s.mode === 'running') console.log(formatTraceLine(disasmAt(read, s.pc), s))
    sys.stepInstruction()
    if ((i + 1) % perFrame === 0) cpu.tick(FRAME_MS)
  }
}

main().catch((e) => { console.error(e instanceof Error ? e.message : e); process.exit(1) })
