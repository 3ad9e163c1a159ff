/* eslint-disable no-console */
import fs from 'node:fs'
import path from 'node:path'
import { PNG } from 'pngjs'
import { runRom } from '@core/harness/headless'
import { WIDTH, HEIGHT } from '@core/display/framebuffer'
import { readRomFile } from '@host/node/romfile'
import { framebufferToRGBA } from '@utils/rgba'
import { crc32 } from '@utils/crc32'

const writePngScaled = async (outPath: string, pixels: Uint8Array, scale: number): Promise<void> => {
  const png = new PNG({ width: WIDTH * scale, height: HEIGHT * scale })
  const rgba = framebufferToRGBA(pixels, WIDTH, HEIGHT, scale)
  png.data = Buffer.from(rgba.buffer, rgba.byteOffset, rgba.byteLength)
  fs.mkdirSync(path.dirname(outPath), { recursive: true })
  const stream = fs.createWriteStream(outPath)
  await new Promise<void>((resolve, reject) => {
    stream.on('finish', () => resolve())
    stream.on('error', (e) => reject(e))
    png.pack().pipe(stream)
  })
}

async function main(): Promise<void> {
  const romPath = process.argv[2] || process.env.SCREENSHOT_ROM
  if (!romPath) { console.error('Usage: tsx scripts/screenshot.ts <rom.ch8> [out.png]'); process.exit(2) }
  const outPath = process.argv[3] || path.resolve('screenshots', `${path.basename(romPath, path.extname(romPath))}.png`)
  const steps = parseInt(process.env.SCREENSHOT_STEPS || '2000', 10)
  const scale = Math.max(1, parseInt(process.env.SCREENSHOT_SCALE || '8', 10))

  const res = runRom(readRomFile(romPath), { maxSteps: steps })
  if (res.reason === 'fail') console.error(`[screenshot] stopped after ${res.steps} steps: ${res.message}`)
  const pixels = res.system.display.pixels
  await writePngScaled(outPath, pixels, scale)
  const crc = crc32(pixels)
  console.log(JSON.stringify({ rom: romPath, out: outPath, steps: res.steps, lit: res.system.display.litCount(), crc: `0x${crc.toString(16).toUpperCase().padStart(8, '0')}` }))
}

main().catch((e) => { console.error(e); process.exit(1) })
