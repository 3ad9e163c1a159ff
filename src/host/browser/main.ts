import { Chip8System } from '@core/system/system'
import { WIDTH, HEIGHT } from '@core/display/framebuffer'
import { framebufferToRGBA } from '@utils/rgba'
import { keyForCode } from './keymap'

const SCALE = 10

const query = new URL(window.location.href).searchParams
const ipfParam = (() => { const v = Number(query.get('ipf')); return Number.isInteger(v) && v > 0 ? v : undefined })()
const edgeParam = query.get('edge') === 'wrap' ? 'wrap' as const : undefined

const $ = <T extends HTMLElement>(sel: string, ctor: { new (): T }): T => {
  const el = document.querySelector(sel)
  if (!(el instanceof ctor)) throw new Error(`Missing element ${sel}`)
  return el
}

const canvas = $('#screen', HTMLCanvasElement)
const statusEl = $('#status', HTMLSpanElement)
const startBtn = $('#start', HTMLButtonElement)
const pauseBtn = $('#pause', HTMLButtonElement)
const romInput = $('#rom', HTMLInputElement)

const context = canvas.getContext('2d', { alpha: false })
if (!context) throw new Error('2D canvas unavailable')
const ctx: CanvasRenderingContext2D = context
canvas.width = WIDTH * SCALE
canvas.height = HEIGHT * SCALE
const image = ctx.createImageData(canvas.width, canvas.height)

let sys: Chip8System | null = null
let running = false
let lastTs = 0

const setStatus = (text: string, error = false): void => {
  statusEl.textContent = text
  statusEl.classList.toggle('error', error)
}

const draw = (): void => {
  if (!sys) return
  image.data.set(framebufferToRGBA(sys.display.pixels, WIDTH, HEIGHT, SCALE))
  ctx.putImageData(image, 0, 0)
}

const frame = (ts: number): void => {
  if (!running || !sys) return
  const elapsed = lastTs ? Math.min(250, ts - lastTs) : 0
  lastTs = ts
  try {
    sys.runFrame(elapsed)
  } catch (e) {
    running = false
    setStatus(`Stopped: ${e instanceof Error ? e.message : String(e)}`, true)
    console.error(e)
  }
  draw()
  if (running) requestAnimationFrame(frame)
}

const start = (): void => {
  if (!sys || running) return
  running = true
  lastTs = 0
  setStatus(sys.cpu.awaitingKeypress ? 'Waiting for key' : 'Running')
  requestAnimationFrame(frame)
}

romInput.addEventListener('change', async () => {
  const file = romInput.files?.[0]
  if (!file) return
  running = false
  try {
    const bytes = new Uint8Array(await file.arrayBuffer())
    sys = new Chip8System({ instructionsPerFrame: ipfParam, spriteEdge: edgeParam })
    sys.load(bytes)
    startBtn.disabled = false
    pauseBtn.disabled = false
    setStatus(`Loaded ${file.name} (${bytes.length} bytes)`)
    draw()
  } catch (e) {
    sys = null
    setStatus(e instanceof Error ? e.message : String(e), true)
  }
})

startBtn.addEventListener('click', start)
pauseBtn.addEventListener('click', () => { running = false; setStatus('Paused') })

window.addEventListener('keydown', (e: KeyboardEvent) => {
  const key = keyForCode(e.code)
  if (key === null || !sys) return
  sys.keypad.setKey(key, true)
  e.preventDefault()
})
window.addEventListener('keyup', (e: KeyboardEvent) => {
  const key = keyForCode(e.code)
  if (key === null || !sys) return
  sys.keypad.setKey(key, false)
})
window.addEventListener('blur', () => sys?.keypad.releaseAll())
