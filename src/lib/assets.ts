import type {ForegroundColorName} from 'chalk'

export type Logo = {
  readonly lines: readonly string[]
  readonly width: number
  readonly height: number
}

export type Scene = {
  readonly logo: Logo
  readonly scrollText: string
  readonly palette: readonly ForegroundColorName[]
}

const RETRO_LOGO = [
  ' ██████╗ ███████╗████████╗██████╗  ██████╗  ',
  ' ██╔══██╗██╔════╝╚══██╔══╝██╔══██╗██╔═══██╗ ',
  ' ██████╔╝█████╗     ██║   ██████╔╝██║   ██║ ',
  ' ██╔══██╗██╔══╝     ██║   ██╔══██╗██║   ██║ ',
  ' ██║  ██║███████╗   ██║   ██║  ██║╚██████╔╝ ',
  ' ╚═╝  ╚═╝╚══════╝   ╚═╝   ╚═╝  ╚═╝ ╚═════╝  ',
]

const GREETING =
  '   *** GREETINGS FROM THE RETRO SCROLLER! A TERMINAL DEMO ' +
  'IN THE SPIRIT OF THE HOME COMPUTER SCENE OF THE LATE 80S AND EARLY 90S. ' +
  'KEEP THE OLD SCHOOL SPIRIT ALIVE! ***'

export const PALETTE: readonly ForegroundColorName[] = ['cyanBright', 'magentaBright', 'yellowBright', 'greenBright', 'redBright']

// Repeated so the banner reads as an endless loop on wide terminals
export const SCROLL_TEXT = GREETING.repeat(3)

export function createLogo(lines: readonly string[]): Logo {
  return {
    lines: Object.freeze([...lines]),
    width: lines.reduce((max, line) => Math.max(max, line.length), 0),
    height: lines.length,
  }
}

export function createScene(logo: Logo, scrollText: string, palette: readonly ForegroundColorName[]): Scene {
  if (scrollText.length === 0) throw new Error('Scroll text must not be empty')
  if (palette.length === 0) throw new Error('Palette must contain at least one color')
  return {logo, scrollText, palette: Object.freeze([...palette])}
}

export const defaultScene: Scene = createScene(createLogo(RETRO_LOGO), SCROLL_TEXT, PALETTE)
