import {ansi} from './ansi.js'

export interface ControlSink {
  write(chunk: string): boolean
}

export type ExitEmitter = Pick<NodeJS.EventEmitter, 'once' | 'removeListener'>

/**
 * Hides the cursor for the lifetime of the animation and puts the terminal
 * back exactly once, whether release() is reached through `finally` or the
 * process exits some other way.
 */
export class TerminalGuard {
  private acquired = false
  private released = false
  private readonly onExit = () => this.release()

  constructor(private readonly output: ControlSink, private readonly exitEmitter: ExitEmitter = process) {}

  public acquire(): void {
    if (this.acquired) return
    this.acquired = true
    this.exitEmitter.once('exit', this.onExit)
    this.output.write(ansi.hideCursor)
  }

  public release(): void {
    if (!this.acquired || this.released) return
    this.released = true
    this.exitEmitter.removeListener('exit', this.onExit)
    this.output.write(ansi.showCursor)
    this.output.write(ansi.reset)
  }

  public get active(): boolean {
    return this.acquired && !this.released
  }
}
