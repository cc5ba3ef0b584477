import {Command} from '@oclif/core'
import {playAnimation, type FrameSink} from '../lib/animation.js'
import {TerminalGuard} from '../lib/terminal-guard.js'

export const FAREWELL = '>>> Demo finished. Keep the old school spirit alive! <<<'

export type SignalSource = Pick<NodeJS.EventEmitter, 'once' | 'removeListener'>

export default class Play extends Command {
  static description = 'Play the color-cycling logo above a scrolling banner until interrupted (Ctrl+C)'

  static examples = [
    '<%= config.bin %> <%= command.id %>',
  ]

  protected signals: SignalSource = process
  protected output: FrameSink = process.stdout

  async run(): Promise<void> {
    await this.parse(Play)

    const controller = new AbortController()
    const onInterrupt = () => controller.abort('interrupt')
    const onTerminate = () => controller.abort('terminate')
    const guard = new TerminalGuard(this.output)

    try {
      this.signals.once('SIGINT', onInterrupt)
      this.signals.once('SIGTERM', onTerminate)
      guard.acquire()

      const state = await playAnimation({output: this.output, signal: controller.signal})
      this.debug(`stopped after ${state.frame} frames (${String(controller.signal.reason)})`)
      if (controller.signal.reason === 'interrupt') {
        this.log(`\n\n${FAREWELL}\n`)
      }
    } catch (error) {
      this.error(`Animation failed: ${error instanceof Error ? error.message : String(error)}`, {exit: 1})
    } finally {
      this.signals.removeListener('SIGINT', onInterrupt)
      this.signals.removeListener('SIGTERM', onTerminate)
      guard.release()
    }
  }
}
