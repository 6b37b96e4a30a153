import {Args, Command, Flags} from '@oclif/core'
import {createObservedBus} from '../cli/observers.js'
import {loadConfig} from '../config/load-config.js'
import {displayModes, type DisplayMode} from '../config/schema.js'
import {Conversation} from '../core/conversation.js'
import {isFatalTurnError} from '../core/errors.js'
import {closeRuntime, createRuntime} from '../core/runtime.js'

export default class Ask extends Command {
  static override description = 'Ask the mailbox assistant one question and print the answer'

  static override examples = [
    '<%= config.bin %> <%= command.id %> "Summarise my unread mail"',
    '<%= config.bin %> <%= command.id %> --mode debug "What is on my calendar tomorrow?"'
  ]

  static override flags = {
    mode: Flags.string({description: 'display mode', options: [...displayModes]}),
    quiet: Flags.boolean({description: 'print only the final answer'})
  }

  static override args = {
    prompt: Args.string({description: 'request for the assistant', required: true})
  }

  public async run(): Promise<void> {
    const {args, flags} = await this.parse(Ask)
    const config = await loadConfig()
    const mode: DisplayMode = flags.quiet
      ? 'clean'
      : (displayModes.find((candidate) => candidate === flags.mode) ?? config.display.mode)
    const observed = createObservedBus(
      {mode, maxContentLength: config.display.maxContentLength},
      (line) => this.log(line)
    )

    let answer: string
    try {
      const runtime = await createRuntime({config, bus: observed.bus})
      try {
        answer = await runtime.orchestrator.runTurn(new Conversation(), args.prompt)
      } finally {
        closeRuntime(runtime, observed.bus)
      }
    } catch (error) {
      if (isFatalTurnError(error)) this.error(`${error.name}: ${error.message}`, {exit: 2})
      throw error
    } finally {
      await observed.close()
    }

    this.log(answer)
  }
}
