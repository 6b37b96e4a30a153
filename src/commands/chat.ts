import {Command, Flags} from '@oclif/core'
import {createInterface, type Interface} from 'node:readline/promises'
import {stdin as stdIn, stdout as stdOut} from 'node:process'
import {cyan, red, shorten, turnLine} from '../cli/format.js'
import {createObservedBus, type ObservedBus} from '../cli/observers.js'
import {loadConfig, redactConfig} from '../config/load-config.js'
import {displayModes, type DisplayMode} from '../config/schema.js'
import {Conversation} from '../core/conversation.js'
import {ConversationStateError, isFatalTurnError} from '../core/errors.js'
import {closeRuntime, createRuntime, type MailpilotRuntime} from '../core/runtime.js'
import {formatUsage} from '../core/subscribers/usage-subscriber.js'

const CHAT_COMMANDS = ['/help', '/exit', '/quit', '/clear', '/history', '/tools', '/usage', '/mode', '/config', '/retry']

function printHelp(log: (line: string) => void): void {
  log(cyan('chat commands:'))
  log(cyan('  /help                          show this help'))
  log(cyan('  /exit or /quit                 exit chat'))
  log(cyan('  /clear                         start a new conversation'))
  log(cyan('  /history [n]                   show the last n turns (default 20)'))
  log(cyan('  /tools                         list mailbox tools'))
  log(cyan('  /usage                         show model and tool usage for this session'))
  log(cyan('  /mode <clean|verbose|debug>    change how much of each turn is shown'))
  log(cyan('  /config                        print resolved config (secrets redacted)'))
  log(cyan('  /retry                         resume the last turn after a model failure'))
}

function createCompleter() {
  return (line: string): [string[], string] => {
    if (!line.startsWith('/')) return [[], line]
    const hits = CHAT_COMMANDS.filter((command) => command.startsWith(line))
    return [hits.length > 0 ? hits : CHAT_COMMANDS, line]
  }
}

function isDisplayMode(value: string): value is DisplayMode {
  return displayModes.some((mode) => mode === value)
}

/** Resolves to undefined when input ends (Ctrl-D or a closed pipe). */
function ask(rl: Interface, closed: Promise<void>, prompt: string): Promise<string | undefined> {
  return Promise.race([rl.question(prompt), closed.then(() => undefined)])
}

export default class Chat extends Command {
  static override description = 'Talk to your mailbox assistant in an interactive session'

  static override flags = {
    mode: Flags.string({description: 'display mode', options: [...displayModes]})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Chat)
    const config = await loadConfig()
    const requestedMode = flags.mode ?? config.display.mode
    const observed = createObservedBus(
      {
        mode: isDisplayMode(requestedMode) ? requestedMode : config.display.mode,
        maxContentLength: config.display.maxContentLength
      },
      (line) => this.log(line)
    )
    const runtime = await createRuntime({config, bus: observed.bus}).catch(async (error: unknown) => {
      await observed.close()
      throw error
    })
    let conversation = new Conversation()

    const rl = createInterface({input: stdIn, output: stdOut, completer: createCompleter()})
    const closed = new Promise<void>((resolve) => rl.once('close', () => resolve()))

    try {
      this.log(cyan(`mailpilot chat started (${runtime.provider.name}/${runtime.provider.model}). Type /help for commands.`))

      while (true) {
        const line = await ask(rl, closed, cyan('you> '))
        if (line === undefined) break
        const input = line.trim()
        if (!input) continue
        if (input === '/exit' || input === '/quit') break

        if (input.startsWith('/')) {
          conversation = await this.handleCommand(input, runtime, observed, conversation)
          continue
        }

        await this.runGuarded(() => runtime.orchestrator.runTurn(conversation, input))
      }
    } finally {
      const summary = observed.usage.summary(runtime.sessionId)
      if (summary) this.log(cyan(`session usage: ${formatUsage(summary)}`))
      closeRuntime(runtime, observed.bus)
      await observed.close()
      rl.close()
    }
  }

  private async runGuarded(turn: () => Promise<string>): Promise<void> {
    try {
      const answer = await turn()
      this.log(cyan('assistant>'))
      this.log(answer)
    } catch (error) {
      if (!isFatalTurnError(error)) throw error
      this.log(red(`${error.name}: ${error.message}`))
      this.log(cyan('the conversation is kept; type /retry to try again or send a new message'))
    }
  }

  private async handleCommand(
    input: string,
    runtime: MailpilotRuntime,
    observed: ObservedBus,
    conversation: Conversation
  ): Promise<Conversation> {
    const [command, argument] = input.split(/\s+/)

    switch (command) {
      case '/help':
        printHelp((line) => this.log(line))
        return conversation
      case '/clear':
        this.log(cyan('conversation cleared'))
        return new Conversation()
      case '/history': {
        const parsed = Number.parseInt(argument ?? '20', 10)
        const count = Number.isFinite(parsed) && parsed > 0 ? parsed : 20
        const turns = conversation.turns.slice(-count)
        if (turns.length === 0) this.log(cyan('(history empty)'))
        for (const turn of turns) this.log(turnLine(turn, 300))
        return conversation
      }
      case '/tools':
        for (const definition of runtime.registry.listDefinitions()) {
          this.log(`${cyan(definition.name)}  ${shorten(definition.description, 100)}`)
        }
        return conversation
      case '/usage': {
        const summary = observed.usage.summary(runtime.sessionId)
        this.log(summary ? formatUsage(summary) : '(no usage recorded)')
        return conversation
      }
      case '/mode':
        if (argument && isDisplayMode(argument)) {
          observed.display.mode = argument
          this.log(cyan(`display mode: ${argument}`))
        } else {
          this.log(red(`usage: /mode <${displayModes.join('|')}> (current: ${observed.display.mode})`))
        }
        return conversation
      case '/config':
        this.log(JSON.stringify(redactConfig(runtime.config), null, 2))
        return conversation
      case '/retry':
        try {
          await this.runGuarded(() => runtime.orchestrator.resumeTurn(conversation))
        } catch (error) {
          if (!(error instanceof ConversationStateError)) throw error
          this.log(red(error.message))
        }
        return conversation
      default:
        this.log(red(`unknown command: ${input}`))
        this.log(cyan('type /help to see supported commands'))
        return conversation
    }
  }
}
