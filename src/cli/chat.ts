import * as readline from 'node:readline'
import { describeError, isConfidantError } from '../errors.js'
import type { OpenedSession } from './commands.js'
import { printMetrics, printSegments } from './format.js'

// ANSI color codes
const RESET = '\x1b[0m'
const BOLD = '\x1b[1m'
const DIM = '\x1b[2m'
const CYAN = '\x1b[36m'
const GREEN = '\x1b[32m'
const YELLOW = '\x1b[33m'
const MAGENTA = '\x1b[35m'

const HELP_TEXT = `
${BOLD}Commands:${RESET}
  ${CYAN}/summary${RESET}       Show the rolling summary
  ${CYAN}/memory <q>${RESET}    Search memories for <q>
  ${CYAN}/stats${RESET}         Show conversation and memory stats
  ${CYAN}/clear${RESET}         Forget the conversation, summary and memories
  ${CYAN}/help${RESET}          Show this help
  ${CYAN}/quit${RESET}          Save and exit
`

// Spinner frames for thinking indicator
const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']

class Spinner {
  private frameIndex = 0
  private interval: NodeJS.Timeout | null = null
  private message: string

  constructor(message: string = 'thinking') {
    this.message = message
  }

  start(): void {
    this.frameIndex = 0
    process.stdout.write('\n')
    this.render()
    this.interval = setInterval(() => {
      this.frameIndex = (this.frameIndex + 1) % SPINNER_FRAMES.length
      this.render()
    }, 80)
  }

  private render(): void {
    const frame = SPINNER_FRAMES[this.frameIndex]
    process.stdout.write(`\r${DIM}${frame} ${this.message}...${RESET}\x1b[K`)
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval)
      this.interval = null
    }
    // Clear the spinner line
    process.stdout.write('\r\x1b[K')
  }
}

export async function startChat(opened: OpenedSession): Promise<void> {
  const { session, config } = opened
  const name = config.conversation.companionName
  session.start()

  console.log(`${GREEN}Talking to ${name}.${RESET} Type your message and press Enter. ${DIM}Ctrl+C to exit.${RESET}`)
  console.log(`${DIM}Type /help for commands.${RESET}\n`)

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: `${CYAN}>${RESET} `
  })

  const handleLine = async (line: string): Promise<void> => {
    const message = line.trim()
    if (!message) return

    if (message.startsWith('/')) {
      await handleCommand(message, opened, () => rl.close())
      return
    }

    const spinner = new Spinner('thinking')
    spinner.start()
    try {
      const reply = await session.send(message)
      spinner.stop()
      process.stdout.write(`\n${MAGENTA}${name}:${RESET} ${reply}`)
    } catch (e) {
      spinner.stop()
      const label = isConfidantError(e) && e.kind === 'quota' ? 'Limit reached' : 'Error'
      console.error(`\n${YELLOW}${label}: ${describeError(e)}${RESET}`)
    }
    process.stdout.write('\n\n')
  }

  let closed = false
  const closedSignal = new Promise<void>(resolve => rl.once('close', () => {
    closed = true
    resolve()
  }))

  rl.prompt()

  rl.on('line', (line: string) => {
    void handleLine(line)
      .catch((e: unknown) => console.error(`${YELLOW}Error: ${describeError(e)}${RESET}`))
      .finally(() => {
        if (!closed) rl.prompt()
      })
  })

  await closedSignal

  console.log(`\n${DIM}Saving...${RESET}`)
  await opened.close()
  console.log(`${DIM}Goodbye.${RESET}`)
}

async function handleCommand(input: string, opened: OpenedSession, quit: () => void): Promise<void> {
  const { session } = opened
  const parts = input.slice(1).split(/\s+/)
  const cmd = parts[0]?.toLowerCase()
  const args = parts.slice(1).join(' ')

  switch (cmd) {
    case 'help':
      console.log(HELP_TEXT)
      break

    case 'summary':
      if (session.conversation.summary) {
        console.log(`\n${session.conversation.summary}\n`)
      } else {
        console.log(`\n${DIM}No summary yet.${RESET}\n`)
      }
      break

    case 'memory':
      if (!args) {
        console.log(`${DIM}Usage: /memory <search query>${RESET}`)
        break
      }
      printSegments(session.searchMemories(args))
      break

    case 'stats': {
      const stats = session.stats()
      console.log('')
      console.log(`  ${DIM}Messages:${RESET}          ${stats.messages}`)
      console.log(`  ${DIM}Unsummarized:${RESET}      ${stats.unsummarized}`)
      console.log(`  ${DIM}Summary length:${RESET}    ${stats.summaryLength}`)
      console.log(`  ${DIM}Last summarized:${RESET}   ${stats.lastSummarizedAt?.toISOString() ?? 'never'}`)
      console.log(`  ${DIM}Cached summaries:${RESET}  ${stats.cachedSummaries}`)
      if (stats.memory) {
        printMetrics(stats.memory)
      } else {
        console.log('')
      }
      break
    }

    case 'clear':
      await session.clear()
      console.log(`${GREEN}Conversation cleared.${RESET}`)
      break

    case 'quit':
    case 'exit':
      quit()
      break

    default:
      console.log(`${YELLOW}Unknown command: /${cmd}${RESET}`)
      console.log(`${DIM}Type /help for available commands.${RESET}`)
  }
}
