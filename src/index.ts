#!/usr/bin/env node

import { Command } from 'commander'
import {
  defaultCommand,
  summarizeCommand,
  memoryCommand,
  consolidateCommand,
  clearCommand,
  configCommand
} from './cli/commands.js'
import { packageVersion } from './cli/version.js'

const program = new Command()

program
  .name('confidant')
  .description('A terminal AI companion that summarizes and remembers your conversations')
  .version(packageVersion())
  .action(async () => {
    await defaultCommand()
  })

program
  .command('summarize')
  .description('Summarize messages not yet folded into the rolling summary')
  .action(async () => {
    await summarizeCommand()
  })

program
  .command('memory')
  .description('Show memory statistics')
  .option('--search <query>', 'Search memories')
  .action(async (options: { search?: string }) => {
    await memoryCommand(options)
  })

program
  .command('consolidate')
  .description('Expire, promote, merge and prune memory segments')
  .action(async () => {
    await consolidateCommand()
  })

program
  .command('clear')
  .description('Forget the conversation, summary and memories')
  .action(async () => {
    await clearCommand()
  })

program
  .command('config')
  .description('Show config, or set a value with dot notation')
  .argument('[action]', 'set')
  .argument('[key]', 'e.g. llm.apiKey')
  .argument('[value]', 'JSON or plain string')
  .action(async (action?: string, key?: string, value?: string) => {
    await configCommand(action, key, value)
  })

program.parseAsync(process.argv).catch((err) => {
  console.error(err)
  process.exit(1)
})
