import '../env.js'
import { runEnrichCommand } from './commands/enrich.js'
import { runCollectCommand } from './commands/run.js'
import { asString, parseFlags } from './parse-flags.js'

function printHelp(): void {
  console.log('Listing collector')
  console.log('')
  console.log('Commands:')
  console.log('  run [--url <url> [<url> ...]]   Collect search pages and listings (default: SEARCH_URLS)')
  console.log('  enrich                          Deep-fetch stored listings missing detail fields')
  console.log('')
  console.log('Exit codes: 0 success, 1 run failure, 2 usage error')
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    process.exit(0)
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    process.exit(0)
  }

  let exitCode = 2

  switch (command) {
    case 'run':
      exitCode = await runCollectCommand({ urls: asString(flags.url) })
      break
    case 'enrich':
      exitCode = await runEnrichCommand()
      break
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      exitCode = 2
  }

  process.exit(exitCode)
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error))
  process.exit(1)
})
