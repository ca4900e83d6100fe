#!/usr/bin/env node
import { runCli } from './commands/provision'
import { errorMessage } from './utils/errors'

function main(): void {
  runCli(process.argv)
    .then((code: number) => { process.exitCode = code })
    .catch((err: unknown) => {
      // eslint-disable-next-line no-console
      console.error(`Error: ${errorMessage(err)}`)
      process.exitCode = 1
    })
}

main()
