#!/usr/bin/env node
import { runCli } from './program'
import { NodeProcessRunner } from './utils/process'
import { ClackPrompter } from './utils/prompt'
import { EXIT, type ExitCode } from './utils/errors'

runCli(process.argv, { runner: new NodeProcessRunner(), prompter: new ClackPrompter() })
  .then((code: ExitCode) => { process.exitCode = code })
  .catch((err: unknown) => {
    const message: string = err instanceof Error ? err.message : String(err)
    console.error(`Error: ${message}`)
    process.exitCode = EXIT.failure
  })
