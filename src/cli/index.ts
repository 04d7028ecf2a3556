#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import {Command} from 'commander'
import {registerBuildCommand} from './commands/build.js'
import {registerInspectCommand} from './commands/inspect.js'

async function main() {
  const program = new Command()

  program
    .name('jobsub')
    .description('Build pipelines requests for containerized batch jobs')
    .version('0.1.0')
    .option('--cwd <path>', 'Directory holding .jobsub.yml and relative paths', process.env.JOBSUB_CWD ?? process.cwd())
    .option('--json', 'Output structured JSON logs')

  registerBuildCommand(program)
  registerInspectCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  console.error('Fatal error:', error)
  throw error
}
