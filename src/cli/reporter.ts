import process from 'node:process'
import chalk from 'chalk'
import pino from 'pino'

export type ParamCounts = {
  envs: number;
  inputs: number;
  recursiveInputs: number;
  outputs: number;
  recursiveOutputs: number;
}

/**
 * Discriminated union of build events.
 *
 * Lifecycle:
 * 1. JOB_LOADED - Job definition merged from config, file and flags
 * 2. PARAMS_RESOLVED - Parameters validated and collision-free
 * 3. ACTIONS_BUILT - Localize, user and delocalize actions created
 * 4. REQUEST_READY - Request document assembled
 *    OR BUILD_FAILED - Any step above rejected the job
 */
export type JobLoadedEvent = {
  event: 'JOB_LOADED';
  jobName: string;
  source?: string;
}

export type ParamsResolvedEvent = {
  event: 'PARAMS_RESOLVED';
  jobName: string;
  counts: ParamCounts;
}

export type ActionsBuiltEvent = {
  event: 'ACTIONS_BUILT';
  jobName: string;
  actions: string[];
}

export type RequestReadyEvent = {
  event: 'REQUEST_READY';
  jobName: string;
  projectId: string;
  environmentSize: number;
  timeout: string;
}

export type BuildFailedEvent = {
  event: 'BUILD_FAILED';
  jobName: string;
  code: string;
  message: string;
}

export type BuildEvent =
  | JobLoadedEvent
  | ParamsResolvedEvent
  | ActionsBuiltEvent
  | RequestReadyEvent
  | BuildFailedEvent

export type Reporter = {
  emit(event: BuildEvent): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Logs go to stderr; stdout is kept for the request document.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger = pino({level: 'info'}, pino.destination(2))

  emit(event: BuildEvent): void {
    if (event.event === 'BUILD_FAILED') {
      this.logger.error(event)
      return
    }

    this.logger.info(event)
  }
}

/**
 * Reporter with a short, colored summary on stderr.
 */
export class InteractiveReporter implements Reporter {
  constructor(private readonly write: (line: string) => void = line => {
    process.stderr.write(`${line}\n`)
  }) {}

  emit(event: BuildEvent): void {
    switch (event.event) {
      case 'JOB_LOADED': {
        const source = event.source ? chalk.gray(` (${event.source})`) : ''
        this.write(chalk.bold(`▶ Job: ${chalk.cyan(event.jobName)}${source}`))
        break
      }

      case 'PARAMS_RESOLVED': {
        const {envs, inputs, recursiveInputs, outputs, recursiveOutputs} = event.counts
        this.write(`  ${chalk.green('✓')} parameters: ${envs} env, ${inputs + recursiveInputs} input, ${outputs + recursiveOutputs} output`)
        break
      }

      case 'ACTIONS_BUILT': {
        this.write(`  ${chalk.green('✓')} actions: ${event.actions.join(' → ')}`)
        break
      }

      case 'REQUEST_READY': {
        this.write(`  ${chalk.green('✓')} request ready for ${chalk.cyan(event.projectId)} (timeout ${event.timeout})`)
        break
      }

      case 'BUILD_FAILED': {
        this.write(chalk.bold.red(`✗ ${event.code}: ${event.message}`))
        break
      }
    }
  }
}
