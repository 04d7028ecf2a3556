import process from 'node:process'
import {homedir} from 'node:os'
import {resolve} from 'node:path'
import type {Command} from 'commander'
import type {LocalContext} from '../core/uri.js'
import {ConfigurationError, JobsubError} from '../errors.js'
import type {UserStep} from '../types.js'
import {JobBuilder, type BuildResult, type JobOptions} from './job-builder.js'
import {JobLoader, slugify} from './job-loader.js'
import {ConsoleReporter, InteractiveReporter, type Reporter} from './reporter.js'

export type GlobalOptions = {
  cwd: string;
  json?: boolean;
}

/** Flags shared by every command that builds a job. */
export type JobFlags = {
  env: string[];
  input: string[];
  inputRecursive: string[];
  output: string[];
  outputRecursive: string[];
  envFile?: string;
  name?: string;
  project?: string;
  region?: string;
  machineType?: string;
  diskSize?: number;
  serviceAccount?: string;
  scopes?: string;
  image?: string;
  command?: string;
  script?: string;
  timeout?: string;
  allowLocal?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

/** Commander reducer for repeatable options. */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

export function addJobOptions(command: Command): Command {
  return command
    .option('--env <name=value>', 'Environment variable (repeatable)', collect, [])
    .option('--input <[name=]uri>', 'Input file or wildcard (repeatable)', collect, [])
    .option('--input-recursive <[name=]uri>', 'Input directory, copied recursively (repeatable)', collect, [])
    .option('--output <[name=]uri>', 'Output file or wildcard (repeatable)', collect, [])
    .option('--output-recursive <[name=]uri>', 'Output directory, copied recursively (repeatable)', collect, [])
    .option('--env-file <path>', 'Load environment variables from a dotenv file')
    .option('--name <name>', 'Job name')
    .option('--project <id>', 'Cloud project ID', process.env.JOBSUB_PROJECT)
    .option('--region <region>', 'Region to run in', process.env.JOBSUB_REGION)
    .option('--machine-type <type>', 'VM machine type')
    .option('--disk-size <gb>', 'Data disk size in GB', Number)
    .option('--service-account <email>', 'Service account email')
    .option('--scopes <scopes>', 'Comma-separated OAuth scopes')
    .option('--image <image>', 'Image of the user step')
    .option('--command <command>', 'Command of the user step, run with /bin/bash -c')
    .option('--script <script>', 'Bash script of the user step')
    .option('--timeout <duration>', 'Overall pipeline timeout (e.g. 3600s, 12h, 7d)')
    .option('--allow-local', 'Accept local file paths in addition to gs:// URIs')
}

/** Converts parsed flags into builder options. */
export function toJobOptions(jobFile: string | undefined, flags: JobFlags): JobOptions {
  if (!flags.image && (flags.command !== undefined || flags.script !== undefined)) {
    throw new ConfigurationError('--command and --script require --image')
  }

  const steps: UserStep[] = []
  if (flags.image) {
    const step: UserStep = {name: flags.name ? slugify(flags.name) : 'user-command', image: flags.image}
    if (flags.command !== undefined) {
      step.commands = ['/bin/bash', '-c', flags.command]
    }

    if (flags.script !== undefined) {
      step.script = flags.script
    }

    steps.push(step)
  }

  return {
    jobFile,
    name: flags.name,
    envFile: flags.envFile,
    params: {
      envs: flags.env,
      inputs: flags.input,
      inputsRecursive: flags.inputRecursive,
      outputs: flags.output,
      outputsRecursive: flags.outputRecursive
    },
    resources: {
      project: flags.project,
      region: flags.region,
      machineType: flags.machineType,
      diskSizeGb: flags.diskSize,
      serviceAccount: flags.serviceAccount,
      scopes: flags.scopes?.split(',')
    },
    steps,
    timeout: flags.timeout
  }
}

export function localContext(flags: JobFlags, cwd: string): LocalContext | undefined {
  return flags.allowLocal ? {home: homedir(), cwd: resolve(cwd)} : undefined
}

export function createReporter(json?: boolean): Reporter {
  return json ? new ConsoleReporter() : new InteractiveReporter()
}

/**
 * Builds the job a command describes. Every failure of the job itself,
 * flag errors included, goes through the reporter and gives `undefined`.
 */
export async function buildJob(
  jobFile: string | undefined,
  flags: JobFlags,
  cmd: Command,
  reporter: Reporter = createReporter(getGlobalOptions(cmd).json)
): Promise<BuildResult | undefined> {
  const {cwd} = getGlobalOptions(cmd)
  const builder = new JobBuilder(new JobLoader(), reporter, resolve(cwd), localContext(flags, cwd))

  try {
    let options: JobOptions
    try {
      options = toJobOptions(jobFile, flags)
    } catch (error: unknown) {
      builder.reportFailure(flags.name ?? 'job', error)
      throw error
    }

    return await builder.run(options)
  } catch (error: unknown) {
    // Already reported
    if (error instanceof JobsubError) {
      return undefined
    }

    throw error
  }
}
