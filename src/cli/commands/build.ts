import process from 'node:process'
import {writeFile} from 'node:fs/promises'
import {resolve} from 'node:path'
import type {Command} from 'commander'
import {addJobOptions, buildJob, getGlobalOptions, type JobFlags} from '../utils.js'

type BuildFlags = JobFlags & {
  out?: string;
  pretty?: boolean;
}

export function registerBuildCommand(program: Command): void {
  addJobOptions(
    program
      .command('build')
      .description('Build the pipelines request of a job and print it as JSON')
      .argument('[job]', 'Job file (JSON or YAML)')
  )
    .option('-o, --out <path>', 'Write the request to a file instead of stdout')
    .option('--pretty', 'Indent the JSON output')
    .action(async (jobFile: string | undefined, options: BuildFlags, cmd: Command) => {
      const result = await buildJob(jobFile, options, cmd)
      if (!result) {
        process.exitCode = 1
        return
      }

      const output = `${JSON.stringify(result.request, null, options.pretty ? 2 : undefined)}\n`
      if (options.out) {
        await writeFile(resolve(getGlobalOptions(cmd).cwd, options.out), output, 'utf8')
      } else {
        process.stdout.write(output)
      }
    })
}
