import process from 'node:process'
import chalk from 'chalk'
import type {Command} from 'commander'
import {allParams} from '../../core/job-params.js'
import {uriString} from '../../core/uri.js'
import {dataDiskPath} from '../../core/utils.js'
import type {JobParam} from '../../types.js'
import {addJobOptions, buildJob, getGlobalOptions, type JobFlags} from '../utils.js'

type ParamRow = {
  name: string;
  type: string;
  value: string;
  path: string;
}

export function registerInspectCommand(program: Command): void {
  addJobOptions(
    program
      .command('inspect')
      .description('Show the resolved parameters of a job')
      .argument('[job]', 'Job file (JSON or YAML)')
  )
    .action(async (jobFile: string | undefined, options: JobFlags, cmd: Command) => {
      const result = await buildJob(jobFile, options, cmd)
      if (!result) {
        process.exitCode = 1
        return
      }

      const rows = allParams(result.jobParams).map(param => toRow(param))
      const {json} = getGlobalOptions(cmd)
      if (json) {
        console.log(JSON.stringify(rows, null, 2))
        return
      }

      if (rows.length === 0) {
        console.log(chalk.gray('No parameters.'))
        return
      }

      const nameWidth = Math.max('NAME'.length, ...rows.map(r => r.name.length))
      const typeWidth = Math.max('TYPE'.length, ...rows.map(r => r.type.length))
      const valueWidth = Math.max('VALUE'.length, ...rows.map(r => r.value.length))

      console.log(chalk.bold(`${'NAME'.padEnd(nameWidth)}  ${'TYPE'.padEnd(typeWidth)}  ${'VALUE'.padEnd(valueWidth)}  PATH`))
      for (const row of rows) {
        console.log(`${row.name.padEnd(nameWidth)}  ${row.type.padEnd(typeWidth)}  ${row.value.padEnd(valueWidth)}  ${chalk.cyan(row.path)}`)
      }
    })
}

export function toRow(param: JobParam): ParamRow {
  if (param.kind === 'env') {
    return {name: param.name, type: 'env', value: param.value ?? '-', path: '-'}
  }

  return {
    name: param.name,
    type: param.recursive ? `${param.role} (recursive)` : param.role,
    value: param.uri ? uriString(param.uri) : '-',
    path: param.mountPath === undefined ? '-' : dataDiskPath(param.mountPath)
  }
}
