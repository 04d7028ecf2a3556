import {readFile} from 'node:fs/promises'
import {parse} from 'dotenv'

/** Reads a dotenv file as `NAME=value` environment flags, in file order. */
export async function loadEnvFile(filePath: string): Promise<string[]> {
  const content = await readFile(filePath, 'utf8')
  return Object.entries(parse(content)).map(([name, value]) => `${name}=${value}`)
}
