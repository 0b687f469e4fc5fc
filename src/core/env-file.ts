import {readFile} from 'node:fs/promises'
import {parse} from 'dotenv'
import {IOFailureError} from '../errors.js'

/** Reads a dotenv file into variables for run commands. */
export async function loadEnvFile(filePath: string): Promise<Record<string, string>> {
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (error) {
    throw new IOFailureError(`Cannot read env file ${filePath}`, {cause: error})
  }

  return parse(content)
}
