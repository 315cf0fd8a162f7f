import {readFile} from 'node:fs/promises'
import {parse} from 'dotenv'
import {ValidationError} from '../errors.js'

/**
 * Reads variables from a dotenv file.
 * @throws {ValidationError} If the file cannot be read
 */
export async function loadEnvFile(filePath: string): Promise<Record<string, string>> {
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (error) {
    throw new ValidationError(`Cannot read env file ${filePath}`, {cause: error})
  }

  return parse(content)
}
