/**
 * Credential file
 *
 * Two lines, each base64: the appliance username, then its password.
 */

import fs from 'node:fs'
import type { Credentials } from '../types.js'
import { CredentialError, errorMessage } from './errors.js'

function decodeLine(line: string | undefined, label: string, filePath: string): string {
  if (!line) {
    throw new CredentialError(`Credential file is missing the ${label} line: ${filePath}`, filePath)
  }

  const decoded = Buffer.from(line, 'base64').toString('utf-8')
  if (!decoded) {
    throw new CredentialError(`Credential file has an empty ${label}: ${filePath}`, filePath)
  }
  return decoded
}

/**
 * Decode the credential file
 */
export function readCredentials(filePath: string): Credentials {
  let content: string
  try {
    content = fs.readFileSync(filePath, 'utf-8')
  } catch (err) {
    throw new CredentialError(
      `Unable to read credential file ${filePath}: ${errorMessage(err)}`,
      filePath,
      err instanceof Error ? err : undefined
    )
  }

  const lines = content.split(/\r?\n/).map(line => line.trim())

  return {
    username: decodeLine(lines[0], 'username', filePath),
    password: decodeLine(lines[1], 'password', filePath)
  }
}

/**
 * Produce credential file content for a username and password
 */
export function encodeCredentials(credentials: Credentials): string {
  const encode = (value: string) => Buffer.from(value, 'utf-8').toString('base64')
  return `${encode(credentials.username)}\n${encode(credentials.password)}\n`
}
