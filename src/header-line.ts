/**
 * @file header-line.ts
 * @description Splitting and validation helpers shared by the header objects
 */

import {InvalidArgumentError, InvalidHeaderNameError} from './errors'

// RFC 7230 token characters
const FIELD_NAME_RE = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/
const LINE_BREAK_RE = /[\r\n]/

export function containsLineBreak(value: string): boolean {
  return LINE_BREAK_RE.test(value)
}

export function assertValidFieldName(name: string): void {
  if (!FIELD_NAME_RE.test(name)) {
    throw new InvalidHeaderNameError(`Invalid header name "${name}"`)
  }
}

export function assertValidFieldValue(value: string): void {
  if (containsLineBreak(value)) {
    throw new InvalidArgumentError('Invalid header value detected')
  }
}

/**
 * Splits a raw `Name: value` line into its field name and trimmed value.
 * One trailing line terminator is consumed; any other CR or LF is rejected.
 */
export function splitHeaderLine(line: string): [name: string, value: string] {
  const unterminated = line.replace(/\r?\n$/, '')
  assertValidFieldValue(unterminated)

  const colon = unterminated.indexOf(':')
  if (colon < 1) {
    throw new InvalidArgumentError(
      "Header must match with the format 'name: value'",
    )
  }

  const name = unterminated.slice(0, colon)
  assertValidFieldName(name)
  return [name, unterminated.slice(colon + 1).trim()]
}
