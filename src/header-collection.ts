/**
 * @file header-collection.ts
 * @description Ordered collection of header objects, serialized as a header block
 */

import {CRLF, CSP_FIELD_NAME} from './constants'
import {ContentSecurityPolicy} from './content-security-policy'
import {GenericHeader} from './generic-header'
import {splitHeaderLine} from './header-line'
import {isMultipleHeader, type HeaderInterface} from './types'

export class HeaderCollection {
  private readonly headers: HeaderInterface[] = []

  addHeader(header: HeaderInterface): this {
    this.headers.push(header)
    return this
  }

  /**
   * Parses a raw line into the matching header type and adds it.
   */
  addHeaderLine(headerLine: string): this {
    const [name] = splitHeaderLine(headerLine)
    const header =
      name.toLowerCase() === CSP_FIELD_NAME.toLowerCase()
        ? ContentSecurityPolicy.fromString(headerLine)
        : GenericHeader.fromString(headerLine)
    return this.addHeader(header)
  }

  has(name: string): boolean {
    return this.get(name).length > 0
  }

  /** Every header with the given name, case-insensitive, in insertion order. */
  get(name: string): HeaderInterface[] {
    const key = name.toLowerCase()
    return this.headers.filter((h) => h.getFieldName().toLowerCase() === key)
  }

  count(): number {
    return this.headers.length
  }

  toString(): string {
    const groups = new Map<string, HeaderInterface[]>()
    for (const header of this.headers) {
      const key = header.getFieldName().toLowerCase()
      const group = groups.get(key)
      if (group) {
        group.push(header)
      } else {
        groups.set(key, [header])
      }
    }

    let block = ''
    for (const [first, ...rest] of groups.values()) {
      if (!first) continue
      if (rest.length && isMultipleHeader(first)) {
        block += first.toStringMultipleHeaders(rest)
        continue
      }
      for (const header of [first, ...rest]) {
        block += header.toString() + CRLF
      }
    }
    return block
  }
}
