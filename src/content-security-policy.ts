/**
 * @file content-security-policy.ts
 * @description
 *   ContentSecurityPolicy: the `Content-Security-Policy` header as a value
 *   object. Holds an ordered map of directive name to source list and
 *   converts between that map and the wire format:
 *     - Parsing of raw header lines, rejecting foreign field names
 *     - Directive allow-list and CR/LF injection checks on every write
 *     - Serialization to a single line or to several same-named lines
 *
 * @example
 * import { ContentSecurityPolicy } from './content-security-policy';
 *
 * const csp = new ContentSecurityPolicy()
 *   .setDirective('default-src', ["'self'"])
 *   .setDirective('img-src', ['https://*.example.com']);
 * csp.toString();
 * // => "Content-Security-Policy: default-src 'self'; img-src https://*.example.com;"
 */

import {CRLF, CSP_FIELD_NAME, isCSPDirective, type CSPDirective} from './constants'
import {InvalidArgumentError, InvalidHeaderNameError, RuntimeError} from './errors'
import {splitHeaderLine} from './header-line'
import type {
  CSPDirectives,
  HeaderInterface,
  MultipleHeaderInterface,
} from './types'

// Separators of clauses, policies and sources, plus CR/LF
const SOURCE_DELIMITER_RE = /[\s;,]/

export class ContentSecurityPolicy implements MultipleHeaderInterface {
  readonly kind = 'content-security-policy' as const
  private readonly directives = new Map<CSPDirective, readonly string[]>()

  /**
   * Parses a raw header line such as
   * `Content-Security-Policy: default-src 'self'; img-src *;`.
   * @throws InvalidHeaderNameError when the field name is not Content-Security-Policy
   * @throws InvalidArgumentError on CR/LF injection or an unknown directive
   */
  static fromString(headerLine: string): ContentSecurityPolicy {
    const [name, value] = splitHeaderLine(headerLine)
    if (name.toLowerCase() !== CSP_FIELD_NAME.toLowerCase()) {
      throw new InvalidHeaderNameError(
        `Invalid header line for ${CSP_FIELD_NAME} string: "${name}"`,
      )
    }

    const header = new ContentSecurityPolicy()
    for (const clause of value.split(';')) {
      const trimmed = clause.trim()
      if (!trimmed) continue

      const [directive = '', ...sources] = trimmed.split(/\s+/)
      header.setDirective(directive, sources)
    }
    return header
  }

  getFieldName(): string {
    return CSP_FIELD_NAME
  }

  /**
   * Replaces the source list of a directive.
   * An empty list stores `'none'`, except for `report-uri`, which is removed.
   * @throws InvalidArgumentError on an unknown directive, or an empty source
   * or one containing whitespace (CR/LF included), `;` or `,`
   */
  setDirective(name: string, sources: readonly string[]): this {
    const directive = this.assertDirective(name)
    for (const source of sources) {
      if (!source || SOURCE_DELIMITER_RE.test(source)) {
        throw new InvalidArgumentError(
          `Invalid value detected for directive "${directive}"`,
        )
      }
    }

    if (sources.length === 0) {
      if (directive === 'report-uri') {
        this.directives.delete(directive)
      } else {
        this.directives.set(directive, ["'none'"])
      }
      return this
    }

    this.directives.set(directive, [...sources])
    return this
  }

  removeDirective(name: string): this {
    this.directives.delete(this.assertDirective(name))
    return this
  }

  hasDirective(name: string): boolean {
    return isCSPDirective(name) && this.directives.has(name)
  }

  getDirective(name: string): readonly string[] | undefined {
    return isCSPDirective(name) ? this.directives.get(name) : undefined
  }

  /** Copy of the directive map, in insertion order. */
  getDirectives(): CSPDirectives {
    const copy: CSPDirectives = {}
    for (const [name, sources] of this.directives) {
      copy[name] = [...sources]
    }
    return copy
  }

  getFieldValue(): string {
    const parts: string[] = []
    for (const [name, sources] of this.directives) {
      parts.push(`${[name, ...sources].join(' ')};`)
    }
    return parts.join(' ')
  }

  toString(): string {
    return `${this.getFieldName()}: ${this.getFieldValue()}`
  }

  /**
   * Writes this policy and the given ones as consecutive header lines,
   * each terminated by CRLF.
   * @throws RuntimeError if any header is not a ContentSecurityPolicy
   */
  toStringMultipleHeaders(headers: readonly HeaderInterface[]): string {
    let lines = this.toString() + CRLF
    for (const header of headers) {
      if (header.kind !== this.kind) {
        throw new RuntimeError(
          'The ContentSecurityPolicy multiple header implementation' +
            ' can only accept an array of ContentSecurityPolicy headers',
        )
      }
      lines += header.toString() + CRLF
    }
    return lines
  }

  private assertDirective(name: string): CSPDirective {
    if (!isCSPDirective(name)) {
      throw new InvalidArgumentError(
        `${CSP_FIELD_NAME} expects a valid directive name; received "${name}"`,
      )
    }
    return name
  }
}
