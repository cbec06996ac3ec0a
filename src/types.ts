/**
 * @file types.ts
 * @description Shared types for the header objects, the meta extractor and the CLI
 */

import type {CSPDirective} from './constants'

/**
 * Shared logger interface used by the meta extractor and the CLI.
 */
export interface Logger
  extends Pick<Console, 'error' | 'warn' | 'info' | 'debug'> {}

/**
 * Tag identifying the concrete header implementation.
 */
export type HeaderKind = 'content-security-policy' | 'generic'

/**
 * A single header line.
 */
export interface HeaderInterface {
  readonly kind: HeaderKind
  getFieldName(): string
  getFieldValue(): string
  /** Full `Name: value` line, without a trailing CRLF. */
  toString(): string
}

/**
 * A header that may be split across several lines of the same name.
 */
export interface MultipleHeaderInterface extends HeaderInterface {
  toStringMultipleHeaders(headers: readonly HeaderInterface[]): string
}

export function isMultipleHeader(
  header: HeaderInterface,
): header is MultipleHeaderInterface {
  return 'toStringMultipleHeaders' in header
}

/**
 * Directive name to source list, in insertion order.
 */
export type CSPDirectives = Partial<Record<CSPDirective, readonly string[]>>

/**
 * Directive overrides applied on top of a parsed policy.
 * Example: { 'connect-src': ['https://api.example.com'] }
 */
export type CSPPresets = CSPDirectives

export type OutputFormat = 'header' | 'raw' | 'json'

/**
 * Options for reading policies out of an HTML document.
 */
export interface MetaExtractionOptions {
  /**
   * A logger implementing error, warn, info, debug (default: console).
   */
  logger?: Logger
}

/**
 * Options resolved by the CLI from its arguments and environment.
 */
export interface CliOptions {
  /**
   * Raw `Content-Security-Policy: ...` line to parse.
   */
  header?: string

  /**
   * Path of an HTML file whose meta policies are read instead of `header`.
   */
  htmlFile?: string

  /**
   * Directives set on every parsed policy.
   */
  presets?: CSPPresets

  /**
   * the format of the output
   */
  outputFormat?: OutputFormat
}
