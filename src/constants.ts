/**
 * @file constants.ts
 * @description Shared constants for the CSP header
 */

/** Field name of the header, as written on the wire. */
export const CSP_FIELD_NAME = 'Content-Security-Policy'

/** Line terminator used between header lines. */
export const CRLF = '\r\n'

/**
 * List of directive names accepted by the header
 * @see https://developer.mozilla.org/en-US/docs/Web/HTTP/Headers/Content-Security-Policy
 */
export const VALID_CSP_DIRECTIVES = Object.freeze([
  'base-uri',
  'child-src',
  'connect-src',
  'default-src',
  'font-src',
  'form-action',
  'frame-ancestors',
  'frame-src',
  'img-src',
  'manifest-src',
  'media-src',
  'object-src',
  'plugin-types',
  'prefetch-src',
  'script-src',
  'script-src-attr',
  'script-src-elem',
  'style-src',
  'style-src-attr',
  'style-src-elem',
  'worker-src',
  'block-all-mixed-content',
  'require-sri-for',
  'sandbox',
  'upgrade-insecure-requests',
  'report-uri',
  'report-to',
  'navigate-to',
  'trusted-types',
  'require-trusted-types-for',
] as const)

export type CSPDirective = (typeof VALID_CSP_DIRECTIVES)[number]

const DIRECTIVE_SET: ReadonlySet<string> = new Set<string>(VALID_CSP_DIRECTIVES)

export function isCSPDirective(name: string): name is CSPDirective {
  return DIRECTIVE_SET.has(name)
}

/**
 * Directives that user agents ignore when the policy is delivered
 * through a `<meta http-equiv>` element.
 */
export const META_IGNORED_DIRECTIVES: readonly CSPDirective[] = [
  'frame-ancestors',
  'report-uri',
  'sandbox',
]
