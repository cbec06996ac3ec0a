#!/usr/bin/env -S npx tsx

/**
 * @file cli.ts
 * @description Command-line interface for parsing and rewriting CSP headers
 */

import {readFileSync} from 'node:fs'
import {pathToFileURL} from 'node:url'
import {parseArgs} from 'node:util'
import {CSP_FIELD_NAME, META_IGNORED_DIRECTIVES, isCSPDirective} from './constants'
import {ContentSecurityPolicy} from './content-security-policy'
import {extractMetaPolicies} from './meta-policies'
import type {CliOptions, CSPPresets, OutputFormat} from './types'

const OUTPUT_FORMATS: readonly OutputFormat[] = ['header', 'raw', 'json']

export function parsePresets(value: string | undefined): CSPPresets {
  if (!value) return {}
  const presets: CSPPresets = {}
  value.split(';').forEach((preset) => {
    const separator = preset.indexOf(':')
    if (separator < 0) return
    const directive = preset.slice(0, separator).trim()
    if (isCSPDirective(directive)) {
      presets[directive] = Object.freeze(
        preset
          .slice(separator + 1)
          .split(',')
          .map((v) => v.trim())
          .filter(Boolean),
      )
    }
  })
  return presets
}

export function parseOutputFormat(value: string | undefined): OutputFormat {
  return OUTPUT_FORMATS.find((format) => format === value) ?? 'header'
}

export function formatOutput(
  policies: readonly ContentSecurityPolicy[],
  options: CliOptions,
): string {
  switch (options.outputFormat) {
    case 'json': {
      const values = policies.map((p) => p.getFieldValue())
      return JSON.stringify(
        {[CSP_FIELD_NAME]: values.length === 1 ? values[0] : values},
        null,
        2,
      )
    }
    case 'raw':
      return policies.map((p) => p.getFieldValue()).join('\n')
    case 'header':
    default: {
      const [first, ...rest] = policies
      if (!first) return ''
      return rest.length
        ? first.toStringMultipleHeaders(rest).replace(/\r\n$/, '')
        : first.toString()
    }
  }
}

export function getOptions(args: string[] = process.argv.slice(2)): CliOptions {
  const {
    values: {html, presets, format},
    positionals,
  } = parseArgs({
    args,
    options: {
      html: {type: 'string'},
      presets: {type: 'string'},
      format: {type: 'string', short: 'f'},
    },
    allowPositionals: true,
  })

  return {
    header: positionals[0] || process.env.CSP_HEADER || '',
    htmlFile: html || process.env.CSP_HTML_FILE || '',
    presets: parsePresets(presets || process.env.CSP_PRESETS),
    outputFormat: parseOutputFormat(format || process.env.CSP_OUTPUT_FORMAT),
  }
}

/**
 * Parses the policies named by the options and applies the presets to each.
 * Presets for directives ignored in meta delivery are skipped for HTML input.
 */
export function loadPolicies(options: CliOptions): ContentSecurityPolicy[] {
  const fromHtml = Boolean(options.htmlFile)
  const policies = options.htmlFile
    ? extractMetaPolicies(readFileSync(options.htmlFile, 'utf8'))
    : [ContentSecurityPolicy.fromString(options.header ?? '')]

  const presets = Object.entries(options.presets ?? {}).filter(
    ([directive]) =>
      !fromHtml ||
      !META_IGNORED_DIRECTIVES.some((ignored) => ignored === directive),
  )
  for (const policy of policies) {
    for (const [directive, sources] of presets) {
      if (sources) policy.setDirective(directive, sources)
    }
  }
  return policies
}

export function main(args: string[] = process.argv.slice(2)): void {
  const options = getOptions(args)

  if (!options.header && !options.htmlFile) {
    console.error('Usage: csp-header "<header line>" [options]')
    console.error('\nOptions:')
    console.error(
      '  --html <file>                  Read policies from meta elements of an HTML file',
    )
    console.error(
      '  --presets <presets>            Directives to set, e.g. "img-src:\'self\',https://cdn.example.com"',
    )
    console.error(
      '  --format, -f <format>          Output format (header, raw, json)',
    )
    console.error(
      `\nExample: csp-header "${CSP_FIELD_NAME}: default-src 'self'" --format json`,
    )
    process.exit(1)
  }

  let policies: ContentSecurityPolicy[]
  try {
    policies = loadPolicies(options)
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error)
    process.exit(1)
  }

  if (!policies.length) {
    console.error('Error:', `no policies found in ${options.htmlFile}`)
    process.exit(1)
  }
  console.log(formatOutput(policies, options))
}

// Only run main() if this is the entry module
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main()
}
