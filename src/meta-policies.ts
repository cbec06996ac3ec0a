/**
 * @file meta-policies.ts
 * @description Reads Content-Security-Policy meta elements out of an HTML document
 */

import * as cheerio from 'cheerio'
import {CSP_FIELD_NAME, META_IGNORED_DIRECTIVES} from './constants'
import {ContentSecurityPolicy} from './content-security-policy'
import {InvalidArgumentError} from './errors'
import type {MetaExtractionOptions} from './types'

/**
 * Parses every `<meta http-equiv="Content-Security-Policy">` of the document.
 * Policies that fail validation are skipped; directives that user agents
 * ignore in meta delivery are dropped.
 * @returns One policy per meta element, in document order
 */
export function extractMetaPolicies(
  html: string,
  opts: MetaExtractionOptions = {},
): ContentSecurityPolicy[] {
  const {logger = console} = opts
  const $ = cheerio.load(html)
  const policies: ContentSecurityPolicy[] = []

  $('meta[http-equiv]').each((index, el) => {
    const equiv = ($(el).attr('http-equiv') || '').trim()
    if (equiv.toLowerCase() !== CSP_FIELD_NAME.toLowerCase()) return

    // Attribute values may span lines
    const content = ($(el).attr('content') || '').replace(/\s+/g, ' ').trim()
    if (!content) {
      logger.debug(`Empty policy skipped in meta element #${index}`)
      return
    }

    let policy: ContentSecurityPolicy
    try {
      policy = ContentSecurityPolicy.fromString(`${CSP_FIELD_NAME}: ${content}`)
    } catch (err) {
      if (!(err instanceof InvalidArgumentError)) throw err
      logger.warn(`Invalid policy skipped in meta element #${index}: ${err.message}`)
      return
    }

    for (const directive of META_IGNORED_DIRECTIVES) {
      if (policy.hasDirective(directive)) {
        logger.warn(`'${directive}' is ignored in meta policies; removed`)
        policy.removeDirective(directive)
      }
    }

    logger.debug(`Found meta policy: ${policy.getFieldValue()}`)
    policies.push(policy)
  })

  return policies
}
