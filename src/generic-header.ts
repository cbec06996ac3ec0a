/**
 * @file generic-header.ts
 * @description Any header without a dedicated implementation
 */

import {
  assertValidFieldName,
  assertValidFieldValue,
  splitHeaderLine,
} from './header-line'
import type {HeaderInterface} from './types'

export class GenericHeader implements HeaderInterface {
  readonly kind = 'generic' as const
  private readonly fieldName: string
  private readonly fieldValue: string

  /**
   * @throws InvalidHeaderNameError if the name is not an HTTP token
   * @throws InvalidArgumentError if the value contains CR or LF
   */
  constructor(fieldName: string, fieldValue = '') {
    assertValidFieldName(fieldName)
    assertValidFieldValue(fieldValue)
    this.fieldName = fieldName
    this.fieldValue = fieldValue
  }

  static fromString(headerLine: string): GenericHeader {
    const [name, value] = splitHeaderLine(headerLine)
    return new GenericHeader(name, value)
  }

  getFieldName(): string {
    return this.fieldName
  }

  getFieldValue(): string {
    return this.fieldValue
  }

  toString(): string {
    return `${this.fieldName}: ${this.fieldValue}`
  }
}
