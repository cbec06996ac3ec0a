/**
 * @file errors.ts
 * @description Error types thrown by the header objects
 */

export type HeaderErrorKind = 'InvalidArgument' | 'InvalidHeaderName' | 'Runtime'

/** Base class for every error raised while parsing or building headers. */
export class HeaderError extends Error {
  constructor(
    message: string,
    public readonly kind: HeaderErrorKind,
  ) {
    super(message)
    this.name = 'HeaderError'
  }
}

/** Malformed input, disallowed directive, or CR/LF injection. */
export class InvalidArgumentError extends HeaderError {
  constructor(message: string, kind: HeaderErrorKind = 'InvalidArgument') {
    super(message, kind)
    this.name = 'InvalidArgumentError'
  }
}

export class InvalidHeaderNameError extends InvalidArgumentError {
  constructor(message: string) {
    super(message, 'InvalidHeaderName')
    this.name = 'InvalidHeaderNameError'
  }
}

/** Headers of different types combined into one serialization. */
export class RuntimeError extends HeaderError {
  constructor(message: string) {
    super(message, 'Runtime')
    this.name = 'RuntimeError'
  }
}
