export {
  CRLF,
  CSP_FIELD_NAME,
  META_IGNORED_DIRECTIVES,
  VALID_CSP_DIRECTIVES,
  isCSPDirective,
} from './constants'
export type {CSPDirective} from './constants'
export {ContentSecurityPolicy} from './content-security-policy'
export {
  HeaderError,
  InvalidArgumentError,
  InvalidHeaderNameError,
  RuntimeError,
} from './errors'
export type {HeaderErrorKind} from './errors'
export {GenericHeader} from './generic-header'
export {HeaderCollection} from './header-collection'
export {extractMetaPolicies} from './meta-policies'
export {isMultipleHeader} from './types'
export type {
  CSPDirectives,
  CSPPresets,
  HeaderInterface,
  HeaderKind,
  Logger,
  MetaExtractionOptions,
  MultipleHeaderInterface,
} from './types'
