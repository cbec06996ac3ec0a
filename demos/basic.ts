import {ContentSecurityPolicy, HeaderCollection} from '../src/index'

const csp = ContentSecurityPolicy.fromString(
  "Content-Security-Policy: default-src 'self'; img-src 'self' https://*.example.com;",
)
csp.setDirective('script-src', []).setDirective('report-uri', ['/csp-report'])

const reporting = new ContentSecurityPolicy().setDirective('report-to', [
  'csp-endpoint',
])

const headers = new HeaderCollection()
  .addHeader(csp)
  .addHeader(reporting)
  .addHeaderLine('X-Frame-Options: DENY')

console.log(headers.toString())
