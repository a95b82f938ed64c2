export * from './errors.ts'
export * from './helpers.ts'
export * from './notification.ts'
export { Credentials } from './Credentials.ts'
export type { ICredentials } from './Credentials.ts'
export type { ConfigOverrides, S3RestConfig } from './config.ts'
export { configToClientOptions, loadConfig, mergeConfig, parseConfig } from './config.ts'
export { getCanonicalQueryString, getCanonicalRequest, getSignedHeaders } from './internal/canonical-request.ts'
export type { ClientOptions, PutObjectResult, RequestOption } from './internal/client.ts'
export { S3RestClient } from './internal/client.ts'
export { DispatchResult } from './internal/dispatch-result.ts'
export { dispatch } from './internal/request.ts'
export type { SignRequestOptions } from './internal/sign-request.ts'
export { signRequest } from './internal/sign-request.ts'
export * from './internal/type.ts'
export type { Namespaces, XmlElement } from './internal/xml-query.ts'
export { compileQuery, DEFAULT_NAMESPACES, parseXmlDocument, queryXml, selectElements } from './internal/xml-query.ts'
export type { RequestSpecInput } from './request-spec.ts'
export { createRequestSpec } from './request-spec.ts'
export {
  computeSignature,
  deriveSigningKey,
  getStringToSign,
  presignSignatureV4,
  signV4,
  signV4Algorithm,
  verifySignature,
} from './signing.ts'

