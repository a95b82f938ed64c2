import { inspect } from 'node:util'

import { AccessKeyRequiredError, SecretKeyRequiredError, SigningError } from './errors.ts'
import { DEFAULT_REGION, DEFAULT_SERVICE } from './helpers.ts'
import { isString } from './internal/helper.ts'

export interface ICredentials {
  accessKey: string
  secretKey: string
  sessionToken?: string
  region?: string
  service?: string
}

/**
 * Immutable signing credentials. The secret key is only reachable through
 * getSecretKey(); it is left out of JSON and inspect output.
 */
export class Credentials {
  readonly accessKey: string
  readonly sessionToken?: string
  readonly region: string
  readonly service: string
  private readonly secretKey: string

  constructor({ accessKey, secretKey, sessionToken, region, service }: ICredentials) {
    this.accessKey = accessKey
    this.secretKey = secretKey
    this.sessionToken = sessionToken || undefined
    this.region = region ?? DEFAULT_REGION
    this.service = service ?? DEFAULT_SERVICE
    Object.freeze(this)
  }

  getAccessKey() {
    return this.accessKey
  }

  getSecretKey() {
    return this.secretKey
  }

  getSessionToken() {
    return this.sessionToken
  }

  /**
   * @throws SigningError when a key is missing or the scope is malformed
   */
  assertComplete(): void {
    if (!isString(this.accessKey) || !this.accessKey) {
      throw new AccessKeyRequiredError('accessKey is required for signing')
    }
    if (!isString(this.secretKey) || !this.secretKey) {
      throw new SecretKeyRequiredError('secretKey is required for signing')
    }
    if (!this.region || !this.service) {
      throw new SigningError('region and service cannot be empty')
    }
    if (/[\s/]/.test(this.region) || /[\s/]/.test(this.service)) {
      throw new SigningError(`region and service cannot hold whitespace or '/': ${this.region}/${this.service}`)
    }
  }

  toJSON() {
    return {
      accessKey: this.accessKey,
      region: this.region,
      service: this.service,
      sessionToken: this.sessionToken ? '**REDACTED**' : undefined,
    }
  }

  [inspect.custom]() {
    return `Credentials ${inspect(this.toJSON())}`
  }
}
