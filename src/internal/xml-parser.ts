import { XMLParser, XMLValidator } from 'fast-xml-parser'

import * as errors from '../errors.ts'
import { isRecord, toArray } from './helper.ts'
import type { BucketItemFromList, BucketNotification, FilterRule, NotificationTargetEntry } from './type.ts'
import type { XmlElement } from './xml-query.ts'
import { compileQuery, parseXmlDocument, selectElements } from './xml-query.ts'

const fxp = new XMLParser({
  parseTagValue: false,
  removeNSPrefix: true,
})

export interface ResponseErrorInput {
  statusCode: number
  headers: Record<string, string>
  body: Buffer
}

function text(value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined
  }
  return isRecord(value) ? undefined : String(value)
}

// parse error XML response
export function parseError(xml: string, headerInfo: Record<string, string | undefined>): errors.S3Error {
  let xmlErr: Record<string, unknown> = {}
  const xmlObj: unknown = fxp.parse(xml)
  if (isRecord(xmlObj) && isRecord(xmlObj.Error)) {
    xmlErr = xmlObj.Error
  }
  const e = new errors.S3Error(text(xmlErr.Message))
  e.code = text(xmlErr.Code) ?? ''
  e.resource = text(xmlErr.Resource)
  e.requestId = text(xmlErr.RequestId)
  e.hostId = text(xmlErr.HostId)
  e.bucketName = text(xmlErr.BucketName)
  e.key = text(xmlErr.Key)
  e.amzRequestid = headerInfo.amzRequestid
  e.amzId2 = headerInfo.amzId2
  e.amzBucketRegion = headerInfo.amzBucketRegion
  return e
}

// Generates an Error object depending on http statusCode and XML body
export function parseResponseError(response: ResponseErrorInput): errors.S3Error {
  const statusCode = response.statusCode
  let code = '',
    message = ''
  if (statusCode === 301) {
    code = 'MovedPermanently'
    message = 'Moved Permanently'
  } else if (statusCode === 307) {
    code = 'TemporaryRedirect'
    message = 'Are you using the correct endpoint URL?'
  } else if (statusCode === 403) {
    code = 'AccessDenied'
    message = 'Valid and authorized credentials required'
  } else if (statusCode === 404) {
    code = 'NotFound'
    message = 'Not Found'
  } else if (statusCode === 405 || statusCode === 501) {
    code = 'MethodNotAllowed'
    message = 'Method Not Allowed'
  } else if (statusCode === 503) {
    code = 'SlowDown'
    message = 'Please reduce your request rate.'
  }

  const headerInfo: Record<string, string | undefined> = {
    // A value created by S3 compatible server that uniquely identifies the request.
    amzRequestid: response.headers['x-amz-request-id'],
    // A special token that helps troubleshoot API replies and issues.
    amzId2: response.headers['x-amz-id-2'],
    // Region where the bucket is located. This header is returned only
    // in HEAD bucket and ListObjects response.
    amzBucketRegion: response.headers['x-amz-bucket-region'],
  }

  const xmlString = response.body.toString('utf8')
  if (xmlString.trim()) {
    const e = parseError(xmlString, headerInfo)
    e.statusCode = statusCode
    if (!e.code) {
      e.code = code
    }
    if (!e.message) {
      e.message = message || `Unexpected status ${statusCode}`
    }
    return e
  }

  const e = new errors.S3Error(message || `Unexpected status ${statusCode}`)
  e.code = code
  e.statusCode = statusCode
  e.amzRequestid = headerInfo.amzRequestid
  e.amzId2 = headerInfo.amzId2
  e.amzBucketRegion = headerInfo.amzBucketRegion
  return e
}

// servers that leave out xmlns are read the same way
const bucketQuery = compileQuery('.//{*}Buckets/{*}Bucket')
const nameQuery = compileQuery('{*}Name')
const creationDateQuery = compileQuery('{*}CreationDate')

function childText(element: XmlElement, query: ReturnType<typeof compileQuery>): string {
  return selectElements(element, query)[0]?.text ?? ''
}

// parse XML response for list buckets
export function parseListBucket(xml: string): BucketItemFromList[] {
  const root = parseXmlDocument(xml)
  if (!root || root.localName !== 'ListAllMyBucketsResult') {
    throw new errors.InvalidXMLError('Missing tag: "ListAllMyBucketsResult"')
  }
  return selectElements(root, bucketQuery).map((bucket) => ({
    name: childText(bucket, nameQuery),
    creationDate: new Date(childText(bucket, creationDateQuery)),
  }))
}

// parse XML response for bucket notification
export function parseBucketNotification(xml: string): BucketNotification {
  const result: BucketNotification = {
    TopicConfiguration: [],
    QueueConfiguration: [],
    CloudFunctionConfiguration: [],
  }
  const validation = XMLValidator.validate(xml)
  if (validation !== true) {
    throw new errors.InvalidXMLError(`Malformed notification configuration: ${validation.err.msg}`)
  }
  const xmlObj: unknown = fxp.parse(xml)
  if (!isRecord(xmlObj)) {
    throw new errors.InvalidXMLError('Missing tag: "NotificationConfiguration"')
  }
  const config = xmlObj.NotificationConfiguration
  if (config === '' || config === undefined) {
    if ('NotificationConfiguration' in xmlObj) {
      return result
    }
    throw new errors.InvalidXMLError('Missing tag: "NotificationConfiguration"')
  }
  if (!isRecord(config)) {
    throw new errors.InvalidXMLError('Invalid tag: "NotificationConfiguration"')
  }

  // Parse all filter rules
  const genFilterRules = (filter: unknown): FilterRule[] => {
    const rules: FilterRule[] = []
    if (isRecord(filter) && isRecord(filter.S3Key)) {
      toArray<unknown>(filter.S3Key.FilterRule).forEach((rule) => {
        if (isRecord(rule)) {
          rules.push({ Name: text(rule.Name) ?? '', Value: text(rule.Value) ?? '' })
        }
      })
    }
    return rules
  }

  const genTargets = (entries: unknown, arnTag: string): NotificationTargetEntry[] =>
    toArray<unknown>(entries)
      .filter(isRecord)
      .map((entry) => ({
        Id: text(entry.Id),
        Arn: text(entry[arnTag]) ?? '',
        Event: toArray<unknown>(entry.Event).map((e) => String(e)),
        Filter: genFilterRules(entry.Filter),
      }))

  result.TopicConfiguration = genTargets(config.TopicConfiguration, 'Topic')
  result.QueueConfiguration = genTargets(config.QueueConfiguration, 'Queue')
  result.CloudFunctionConfiguration = genTargets(config.CloudFunctionConfiguration, 'CloudFunction')
  return result
}
