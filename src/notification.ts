/*
 * MinIO Javascript Library for Amazon S3 Compatible Cloud Storage, (C) 2016 MinIO, Inc.
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import xml2js from 'xml2js'

import { InvalidArgumentError } from './errors.ts'
import { S3_NAMESPACE } from './helpers.ts'
import { isString } from './internal/helper.ts'
import type { FilterRule } from './internal/type.ts'

const builder = new xml2js.Builder({
  rootName: 'NotificationConfiguration',
  renderOpts: { pretty: false },
  headless: true,
})

type TargetKind = 'Topic' | 'Queue' | 'CloudFunction'

function checkArn(arn: string) {
  if (!isString(arn) || !arn.startsWith('arn:')) {
    throw new InvalidArgumentError(`Invalid ARN : ${String(arn)}`)
  }
}

// Base class for three supported configs.
export abstract class TargetConfig {
  abstract readonly kind: TargetKind
  private id?: string
  private readonly events: NotificationEvent[] = []
  private readonly filterRules: FilterRule[] = []

  constructor(readonly arn: string) {
    checkArn(arn)
  }

  setId(id: string) {
    this.id = id
  }

  addEvent(newevent: NotificationEvent) {
    this.events.push(newevent)
  }

  addFilterSuffix(suffix: string) {
    this.filterRules.push({ Name: 'suffix', Value: suffix })
  }

  addFilterPrefix(prefix: string) {
    this.filterRules.push({ Name: 'prefix', Value: prefix })
  }

  /**
   * Element content in the order S3 expects: Id, target ARN, Event, Filter.
   */
  toXmlObject(): Record<string, unknown> {
    const entry: Record<string, unknown> = {}
    if (this.id) {
      entry.Id = this.id
    }
    entry[this.kind] = this.arn
    if (this.events.length) {
      entry.Event = [...this.events]
    }
    if (this.filterRules.length) {
      entry.Filter = { S3Key: { FilterRule: this.filterRules.map((rule) => ({ ...rule })) } }
    }
    return entry
  }
}

// 1. Topic (simple notification service)
export class TopicConfig extends TargetConfig {
  readonly kind = 'Topic'
}

// 2. Queue (simple queue service)
export class QueueConfig extends TargetConfig {
  readonly kind = 'Queue'
}

// 3. CloudFront (lambda function)
export class CloudFunctionConfig extends TargetConfig {
  readonly kind = 'CloudFunction'
}

const targetOrder: TargetKind[] = ['Topic', 'Queue', 'CloudFunction']

// Notification config - array of target configs.
export class NotificationConfig {
  private readonly targets: TargetConfig[] = []

  add(target: TargetConfig) {
    this.targets.push(target)
  }

  /**
   * Request body for `PUT /<bucket>?notification`. An empty config removes
   * every notification of the bucket.
   */
  toXml(): string {
    const doc: Record<string, unknown> = { $: { xmlns: S3_NAMESPACE } }
    for (const kind of targetOrder) {
      const entries = this.targets.filter((t) => t.kind === kind).map((t) => t.toXmlObject())
      if (entries.length) {
        doc[`${kind}Configuration`] = entries
      }
    }
    return builder.buildObject(doc)
  }
}

export const buildARN = (partition: string, service: string, region: string, accountId: string, resource: string) => {
  return 'arn:' + partition + ':' + service + ':' + region + ':' + accountId + ':' + resource
}
export const ObjectCreatedAll = 's3:ObjectCreated:*'
export const ObjectCreatedPut = 's3:ObjectCreated:Put'
export const ObjectCreatedPost = 's3:ObjectCreated:Post'
export const ObjectCreatedCopy = 's3:ObjectCreated:Copy'
export const ObjectCreatedCompleteMultipartUpload = 's3:ObjectCreated:CompleteMultipartUpload'
export const ObjectRemovedAll = 's3:ObjectRemoved:*'
export const ObjectRemovedDelete = 's3:ObjectRemoved:Delete'
export const ObjectRemovedDeleteMarkerCreated = 's3:ObjectRemoved:DeleteMarkerCreated'
export const ObjectReducedRedundancyLostObject = 's3:ReducedRedundancyLostObject'
export type NotificationEvent =
  | 's3:ObjectCreated:*'
  | 's3:ObjectCreated:Put'
  | 's3:ObjectCreated:Post'
  | 's3:ObjectCreated:Copy'
  | 's3:ObjectCreated:CompleteMultipartUpload'
  | 's3:ObjectRemoved:*'
  | 's3:ObjectRemoved:Delete'
  | 's3:ObjectRemoved:DeleteMarkerCreated'
  | 's3:ReducedRedundancyLostObject'
  | 's3:TestEvent'
  | 's3:ObjectRestore:Post'
  | 's3:ObjectRestore:Completed'
  | (string & NonNullable<unknown>) // keeps auto-complete for the known events
