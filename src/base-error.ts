/*
 * MinIO Javascript Library for Amazon S3 Compatible Cloud Storage, (C) 2015 MinIO, Inc.
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

/// <reference lib="ES2022.Error" />

/**
 * Stage of a request cycle an error was raised in.
 */
export type ErrorStage = 'config' | 'request-spec' | 'canonical' | 'signing' | 'dispatch' | 'inspect' | 'service'

/**
 * @internal
 */
export class ExtendableError extends Error {
  readonly stage: ErrorStage

  constructor(stage: ErrorStage, message?: string, opt?: ErrorOptions) {
    super(message, opt)
    // set error name, otherwise it's always 'Error'
    this.name = this.constructor.name
    this.stage = stage
  }
}
