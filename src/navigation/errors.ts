// Copyright 2026 jem-sec-attest contributors
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

import type { ValidationIssue } from "../questions/renderer.js";

/**
 * Incomplete or malformed input. Recoverable: nothing advanced, the caller
 * shows the issues next to the offending controls.
 */
export class ValidationError extends Error {
  readonly issues: readonly ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(`Validation failed: ${issues.map((i) => `${i.field}: ${i.message}`).join("; ")}`);
    this.name = "ValidationError";
    this.issues = Object.freeze([...issues]);
  }
}

/**
 * Both response targets failed and the sink policy blocks advancing.
 * The participant may resubmit the same answers.
 */
export class SinkWriteError extends Error {
  constructor(
    message: string,
    public readonly warnings: readonly string[],
  ) {
    super(message);
    this.name = "SinkWriteError";
  }
}
