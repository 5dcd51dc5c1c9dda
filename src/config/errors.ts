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

/**
 * Configuration error types. Both are fatal at startup.
 */

import type { ZodError } from "zod";

export interface ConfigErrorDetail {
  file?: string;
  path?: string;
  message: string;
}

function formatDetail(detail: ConfigErrorDetail, separator: string): string {
  const parts: string[] = [];
  if (detail.file) parts.push(`File: ${detail.file}`);
  if (detail.path) parts.push(`Field: ${detail.path}`);
  parts.push(`Message: ${detail.message}`);
  return parts.join(separator);
}

export class ConfigError extends Error {
  readonly file?: string;
  readonly path?: string;

  constructor(detail: ConfigErrorDetail) {
    super(detail.message);
    this.name = "ConfigError";
    this.file = detail.file;
    this.path = detail.path;
  }

  toString(): string {
    return formatDetail({ file: this.file, path: this.path, message: this.message }, "\n  ");
  }
}

export class ConfigValidationError extends Error {
  readonly errors: readonly ConfigErrorDetail[];

  constructor(errors: ConfigErrorDetail[]) {
    const lines = errors.map((e) => `  - ${formatDetail(e, ", ")}`);
    super(`Config validation failed with ${errors.length} error(s):\n${lines.join("\n")}`);
    this.name = "ConfigValidationError";
    this.errors = Object.freeze([...errors]);
  }
}

/**
 * Flatten zod issues into error details attributed to one source file.
 */
export function zodIssuesToDetails(error: ZodError, sourceFile: string): ConfigErrorDetail[] {
  return error.issues.map((issue) => ({
    file: sourceFile,
    path: issue.path.map(String).join("."),
    message: issue.message,
  }));
}
