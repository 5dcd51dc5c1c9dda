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

import type { ResponseRecord, ResponseTarget, SinkResult } from "./types.js";

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Appends one record at a time: a single attempt on the primary target, then
 * on any error a single attempt on the secondary. `save` never throws.
 */
export class ResponseSink {
  constructor(
    private readonly primary: ResponseTarget | null,
    private readonly secondary: ResponseTarget,
  ) {}

  async save(record: ResponseRecord): Promise<SinkResult> {
    const warnings: string[] = [];

    if (this.primary) {
      try {
        await this.primary.append(record);
        return { ok: true, target: this.primary.name, warnings };
      } catch (error) {
        const warning = `Could not save to ${this.primary.name} (${errorMessage(error)}). Saving a local backup.`;
        console.warn(`[responses] ${warning}`);
        warnings.push(warning);
      }
    } else {
      warnings.push("No primary response store configured. Saving a local backup.");
    }

    try {
      await this.secondary.append(record);
      return { ok: true, target: this.secondary.name, warnings };
    } catch (error) {
      const message = `Could not save response to ${this.secondary.name}: ${errorMessage(error)}`;
      console.error(`[responses] ${message}`);
      return { ok: false, warnings, error: message };
    }
  }
}
