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

import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { ResponseRecord, ResponseTarget } from "./types.js";

/**
 * Local line-delimited backup: one JSON object per line, append only.
 */
export class JsonlFileTarget implements ResponseTarget {
  readonly name = "local-backup";

  constructor(private readonly filePath: string) {}

  async append(record: ResponseRecord): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, `${JSON.stringify(record)}\n`, "utf-8");
  }
}
