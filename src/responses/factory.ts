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
 * Sink factory: selects the response targets from configuration.
 *   - sink.sheets with a spreadsheetId → GoogleSheetsTarget primary
 *   - otherwise → local JSONL only
 */

import type { SinkSettings } from "../config/schema.js";
import { JsonlFileTarget } from "./jsonl-target.js";
import { ResponseSink } from "./response-sink.js";
import {
  GoogleSheetsTarget,
  type SheetValuesClient,
  createGoogleSheetsClient,
} from "./sheets-target.js";

export interface CreateSinkOptions {
  /** Replaces the Sheets API client, e.g. in tests. */
  sheetsClient?: SheetValuesClient;
}

export function createResponseSink(
  settings: SinkSettings,
  options: CreateSinkOptions = {},
): ResponseSink {
  const backup = new JsonlFileTarget(settings.localBackupFile);
  const sheets = settings.sheets;

  if (!sheets || sheets.spreadsheetId === "") {
    console.log(`[responses] No spreadsheet configured; writing to ${settings.localBackupFile}`);
    return new ResponseSink(null, backup);
  }

  const client = options.sheetsClient ?? createGoogleSheetsClient(sheets);
  console.log(`[responses] Writing to sheet "${sheets.sheetName}" with local backup`);
  return new ResponseSink(new GoogleSheetsTarget(client), backup);
}
