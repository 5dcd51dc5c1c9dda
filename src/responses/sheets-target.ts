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
 * Google Sheets response target.
 * The target only needs two value operations, so the Sheets API sits behind
 * SheetValuesClient and tests supply their own.
 */

import { google } from "googleapis";
import type { SheetsSettings } from "../config/schema.js";
import {
  RESPONSE_FIELDS,
  type ResponseCell,
  type ResponseRecord,
  type ResponseTarget,
  recordToRow,
} from "./types.js";

const SHEETS_SCOPE = "https://www.googleapis.com/auth/spreadsheets";

export interface SheetValuesClient {
  /** Values of the first row; empty when the sheet is empty. */
  readFirstRow(): Promise<readonly unknown[]>;
  appendRow(row: readonly ResponseCell[]): Promise<void>;
}

export class GoogleSheetsTarget implements ResponseTarget {
  readonly name = "google-sheets";
  private headerPresent = false;

  constructor(private readonly client: SheetValuesClient) {}

  /** Writes the header row first when the sheet is empty. */
  async append(record: ResponseRecord): Promise<void> {
    if (!this.headerPresent) {
      const firstRow = await this.client.readFirstRow();
      if (firstRow.length === 0) {
        await this.client.appendRow([...RESPONSE_FIELDS]);
      }
      this.headerPresent = true;
    }
    await this.client.appendRow(recordToRow(record));
  }
}

function quoteSheetName(name: string): string {
  return `'${name.replace(/'/g, "''")}'`;
}

/**
 * SheetValuesClient backed by the Sheets v4 API, authenticated with a
 * service-account key file (or application default credentials when the
 * key file is not set).
 */
export function createGoogleSheetsClient(settings: SheetsSettings): SheetValuesClient {
  const auth = new google.auth.GoogleAuth({
    keyFile: settings.keyFile === "" ? undefined : settings.keyFile,
    scopes: [SHEETS_SCOPE],
  });
  const sheets = google.sheets({ version: "v4", auth });
  const sheet = quoteSheetName(settings.sheetName);

  return {
    async readFirstRow() {
      const res = await sheets.spreadsheets.values.get({
        spreadsheetId: settings.spreadsheetId,
        range: `${sheet}!1:1`,
      });
      return res.data.values?.[0] ?? [];
    },
    async appendRow(row) {
      await sheets.spreadsheets.values.append({
        spreadsheetId: settings.spreadsheetId,
        range: `${sheet}!A1`,
        valueInputOption: "RAW",
        requestBody: { values: [[...row]] },
      });
    },
  };
}
