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

import { describe, expect, it } from "vitest";
import { StudyConfigSchema, StudySettingsSchema } from "../../../src/config/schema.js";

describe("StudyConfigSchema", () => {
  it("fills every default from an empty document", () => {
    const result = StudyConfigSchema.parse({});
    expect(result.study).toEqual({
      passThreshold: 5,
      defaultWatchSeconds: 10,
      onSinkFailure: "block",
      scoring: "any-correct",
      allowIntakeBypass: false,
    });
    expect(result.content.dir).toBe("content");
    expect(result.sink.localBackupFile).toBe("data/responses_backup.jsonl");
    expect(result.sink.sheets).toBeUndefined();
    expect(result.session).toEqual({ cookieName: "caption_study_session", ttlSeconds: 7200 });
  });

  it("fills sheet defaults when only the spreadsheet id is given", () => {
    const result = StudyConfigSchema.parse({ sink: { sheets: { spreadsheetId: "sheet-123" } } });
    expect(result.sink.sheets).toEqual({
      spreadsheetId: "sheet-123",
      sheetName: "Sheet1",
      keyFile: "",
    });
  });

  it("rejects unknown keys", () => {
    const result = StudyConfigSchema.safeParse({ study: { passTreshold: 4 } });
    expect(result.success).toBe(false);
  });

  it("rejects an unknown sink failure policy", () => {
    const result = StudySettingsSchema.safeParse({ onSinkFailure: "retry" });
    expect(result.success).toBe(false);
  });

  it("rejects a negative pass threshold", () => {
    const result = StudySettingsSchema.safeParse({ passThreshold: -1 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(["passThreshold"]);
    }
  });

  it("accepts a zero pass threshold", () => {
    expect(StudySettingsSchema.parse({ passThreshold: 0 }).passThreshold).toBe(0);
  });
});
