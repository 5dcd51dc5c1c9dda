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
import {
  buildResponseRecord,
  correctnessLabel,
  formatChoice,
  formatTimestamp,
  stripHtml,
} from "../../../src/responses/record.js";
import { RESPONSE_FIELDS, recordToRow } from "../../../src/responses/types.js";
import { makeItem } from "../../helpers/catalog-fixture.js";

const participant = { email: "p@example.com", age: 30, gender: "Female" };

describe("record formatting", () => {
  it("strips highlight markup from question text", () => {
    expect(stripHtml("Has <b class='highlight-trait'>Sad</b> increased?")).toBe("Has Sad increased?");
  });

  it("formats timestamps as local YYYY-MM-DD HH:MM:SS", () => {
    expect(formatTimestamp(new Date(2026, 0, 5, 9, 3, 7))).toBe("2026-01-05 09:03:07");
  });

  it("joins multi-choice answers with a comma", () => {
    expect(formatChoice(["Humorous", "Casual"])).toBe("Humorous, Casual");
    expect(formatChoice("Yes")).toBe("Yes");
  });

  it("labels correctness", () => {
    expect(correctnessLabel(true)).toBe("True");
    expect(correctnessLabel(false)).toBe("False");
    expect(correctnessLabel(null)).toBe("N/A");
  });
});

describe("buildResponseRecord", () => {
  it("builds one flat record per answered question", () => {
    const item = makeItem({ id: "cmp-1", videoId: "vid-9" });
    const record = buildResponseRecord({
      participant,
      phase: "user_study_part2",
      item,
      question: {
        id: "tone_comparison",
        kind: "single-choice",
        prompt: "Which is more <b class='highlight-trait'>Excited</b>?",
        options: ["Caption A", "Caption B"],
      },
      answer: "Caption A",
      wasCorrect: null,
      now: new Date(2026, 2, 1, 14, 0, 0),
    });

    expect(record).toEqual({
      email: "p@example.com",
      age: 30,
      gender: "Female",
      timestamp: "2026-03-01 14:00:00",
      study_phase: "user_study_part2",
      video_id: "vid-9",
      sample_id: "cmp-1",
      question_text: "Which is more Excited?",
      user_choice: "Caption A",
      was_correct: "N/A",
      attempts_taken: 1,
    });
    expect(recordToRow(record)).toEqual([
      "p@example.com",
      30,
      "Female",
      "2026-03-01 14:00:00",
      "user_study_part2",
      "vid-9",
      "cmp-1",
      "Which is more Excited?",
      "Caption A",
      "N/A",
      1,
    ]);
    expect(RESPONSE_FIELDS).toHaveLength(11);
  });
});
