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

import type { ResponseRecord, ResponseTarget } from "../../src/responses/types.js";

export function makeRecord(overrides: Partial<ResponseRecord> = {}): ResponseRecord {
  return {
    email: "p@example.com",
    age: 30,
    gender: "Female",
    timestamp: "2026-03-01 14:00:00",
    study_phase: "quiz",
    video_id: "vid-1",
    sample_id: "id-1",
    question_text: "What is the most dominant tone in the caption?",
    user_choice: "Sarcastic",
    was_correct: "True",
    attempts_taken: 1,
    ...overrides,
  };
}

/** In-memory target; set `failWith` to make every append throw. */
export class MemoryTarget implements ResponseTarget {
  readonly records: ResponseRecord[] = [];
  failWith: Error | null = null;

  constructor(readonly name: string) {}

  async append(record: ResponseRecord): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.records.push(record);
  }
}
