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
 * Response record shape and the pluggable target interface.
 * Field names are the sheet header and match the exported column names.
 */

/** Column order of the response sheet. */
export const RESPONSE_FIELDS = [
  "email",
  "age",
  "gender",
  "timestamp",
  "study_phase",
  "video_id",
  "sample_id",
  "question_text",
  "user_choice",
  "was_correct",
  "attempts_taken",
] as const;

export type ResponseField = (typeof RESPONSE_FIELDS)[number];

export type StudyPhaseLabel = "quiz" | "user_study_part1" | "user_study_part2" | "user_study_part3";

export type CorrectnessLabel = "True" | "False" | "N/A";

export interface ResponseRecord {
  email: string;
  age: number;
  gender: string;
  timestamp: string;
  study_phase: StudyPhaseLabel;
  video_id: string;
  sample_id: string;
  question_text: string;
  user_choice: string;
  was_correct: CorrectnessLabel;
  attempts_taken: number;
}

export type ResponseCell = string | number;

export function recordToRow(record: ResponseRecord): ResponseCell[] {
  return RESPONSE_FIELDS.map((field) => record[field]);
}

/**
 * A durable destination for response records. `append` throws on failure;
 * the sink decides what happens next.
 */
export interface ResponseTarget {
  readonly name: string;
  append(record: ResponseRecord): Promise<void>;
}

export type SinkResult =
  | { ok: true; target: string; warnings: string[] }
  | { ok: false; warnings: string[]; error: string };
