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

import type { Item, Question } from "../content/types.js";
import type { Participant } from "../intake/schemas.js";
import type { Answer } from "../questions/score-calculator.js";
import type { CorrectnessLabel, ResponseRecord, StudyPhaseLabel } from "./types.js";

/** Every submission is a single attempt. */
export const ATTEMPTS_TAKEN = 1;

const HTML_TAG_PATTERN = /<[^<]+?>/g;

export function stripHtml(text: string): string {
  return text.replace(HTML_TAG_PATTERN, "");
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function formatChoice(answer: Answer): string {
  return typeof answer === "string" ? answer : answer.join(", ");
}

export function correctnessLabel(wasCorrect: boolean | null): CorrectnessLabel {
  if (wasCorrect === null) return "N/A";
  return wasCorrect ? "True" : "False";
}

export interface RecordInput {
  participant: Participant;
  phase: StudyPhaseLabel;
  item: Item;
  question: Question;
  answer: Answer;
  /** null for unscored questions. */
  wasCorrect: boolean | null;
  now: Date;
}

export function buildResponseRecord(input: RecordInput): ResponseRecord {
  return {
    email: input.participant.email,
    age: input.participant.age,
    gender: input.participant.gender,
    timestamp: formatTimestamp(input.now),
    study_phase: input.phase,
    video_id: input.item.videoId,
    sample_id: input.item.id,
    question_text: stripHtml(input.question.prompt),
    user_choice: formatChoice(input.answer),
    was_correct: correctnessLabel(input.wasCorrect),
    attempts_taken: ATTEMPTS_TAKEN,
  };
}
