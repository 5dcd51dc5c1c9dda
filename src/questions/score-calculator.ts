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

import type { Question, QuizPart } from "../content/types.js";

export const DEFAULT_PASS_THRESHOLD = 5;

export type QuizStatus = "Passed" | "Failed";

/** A submitted answer: one option, or several for multi-choice questions. */
export type Answer = string | readonly string[];

/**
 * Score a single-choice answer: exact match against the correct option.
 */
export function scoreSingleChoice(selected: string, correct: string): boolean {
  return selected === correct;
}

/**
 * Score a multi-choice answer: the selected set must equal the correct set,
 * order ignored. Selection count is checked by validation before this runs.
 */
export function scoreMultiChoice(selected: readonly string[], correct: readonly string[]): boolean {
  const want = new Set(correct);
  const got = new Set(selected);
  if (want.size !== got.size) return false;
  for (const option of got) {
    if (!want.has(option)) return false;
  }
  return true;
}

/**
 * Score a validated answer. Returns null for questions without a correct
 * answer (ordinal ratings and study comparisons).
 */
export function scoreQuestion(question: Question, answer: Answer): boolean | null {
  const correct = question.correctAnswer;
  if (correct === undefined || question.kind === "ordinal") return null;

  if (question.kind === "multi-choice") {
    const selected = typeof answer === "string" ? [answer] : answer;
    const expected = typeof correct === "string" ? [correct] : correct;
    return scoreMultiChoice(selected, expected);
  }

  if (typeof answer !== "string") return false;
  return typeof correct === "string"
    ? scoreSingleChoice(answer, correct)
    : correct.some((c) => scoreSingleChoice(answer, c));
}

export function isScorable(question: Question): boolean {
  return question.correctAnswer !== undefined && question.kind !== "ordinal";
}

/** Total number of scorable questions across all quiz parts. */
export function countScorableQuestions(parts: readonly QuizPart[]): number {
  let total = 0;
  for (const part of parts) {
    for (const item of part.items) {
      total += item.questions.filter(isScorable).length;
    }
  }
  return total;
}

/**
 * Determine pass/fail based on the cumulative score and threshold.
 */
export function isPassing(score: number, passThreshold: number = DEFAULT_PASS_THRESHOLD): boolean {
  return score >= passThreshold;
}

export function quizStatus(score: number, passThreshold: number = DEFAULT_PASS_THRESHOLD): QuizStatus {
  return isPassing(score, passThreshold) ? "Passed" : "Failed";
}
