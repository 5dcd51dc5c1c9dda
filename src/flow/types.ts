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
 * Flow state types. A FlowState is plain JSON-serialisable data owned by one
 * participant session and mutated only by the navigation controller.
 */

import type { StudyPartNumber } from "../content/types.js";
import type { Participant } from "../intake/schemas.js";
import type { Answer } from "../questions/score-calculator.js";

export type Phase =
  | "demographics"
  | "intro"
  | "tutorial"
  | "quiz"
  | "quiz-results"
  | "main-study"
  | "done";

export type PhaseEvent =
  | "intake-completed"
  | "intake-bypassed"
  | "intro-finished"
  | "tutorial-finished"
  | "quiz-finished"
  | "quiz-passed"
  | "quiz-retried"
  | "study-finished";

/** Per-item reveal sequence. Submission is the implicit step after `questions`. */
export type Step = "watching" | "summary" | "comprehension" | "content" | "questions";

export interface ComprehensionView {
  /** Correct answer plus distractors, shuffled once when the view opens. */
  options: string[];
  choice: string | null;
  correct: boolean | null;
}

export interface ItemView {
  /** Identifies the item this view belongs to. */
  itemKey: string;
  step: Step;
  /** Epoch ms when the watch pause began; null once the item starts past it. */
  watchStartedAt: number | null;
  watchSeconds: number;
  summaryRevealed: boolean;
  /** True when this item's reveal was the first for its summary key. */
  summaryTyped: boolean;
  comprehension: ComprehensionView | null;
  /** revealed[i]: question i is visible once the questions step is reached. */
  revealed: boolean[];
  interacted: Record<string, boolean>;
  /** Questions of the current submission already accepted by a target. */
  savedQuestionIds: string[];
}

export interface LastAnswer {
  questionId: string;
  answer: Answer;
  wasCorrect: boolean | null;
  correctAnswer?: string | readonly string[];
  explanation?: string;
}

export interface QuizProgress {
  partIndex: number;
  itemIndex: number;
  subQuestionIndex: number;
  score: number;
  /** Questions already credited, so each scores at most once. */
  scoredKeys: string[];
}

export interface StudyProgress {
  partNumber: StudyPartNumber;
  videoIndex: number;
  captionIndex: number;
  comparisonIndex: number;
  changeIndex: number;
}

export interface FlowState {
  phase: Phase;
  participant: Participant | null;
  tutorialIndex: number;
  quiz: QuizProgress;
  study: StudyProgress;
  view: ItemView | null;
  lastAnswer: LastAnswer | null;
  /** Summary keys already revealed once. */
  summarySeen: string[];
}

export interface Clock {
  now(): number;
}

/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

export const systemClock: Clock = { now: () => Date.now() };
