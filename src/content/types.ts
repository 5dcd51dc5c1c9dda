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

// ---------------------------------------------------------------------------
// Questions
// ---------------------------------------------------------------------------

export type QuestionKind = "single-choice" | "multi-choice" | "ordinal";

/**
 * A fully resolved question. Templates, placeholders and per-trait overrides
 * are applied at load time, so `prompt` is final display text (it may carry
 * highlight markup).
 */
export interface Question {
  readonly id: string;
  readonly kind: QuestionKind;
  readonly prompt: string;
  readonly options: readonly string[];
  /** Present on quiz questions only; study questions are unscored. */
  readonly correctAnswer?: string | readonly string[];
  /** Exact number of selections a multi-choice question takes. */
  readonly requiredSelections?: number;
  readonly explanation?: string;
}

// ---------------------------------------------------------------------------
// Items
// ---------------------------------------------------------------------------

export interface ComprehensionCheck {
  readonly correctAnswer: string;
  readonly distractors: readonly string[];
}

export interface CaptionText {
  readonly label: string;
  readonly text: string;
}

/**
 * One unit of work in the quiz or the main study: a video, its captions, and
 * the questions asked about them.
 */
export interface Item {
  /** Sample identifier: quiz item id, caption id, comparison id or change id. */
  readonly id: string;
  readonly videoId: string;
  /** Video file path relative to the content directory. */
  readonly videoPath: string;
  readonly watchSeconds: number;
  readonly summary?: string;
  readonly comprehension?: ComprehensionCheck;
  /** Items sharing a key reveal their summary with the typing effect only once. */
  readonly summaryKey: string;
  /** 0 for the first caption of a video; later captions skip the video steps. */
  readonly positionInVideo: number;
  readonly captions: readonly CaptionText[];
  readonly questions: readonly Question[];
  /** Terms shown in the reference glossary, in display order. */
  readonly terms: readonly string[];
}

// ---------------------------------------------------------------------------
// Parts
// ---------------------------------------------------------------------------

export type QuizPartKind = "identification" | "controllability" | "quality";

export interface QuizPart {
  readonly index: number;
  readonly kind: QuizPartKind;
  readonly title: string;
  readonly items: readonly Item[];
}

export type StudyPartNumber = 1 | 2 | 3;
export type StudyPartKind = "rating" | "comparison" | "intensity-change";

/** Items that share one video. Parts 2 and 3 have exactly one item per group. */
export interface VideoGroup {
  readonly videoId: string;
  readonly items: readonly Item[];
}

export interface StudyPart {
  readonly number: StudyPartNumber;
  readonly kind: StudyPartKind;
  readonly title: string;
  readonly groups: readonly VideoGroup[];
}

export const STUDY_PART_NUMBERS: readonly StudyPartNumber[] = [1, 2, 3];

// ---------------------------------------------------------------------------
// Instructions
// ---------------------------------------------------------------------------

export interface TutorialScreen {
  readonly id: string;
  readonly title: string;
  readonly body: string;
  /** Paths relative to the content directory. */
  readonly media: readonly string[];
}

export const DEFINITION_NOT_FOUND = "Definition not found.";
