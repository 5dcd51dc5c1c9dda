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
 * Flow state construction, cursors and index transitions.
 * Every function here mutates the FlowState it is given; none keep state of
 * their own.
 */

import type { Catalog } from "../content/catalog.js";
import type {
  Item,
  Question,
  QuizPart,
  StudyPart,
  StudyPartNumber,
  VideoGroup,
} from "../content/types.js";
import { transitionPhase } from "./state-machine.js";
import type {
  FlowState,
  ItemView,
  QuizProgress,
  RandomSource,
  StudyProgress,
} from "./types.js";

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

export function initialQuizProgress(): QuizProgress {
  return { partIndex: 0, itemIndex: 0, subQuestionIndex: 0, score: 0, scoredKeys: [] };
}

export function initialStudyProgress(partNumber: StudyPartNumber = 1): StudyProgress {
  return { partNumber, videoIndex: 0, captionIndex: 0, comparisonIndex: 0, changeIndex: 0 };
}

export function createFlowState(): FlowState {
  return {
    phase: "demographics",
    participant: null,
    tutorialIndex: 0,
    quiz: initialQuizProgress(),
    study: initialStudyProgress(),
    view: null,
    lastAnswer: null,
    summarySeen: [],
  };
}

// ---------------------------------------------------------------------------
// Study indices
// ---------------------------------------------------------------------------

/** Index of the current video group: video, comparison or change index. */
export function studyGroupIndex(study: StudyProgress): number {
  switch (study.partNumber) {
    case 1:
      return study.videoIndex;
    case 2:
      return study.comparisonIndex;
    case 3:
      return study.changeIndex;
  }
}

function setStudyGroupIndex(study: StudyProgress, index: number): void {
  switch (study.partNumber) {
    case 1:
      study.videoIndex = index;
      study.captionIndex = 0;
      return;
    case 2:
      study.comparisonIndex = index;
      return;
    case 3:
      study.changeIndex = index;
      return;
  }
}

/** Position of the current item within its group; only part 1 has more than one. */
export function studyItemIndex(study: StudyProgress): number {
  return study.partNumber === 1 ? study.captionIndex : 0;
}

function nextPartNumber(current: StudyPartNumber): StudyPartNumber | null {
  if (current === 1) return 2;
  if (current === 2) return 3;
  return null;
}

// ---------------------------------------------------------------------------
// Cursors
// ---------------------------------------------------------------------------

export interface QuizPosition {
  part: QuizPart;
  item: Item;
  question: Question;
}

export interface StudyPosition {
  part: StudyPart;
  group: VideoGroup;
  item: Item;
}

export function currentQuizPosition(catalog: Catalog, state: FlowState): QuizPosition | null {
  if (state.phase !== "quiz") return null;
  const part = catalog.quizParts()[state.quiz.partIndex];
  const item = part?.items[state.quiz.itemIndex];
  const question = item?.questions[state.quiz.subQuestionIndex];
  if (!part || !item || !question) return null;
  return { part, item, question };
}

export function currentStudyPosition(catalog: Catalog, state: FlowState): StudyPosition | null {
  if (state.phase !== "main-study") return null;
  const part = catalog.studyPart(state.study.partNumber);
  const group = part?.groups[studyGroupIndex(state.study)];
  const item = group?.items[studyItemIndex(state.study)];
  if (!part || !group || !item) return null;
  return { part, group, item };
}

export function currentItem(catalog: Catalog, state: FlowState): Item | null {
  return (
    currentQuizPosition(catalog, state)?.item ?? currentStudyPosition(catalog, state)?.item ?? null
  );
}

/** Key of the item under the cursor; a view with a different key is stale. */
export function currentItemKey(state: FlowState): string | null {
  if (state.phase === "quiz") return `quiz:${state.quiz.partIndex}:${state.quiz.itemIndex}`;
  if (state.phase === "main-study") {
    const { study } = state;
    return `study:${study.partNumber}:${studyGroupIndex(study)}:${studyItemIndex(study)}`;
  }
  return null;
}

/**
 * The questions answered together on the current screen: the single current
 * sub-question in the quiz, every question of the item in the main study.
 */
export function currentQuestions(catalog: Catalog, state: FlowState): readonly Question[] {
  const quiz = currentQuizPosition(catalog, state);
  if (quiz) return [quiz.question];
  return currentStudyPosition(catalog, state)?.item.questions ?? [];
}

// ---------------------------------------------------------------------------
// Cursor settling (empty parts are skipped)
// ---------------------------------------------------------------------------

function settleQuizCursor(catalog: Catalog, quiz: QuizProgress): boolean {
  const parts = catalog.quizParts();
  while (quiz.partIndex < parts.length) {
    const part = parts[quiz.partIndex];
    if (part && quiz.itemIndex < part.items.length) return true;
    quiz.partIndex += 1;
    quiz.itemIndex = 0;
    quiz.subQuestionIndex = 0;
  }
  return false;
}

function settleStudyCursor(catalog: Catalog, study: StudyProgress): boolean {
  for (;;) {
    const groups = catalog.studyPart(study.partNumber)?.groups ?? [];
    const groupIndex = studyGroupIndex(study);
    const group = groups[groupIndex];
    if (group && studyItemIndex(study) < group.items.length) return true;
    if (group) {
      setStudyGroupIndex(study, groupIndex + 1);
      continue;
    }
    const next = nextPartNumber(study.partNumber);
    if (next === null) return false;
    study.partNumber = next;
    setStudyGroupIndex(study, 0);
  }
}

// ---------------------------------------------------------------------------
// Phase entry and advancement
// ---------------------------------------------------------------------------

/** Places the cursor on the first quiz item; with no items the quiz finishes at once. */
export function enterQuiz(catalog: Catalog, state: FlowState): void {
  state.quiz = initialQuizProgress();
  state.view = null;
  if (!settleQuizCursor(catalog, state.quiz)) {
    state.phase = transitionPhase(state.phase, "quiz-finished");
  }
}

/** Places the cursor on the first study item of `partNumber` or a later part. */
export function enterStudy(catalog: Catalog, state: FlowState, partNumber: StudyPartNumber = 1): void {
  state.study = initialStudyProgress(partNumber);
  state.view = null;
  if (!settleStudyCursor(catalog, state.study)) {
    state.phase = transitionPhase(state.phase, "study-finished");
  }
}

/**
 * Puts the quiz cursor at the start of part `partIndex`, keeping the score.
 * An empty target part settles onto the next non-empty one.
 */
export function jumpToQuizPart(catalog: Catalog, state: FlowState, partIndex: number): void {
  state.quiz.partIndex = partIndex;
  state.quiz.itemIndex = 0;
  state.quiz.subQuestionIndex = 0;
  state.view = null;
  if (!settleQuizCursor(catalog, state.quiz)) {
    state.phase = transitionPhase(state.phase, "quiz-finished");
  }
}

export type AdvanceResult = "sub-question" | "item" | "finished";

/**
 * Moves past the current quiz question. The last question of the last part
 * transitions to quiz-results exactly once.
 */
export function advanceQuiz(catalog: Catalog, state: FlowState): AdvanceResult {
  const position = currentQuizPosition(catalog, state);
  if (!position) {
    throw new Error("advanceQuiz called without a current quiz question");
  }

  const quiz = state.quiz;
  if (quiz.subQuestionIndex + 1 < position.item.questions.length) {
    quiz.subQuestionIndex += 1;
    if (state.view) resetQuestionReveal(state.view, 1);
    return "sub-question";
  }

  quiz.itemIndex += 1;
  quiz.subQuestionIndex = 0;
  state.view = null;
  if (settleQuizCursor(catalog, quiz)) return "item";

  state.phase = transitionPhase(state.phase, "quiz-finished");
  return "finished";
}

/**
 * Moves past the current study item. The last item of part 3 transitions to
 * done exactly once.
 */
export function advanceStudy(catalog: Catalog, state: FlowState): AdvanceResult {
  const study = state.study;
  if (study.partNumber === 1) {
    study.captionIndex += 1;
  } else {
    setStudyGroupIndex(study, studyGroupIndex(study) + 1);
  }
  state.view = null;
  if (settleStudyCursor(catalog, study)) return "item";

  state.phase = transitionPhase(state.phase, "study-finished");
  return "finished";
}

// ---------------------------------------------------------------------------
// Item views
// ---------------------------------------------------------------------------

/** True while the item's watch pause is still running. */
export function isWatchPending(view: ItemView, now: number): boolean {
  if (view.step !== "watching" || view.watchStartedAt === null) return false;
  return now < view.watchStartedAt + view.watchSeconds * 1000;
}

/** Fisher–Yates shuffle into a new array. */
export function shuffle<T>(values: readonly T[], random: RandomSource): T[] {
  const result = [...values];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const a = result[i];
    const b = result[j];
    if (a === undefined || b === undefined) continue;
    result[i] = b;
    result[j] = a;
  }
  return result;
}

export function resetQuestionReveal(view: ItemView, questionCount: number): void {
  view.interacted = {};
  view.savedQuestionIds = [];
  view.revealed = Array.from({ length: questionCount }, (_, i) => i === 0);
}

/**
 * Fresh view for an item. Later captions of an already shown video start at
 * the content step.
 */
export function openItemView(
  item: Item,
  itemKey: string,
  questionCount: number,
  now: number,
  random: RandomSource,
): ItemView {
  const continuing = item.positionInVideo > 0;
  const check = item.comprehension;
  const view: ItemView = {
    itemKey,
    step: continuing ? "content" : "watching",
    watchStartedAt: continuing ? null : now,
    watchSeconds: item.watchSeconds,
    summaryRevealed: continuing,
    summaryTyped: false,
    comprehension: check
      ? {
          options: shuffle([check.correctAnswer, ...check.distractors], random),
          choice: null,
          correct: null,
        }
      : null,
    revealed: [],
    interacted: {},
    savedQuestionIds: [],
  };
  resetQuestionReveal(view, questionCount);
  return view;
}

/**
 * Opens a view for the item under the cursor when there is none or the
 * current one belongs to another item.
 */
export function syncItemView(
  catalog: Catalog,
  state: FlowState,
  now: number,
  random: RandomSource,
): ItemView | null {
  const key = currentItemKey(state);
  const item = currentItem(catalog, state);
  if (key === null || item === null) {
    state.view = null;
    return null;
  }
  if (state.view?.itemKey !== key) {
    state.view = openItemView(item, key, currentQuestions(catalog, state).length, now, random);
  }
  return state.view;
}

/** Marks the item's summary as revealed; the typing effect plays only on the first reveal. */
export function revealSummary(state: FlowState, view: ItemView, item: Item, typed: boolean): void {
  const firstReveal = !state.summarySeen.includes(item.summaryKey);
  view.summaryRevealed = true;
  view.summaryTyped = typed && firstReveal;
  if (firstReveal) state.summarySeen.push(item.summaryKey);
}

/** Records an interaction and reveals one more question per distinct interacted question. */
export function markInteracted(
  view: ItemView,
  questions: readonly Question[],
  questionId: string,
): void {
  view.interacted[questionId] = true;
  const count = questions.filter((q) => view.interacted[q.id] === true).length;
  view.revealed = questions.map((_, i) => i <= count);
}
