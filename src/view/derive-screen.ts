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
 * Pure helper: derives what the participant sees from flow state + catalog.
 * Reads only; the navigation controller owns every mutation.
 */

import type { Catalog } from "../content/catalog.js";
import type { CaptionText, QuestionKind, TutorialScreen } from "../content/types.js";
import {
  currentQuizPosition,
  currentStudyPosition,
  isWatchPending,
} from "../flow/flow-state.js";
import { stepOrdinal } from "../flow/state-machine.js";
import type { FlowState, ItemView, LastAnswer, Phase, Step } from "../flow/types.js";
import { GENDER_OPTIONS, MAX_AGE, MIN_AGE } from "../intake/schemas.js";
import { currentQuestionSet, requiredSelections } from "../questions/renderer.js";
import { type QuizStatus, quizStatus } from "../questions/score-calculator.js";

export type ActionName =
  | "intake"
  | "bypass-intake"
  | "proceed"
  | "finish-watching"
  | "answer-comprehension"
  | "interact"
  | "skip-to-questions"
  | "submit"
  | "jump-to-part"
  | "restart-quiz";

export interface VisibleQuestion {
  id: string;
  number: number;
  kind: QuestionKind;
  prompt: string;
  options: readonly string[];
  requiredSelections?: number;
  interacted: boolean;
}

export interface GlossaryEntry {
  term: string;
  definition: string;
}

export interface ItemScreen {
  kind: "item";
  mode: "quiz" | "study";
  partTitle: string;
  /** 1-based positions for display. */
  progress: { item: number; of: number; subQuestion?: number; subQuestions?: number };
  step: Step;
  stepNumber: number;
  video: { path: string; watchSeconds: number; remainingSeconds: number };
  summary: { text: string; typed: boolean } | null;
  comprehension: {
    options: readonly string[];
    choice: string | null;
    correct: boolean | null;
    correctAnswer: string | null;
  } | null;
  captions: readonly CaptionText[] | null;
  questions: VisibleQuestion[];
  allQuestionsVisible: boolean;
  glossary: GlossaryEntry[];
}

export type Screen =
  | {
      kind: "intake";
      genderOptions: readonly string[];
      minAge: number;
      maxAge: number;
    }
  | { kind: "intro"; video: string }
  | { kind: "tutorial"; index: number; total: number; screen: TutorialScreen }
  | ItemScreen
  | {
      kind: "quiz-results";
      score: number;
      total: number;
      threshold: number;
      status: QuizStatus;
    }
  | { kind: "done" };

export interface JumpTarget {
  index: number;
  label: string;
}

export interface ScreenDescriptor {
  phase: Phase;
  screen: Screen;
  actions: ActionName[];
  /** Feedback on the previous quiz answer, until the next forward move. */
  feedback: LastAnswer | null;
  sidebar: JumpTarget[];
}

export interface DescribeOptions {
  passThreshold: number;
  allowIntakeBypass: boolean;
  now: number;
}

// ---------------------------------------------------------------------------
// Item screens
// ---------------------------------------------------------------------------

function itemActions(view: ItemView, now: number): ActionName[] {
  switch (view.step) {
    case "watching":
      return isWatchPending(view, now)
        ? ["finish-watching", "jump-to-part"]
        : ["proceed", "finish-watching", "skip-to-questions", "jump-to-part"];
    case "comprehension":
      return view.comprehension?.choice === null
        ? ["answer-comprehension", "skip-to-questions", "jump-to-part"]
        : ["proceed", "skip-to-questions", "jump-to-part"];
    case "summary":
    case "content":
      return ["proceed", "skip-to-questions", "jump-to-part"];
    case "questions":
      return ["interact", "submit", "jump-to-part"];
  }
}

function describeItem(catalog: Catalog, state: FlowState, view: ItemView, now: number): ItemScreen | null {
  const set = currentQuestionSet(catalog, state);
  if (!set) return null;
  const { item } = set;

  let partTitle: string;
  let progress: ItemScreen["progress"];
  const quiz = currentQuizPosition(catalog, state);
  const study = currentStudyPosition(catalog, state);
  if (quiz) {
    partTitle = quiz.part.title;
    progress = {
      item: state.quiz.itemIndex + 1,
      of: quiz.part.items.length,
      subQuestion: state.quiz.subQuestionIndex + 1,
      subQuestions: item.questions.length,
    };
  } else if (study) {
    partTitle = study.part.title;
    progress = {
      item: study.part.groups.indexOf(study.group) + 1,
      of: study.part.groups.length,
    };
  } else {
    return null;
  }

  const ordinal = stepOrdinal(view.step);
  const elapsedMs = view.watchStartedAt === null ? Number.POSITIVE_INFINITY : now - view.watchStartedAt;
  const remaining = Math.max(0, Math.ceil(view.watchSeconds - elapsedMs / 1000));
  const questionsShown = view.step === "questions";
  const check = view.comprehension;

  return {
    kind: "item",
    mode: quiz ? "quiz" : "study",
    partTitle,
    progress,
    step: view.step,
    stepNumber: ordinal,
    video: { path: item.videoPath, watchSeconds: view.watchSeconds, remainingSeconds: remaining },
    summary:
      view.summaryRevealed && item.summary !== undefined
        ? { text: item.summary, typed: view.summaryTyped }
        : null,
    comprehension:
      check && view.step === "comprehension"
        ? {
            options: check.options,
            choice: check.choice,
            correct: check.correct,
            correctAnswer: check.choice === null ? null : (item.comprehension?.correctAnswer ?? null),
          }
        : null,
    captions: ordinal >= stepOrdinal("content") ? item.captions : null,
    questions: set.questions.slice(0, set.visibleCount).map((q, i) => ({
      id: q.id,
      number: i + 1,
      kind: q.kind,
      prompt: q.prompt,
      options: q.options,
      requiredSelections: q.kind === "multi-choice" ? requiredSelections(q) : undefined,
      interacted: view.interacted[q.id] === true,
    })),
    allQuestionsVisible: questionsShown && set.visibleCount >= set.questions.length,
    glossary: questionsShown
      ? item.terms.map((term) => ({ term, definition: catalog.definitionFor(term) }))
      : [],
  };
}

// ---------------------------------------------------------------------------
// Sidebar
// ---------------------------------------------------------------------------

function sidebar(catalog: Catalog, phase: Phase): JumpTarget[] {
  if (phase === "quiz") {
    return catalog.quizParts().map((part) => ({ index: part.index, label: part.title }));
  }
  if (phase === "main-study") {
    return catalog.studyParts().map((part) => ({ index: part.number, label: part.title }));
  }
  return [];
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function describeScreen(
  catalog: Catalog,
  state: FlowState,
  options: DescribeOptions,
): ScreenDescriptor {
  const base = { phase: state.phase, feedback: state.lastAnswer, sidebar: sidebar(catalog, state.phase) };

  switch (state.phase) {
    case "demographics":
      return {
        ...base,
        screen: { kind: "intake", genderOptions: GENDER_OPTIONS, minAge: MIN_AGE, maxAge: MAX_AGE },
        actions: options.allowIntakeBypass ? ["intake", "bypass-intake"] : ["intake"],
      };
    case "intro":
      return { ...base, screen: { kind: "intro", video: catalog.introVideo }, actions: ["proceed"] };
    case "tutorial": {
      const screens = catalog.tutorialScreens();
      const screen = screens[state.tutorialIndex];
      if (!screen) throw new Error(`No tutorial screen at index ${state.tutorialIndex}`);
      return {
        ...base,
        screen: { kind: "tutorial", index: state.tutorialIndex, total: screens.length, screen },
        actions: ["proceed"],
      };
    }
    case "quiz":
    case "main-study": {
      const view = state.view;
      const screen = view ? describeItem(catalog, state, view, options.now) : null;
      if (!view || !screen) throw new Error(`No item view in phase ${state.phase}`);
      return { ...base, screen, actions: itemActions(view, options.now) };
    }
    case "quiz-results": {
      const status = quizStatus(state.quiz.score, options.passThreshold);
      return {
        ...base,
        screen: {
          kind: "quiz-results",
          score: state.quiz.score,
          total: catalog.scorableQuizQuestionCount(),
          threshold: options.passThreshold,
          status,
        },
        actions: status === "Passed" ? ["proceed"] : ["restart-quiz"],
      };
    }
    case "done":
      return { ...base, screen: { kind: "done" }, actions: [] };
  }
}
