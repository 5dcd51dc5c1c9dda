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
 * Decides which questions are on screen and whether a submission is complete.
 */

import type { Catalog } from "../content/catalog.js";
import type { Item, Question } from "../content/types.js";
import { currentItem, currentQuestions } from "../flow/flow-state.js";
import type { FlowState } from "../flow/types.js";
import { DEFAULT_REQUIRED_SELECTIONS } from "./options.js";
import type { Answer } from "./score-calculator.js";

export interface QuestionSet {
  item: Item;
  questions: readonly Question[];
  /** How many leading questions are visible; 0 before the questions step. */
  visibleCount: number;
}

export interface ValidationIssue {
  /** Question id or intake field name. */
  field: string;
  message: string;
}

export type SubmittedAnswers = Readonly<Record<string, Answer | undefined>>;

export function currentQuestionSet(catalog: Catalog, state: FlowState): QuestionSet | null {
  const item = currentItem(catalog, state);
  if (!item) return null;

  const questions = currentQuestions(catalog, state);
  const view = state.view;
  const visibleCount =
    view?.step === "questions"
      ? Math.min(view.revealed.filter(Boolean).length, questions.length)
      : 0;
  return { item, questions, visibleCount };
}

export function requiredSelections(question: Question): number {
  return question.requiredSelections ?? DEFAULT_REQUIRED_SELECTIONS;
}

function validateOne(
  question: Question,
  answer: Answer | undefined,
  interacted: boolean,
): string | null {
  if (answer === undefined) return "Please answer this question.";

  if (question.kind === "multi-choice") {
    const selected = typeof answer === "string" ? [answer] : answer;
    const needed = requiredSelections(question);
    if (new Set(selected).size !== selected.length || selected.length !== needed) {
      return `Please select exactly ${needed} options.`;
    }
    if (!selected.every((s) => question.options.includes(s))) {
      return "Please choose from the listed options.";
    }
    return null;
  }

  if (typeof answer !== "string" || !question.options.includes(answer)) {
    return "Please choose one of the listed options.";
  }
  if (question.kind === "ordinal" && !interacted) {
    return "Please move the slider for this question.";
  }
  return null;
}

/**
 * Returns one issue per incomplete question, in question order. An empty
 * result means the submission may be scored and saved.
 */
export function validateSubmission(
  questions: readonly Question[],
  answers: SubmittedAnswers,
  interacted: Readonly<Record<string, boolean>>,
): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  for (const question of questions) {
    const message = validateOne(question, answers[question.id], interacted[question.id] === true);
    if (message !== null) issues.push({ field: question.id, message });
  }
  return issues;
}
