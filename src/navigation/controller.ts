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
 * Maps participant actions onto flow state transitions.
 *
 * The controller holds only its collaborators; every call receives the
 * participant's FlowState explicitly and mutates it in place. Navigation is
 * forward-only apart from the part jump and the quiz retry.
 */

import type { StudySettings } from "../config/schema.js";
import type { Catalog } from "../content/catalog.js";
import type { Item, StudyPartNumber } from "../content/types.js";
import {
  type AdvanceResult,
  advanceQuiz,
  advanceStudy,
  currentItem,
  currentQuestions,
  enterQuiz,
  enterStudy,
  isWatchPending,
  jumpToQuizPart,
  markInteracted,
  revealSummary,
  syncItemView,
} from "../flow/flow-state.js";
import { StateTransitionError, nextStep, transitionPhase } from "../flow/state-machine.js";
import {
  type Clock,
  type FlowState,
  type ItemView,
  type PhaseEvent,
  type RandomSource,
  systemClock,
} from "../flow/types.js";
import { DEBUG_PARTICIPANT, IntakeSubmissionSchema } from "../intake/schemas.js";
import { type SubmittedAnswers, validateSubmission } from "../questions/renderer.js";
import { type Answer, isPassing, scoreQuestion } from "../questions/score-calculator.js";
import { buildResponseRecord } from "../responses/record.js";
import type { ResponseRecord, SinkResult, StudyPhaseLabel } from "../responses/types.js";
import { SinkWriteError, ValidationError } from "./errors.js";

export type NavigationSettings = Pick<
  StudySettings,
  "passThreshold" | "onSinkFailure" | "allowIntakeBypass"
>;

export interface ResponseSaver {
  save(record: ResponseRecord): Promise<SinkResult>;
}

export interface NavigationDeps {
  catalog: Catalog;
  sink: ResponseSaver;
  settings: NavigationSettings;
  clock?: Clock;
  random?: RandomSource;
}

export interface QuestionResult {
  questionId: string;
  wasCorrect: boolean | null;
}

export interface SubmissionOutcome {
  results: QuestionResult[];
  /** False only under the "advance" policy after both targets failed for some record. */
  persisted: boolean;
  warnings: string[];
  advanced: AdvanceResult;
}

interface PendingRecord {
  questionId: string;
  record: ResponseRecord;
}

const STUDY_PHASE_LABELS: Record<StudyPartNumber, StudyPhaseLabel> = {
  1: "user_study_part1",
  2: "user_study_part2",
  3: "user_study_part3",
};

export class NavigationController {
  private readonly catalog: Catalog;
  private readonly sink: ResponseSaver;
  private readonly settings: NavigationSettings;
  private readonly clock: Clock;
  private readonly random: RandomSource;

  constructor(deps: NavigationDeps) {
    this.catalog = deps.catalog;
    this.sink = deps.sink;
    this.settings = deps.settings;
    this.clock = deps.clock ?? systemClock;
    this.random = deps.random ?? Math.random;
  }

  // -------------------------------------------------------------------------
  // Intake
  // -------------------------------------------------------------------------

  completeIntake(state: FlowState, input: unknown): void {
    this.requirePhase(state, "demographics", "intake-completed");
    const parsed = IntakeSubmissionSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(
        parsed.error.issues.map((issue) => ({
          field: String(issue.path[0] ?? "form"),
          message: issue.message,
        })),
      );
    }

    const { email, age, gender } = parsed.data;
    state.participant = Object.freeze({ email, age, gender });
    this.changePhase(state, "intake-completed");
  }

  /** Development shortcut: canned identity, straight to the main study. */
  bypassIntake(state: FlowState): void {
    if (!this.settings.allowIntakeBypass) {
      throw new StateTransitionError(state.phase, "intake-bypassed", "intake bypass is disabled");
    }
    this.requirePhase(state, "demographics", "intake-bypassed");
    state.participant = DEBUG_PARTICIPANT;
    this.changePhase(state, "intake-bypassed");
    enterStudy(this.catalog, state);
    this.sync(state);
  }

  // -------------------------------------------------------------------------
  // Forward movement
  // -------------------------------------------------------------------------

  /**
   * Context-dependent forward move. Inside an item it advances one step; at
   * the questions step it does nothing.
   */
  proceed(state: FlowState): void {
    switch (state.phase) {
      case "intro":
        this.changePhase(state, "intro-finished");
        state.tutorialIndex = 0;
        return;
      case "tutorial":
        if (state.tutorialIndex + 1 < this.catalog.tutorialScreens().length) {
          state.tutorialIndex += 1;
          return;
        }
        this.changePhase(state, "tutorial-finished");
        enterQuiz(this.catalog, state);
        this.sync(state);
        return;
      case "quiz-results":
        if (!isPassing(state.quiz.score, this.settings.passThreshold)) {
          throw new StateTransitionError(state.phase, "quiz-passed", "quiz not passed");
        }
        this.changePhase(state, "quiz-passed");
        state.lastAnswer = null;
        enterStudy(this.catalog, state);
        this.sync(state);
        return;
      case "quiz":
      case "main-study":
        this.proceedItem(state);
        return;
      default:
        throw new StateTransitionError(state.phase, "proceed");
    }
  }

  /** Manual override: ends the watch pause at once and moves past it. */
  finishWatching(state: FlowState): void {
    const { view, item } = this.requireItem(state, "finish-watching");
    if (view.step !== "watching") return;
    state.lastAnswer = null;
    this.advanceStep(state, view, item);
  }

  answerComprehension(state: FlowState, choice: string): void {
    const { view, item } = this.requireItem(state, "answer-comprehension");
    this.guardWatch(view, "answer-comprehension");
    const check = view.comprehension;
    if (view.step !== "comprehension" || !check || !item.comprehension) {
      throw new StateTransitionError(view.step, "answer-comprehension");
    }
    if (check.choice !== null) {
      throw new StateTransitionError(view.step, "answer-comprehension", "already answered");
    }
    if (!check.options.includes(choice)) {
      throw new ValidationError([
        { field: "comprehension", message: "Please choose one of the listed options." },
      ]);
    }
    check.choice = choice;
    check.correct = choice === item.comprehension.correctAnswer;
  }

  recordInteraction(state: FlowState, questionId: string): void {
    const { view } = this.requireItem(state, "interact");
    this.guardWatch(view, "interact");
    if (view.step !== "questions") {
      throw new StateTransitionError(view.step, "interact");
    }
    const questions = currentQuestions(this.catalog, state);
    const index = questions.findIndex((q) => q.id === questionId);
    if (index === -1) {
      throw new ValidationError([{ field: questionId, message: "Unknown question." }]);
    }
    if (view.revealed[index] !== true) {
      throw new StateTransitionError(view.step, "interact", `question ${questionId} is not revealed yet`);
    }
    markInteracted(view, questions, questionId);
  }

  /** Marks the summary as seen and jumps straight to the questions. */
  skipToQuestions(state: FlowState): void {
    const { view, item } = this.requireItem(state, "skip-to-questions");
    this.guardWatch(view, "skip-to-questions");
    if (view.step === "questions") return;
    state.lastAnswer = null;
    revealSummary(state, view, item, false);
    view.step = "questions";
  }

  // -------------------------------------------------------------------------
  // Submission
  // -------------------------------------------------------------------------

  /**
   * Validates, scores, persists one record per question and advances.
   * @throws ValidationError when any question is incomplete; nothing changes.
   * @throws SinkWriteError when both targets failed for any record under the
   *   "block" policy; neither the score nor the cursor moves, and records that
   *   were accepted are not written again on retry.
   */
  async submitAnswer(state: FlowState, answers: SubmittedAnswers): Promise<SubmissionOutcome> {
    const { view, item } = this.requireItem(state, "submit");
    this.guardWatch(view, "submit");
    if (view.step !== "questions") {
      throw new StateTransitionError(view.step, "submit");
    }
    const participant = state.participant;
    if (!participant) {
      throw new StateTransitionError(state.phase, "submit", "no participant");
    }

    const questions = currentQuestions(this.catalog, state);
    const issues = validateSubmission(questions, answers, view.interacted);
    if (issues.length > 0) throw new ValidationError(issues);

    const inQuiz = state.phase === "quiz";
    const phaseLabel = this.phaseLabel(state);
    const now = new Date(this.clock.now());
    const results: QuestionResult[] = [];
    const pending: PendingRecord[] = [];

    for (const question of questions) {
      const answer: Answer = answers[question.id] ?? "";
      const wasCorrect = inQuiz ? scoreQuestion(question, answer) : null;
      results.push({ questionId: question.id, wasCorrect });
      if (view.savedQuestionIds.includes(question.id)) continue;
      pending.push({
        questionId: question.id,
        record: buildResponseRecord({ participant, phase: phaseLabel, item, question, answer, wasCorrect, now }),
      });
    }

    const saved = await this.persist(view, pending);
    if (!saved.ok && this.settings.onSinkFailure === "block") {
      throw new SinkWriteError(saved.error, saved.warnings);
    }
    if (!saved.ok) {
      console.warn(`[flow] Advancing after failed save (${phaseLabel}, sample ${item.id})`);
    }
    for (const result of results) {
      if (result.wasCorrect) this.credit(state, item, result.questionId);
    }

    const question = questions[0];
    state.lastAnswer =
      inQuiz && question
        ? {
            questionId: question.id,
            answer: answers[question.id] ?? "",
            wasCorrect: results[0]?.wasCorrect ?? null,
            correctAnswer: question.correctAnswer,
            explanation: question.explanation,
          }
        : null;

    const phaseBefore = state.phase;
    const advanced = inQuiz ? advanceQuiz(this.catalog, state) : advanceStudy(this.catalog, state);
    this.logPhaseChange(phaseBefore, state);
    this.sync(state);

    return {
      results,
      persisted: saved.ok,
      warnings: saved.warnings,
      advanced,
    };
  }

  // -------------------------------------------------------------------------
  // Part jump and retry
  // -------------------------------------------------------------------------

  /**
   * Quiz: 0-based part index. Main study: part number 1–3. Resets the
   * target part's indices and discards the per-item view.
   */
  jumpToPart(state: FlowState, index: number): void {
    if (state.phase === "quiz") {
      const parts = this.catalog.quizParts();
      if (!Number.isInteger(index) || index < 0 || index >= parts.length) {
        throw new ValidationError([{ field: "part", message: `No quiz part ${index}.` }]);
      }
      state.lastAnswer = null;
      const phaseBefore = state.phase;
      jumpToQuizPart(this.catalog, state, index);
      this.logPhaseChange(phaseBefore, state);
      this.sync(state);
      return;
    }

    if (state.phase === "main-study") {
      if (index !== 1 && index !== 2 && index !== 3) {
        throw new ValidationError([{ field: "part", message: `No study part ${index}.` }]);
      }
      state.lastAnswer = null;
      enterStudy(this.catalog, state, index);
      this.sync(state);
      return;
    }

    throw new StateTransitionError(state.phase, "jump-to-part");
  }

  /** Retry after a failed quiz: indices and score back to zero, identity kept. */
  restartQuiz(state: FlowState): void {
    this.requirePhase(state, "quiz-results", "quiz-retried");
    if (isPassing(state.quiz.score, this.settings.passThreshold)) {
      throw new StateTransitionError(state.phase, "quiz-retried", "quiz already passed");
    }
    this.changePhase(state, "quiz-retried");
    state.lastAnswer = null;
    enterQuiz(this.catalog, state);
    this.sync(state);
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private proceedItem(state: FlowState): void {
    const { view, item } = this.requireItem(state, "proceed");
    switch (view.step) {
      case "watching":
        this.guardWatch(view, "proceed");
        break;
      case "comprehension":
        if (view.comprehension?.choice === null) {
          throw new StateTransitionError(view.step, "proceed", "comprehension question not answered");
        }
        break;
      case "questions":
        return;
      default:
        break;
    }
    state.lastAnswer = null;
    this.advanceStep(state, view, item);
  }

  private advanceStep(state: FlowState, view: ItemView, item: Item): void {
    const next = nextStep(view.step, item);
    if (next === "summary") revealSummary(state, view, item, true);
    view.step = next;
  }

  private credit(state: FlowState, item: Item, questionId: string): void {
    const key = `${state.quiz.partIndex}:${item.id}:${questionId}`;
    if (state.quiz.scoredKeys.includes(key)) return;
    state.quiz.scoredKeys.push(key);
    state.quiz.score += 1;
  }

  /**
   * Offers every record to the sink in order, remembering on the view which
   * questions were accepted so a retried submission skips them.
   */
  private async persist(
    view: ItemView,
    pending: readonly PendingRecord[],
  ): Promise<{ ok: true; warnings: string[] } | { ok: false; warnings: string[]; error: string }> {
    const warnings: string[] = [];
    const errors: string[] = [];
    for (const { questionId, record } of pending) {
      const result = await this.sink.save(record);
      warnings.push(...result.warnings);
      if (result.ok) view.savedQuestionIds.push(questionId);
      else errors.push(result.error);
    }
    if (errors.length > 0) return { ok: false, warnings, error: errors.join("; ") };
    return { ok: true, warnings };
  }

  private phaseLabel(state: FlowState): StudyPhaseLabel {
    if (state.phase === "quiz") return "quiz";
    return STUDY_PHASE_LABELS[state.study.partNumber];
  }

  private requirePhase(state: FlowState, phase: FlowState["phase"], event: string): void {
    if (state.phase !== phase) {
      throw new StateTransitionError(state.phase, event);
    }
  }

  private requireItem(state: FlowState, event: string): { view: ItemView; item: Item } {
    const item = currentItem(this.catalog, state);
    const view = item ? syncItemView(this.catalog, state, this.clock.now(), this.random) : null;
    if (!item || !view) {
      throw new StateTransitionError(state.phase, event, "no item on screen");
    }
    return { view, item };
  }

  private guardWatch(view: ItemView, event: string): void {
    if (isWatchPending(view, this.clock.now())) {
      throw new StateTransitionError(view.step, event, "video still playing");
    }
  }

  private changePhase(state: FlowState, event: PhaseEvent): void {
    const before = state.phase;
    state.phase = transitionPhase(state.phase, event);
    this.logPhaseChange(before, state);
  }

  private logPhaseChange(before: FlowState["phase"], state: FlowState): void {
    if (before === state.phase) return;
    if (state.phase === "quiz-results") {
      console.log(
        `[flow] Quiz finished: ${state.quiz.score}/${this.catalog.scorableQuizQuestionCount()} correct`,
      );
    }
    console.log(`[flow] Phase ${before} → ${state.phase}`);
  }

  private sync(state: FlowState): void {
    syncItemView(this.catalog, state, this.clock.now(), this.random);
  }
}
