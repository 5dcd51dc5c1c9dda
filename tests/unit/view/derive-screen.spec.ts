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

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Catalog } from "../../../src/content/catalog.js";
import { DEFINITION_NOT_FOUND } from "../../../src/content/types.js";
import { createFlowState } from "../../../src/flow/flow-state.js";
import type { FlowState } from "../../../src/flow/types.js";
import { GENDER_OPTIONS } from "../../../src/intake/schemas.js";
import { NavigationController } from "../../../src/navigation/controller.js";
import { type ScreenDescriptor, describeScreen } from "../../../src/view/derive-screen.js";
import { makeCatalog } from "../../helpers/catalog-fixture.js";

const START = 1_000_000;

let now: number;
let catalog: Catalog;
let controller: NavigationController;
let state: FlowState;

function describeNow(allowIntakeBypass = false): ScreenDescriptor {
  return describeScreen(catalog, state, { passThreshold: 3, allowIntakeBypass, now });
}

function toQuiz(): void {
  controller.completeIntake(state, { email: "p@example.com", age: 30, gender: "Male", consent: true });
  controller.proceed(state);
  controller.proceed(state);
  controller.proceed(state);
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  now = START;
  catalog = makeCatalog();
  controller = new NavigationController({
    catalog,
    sink: { save: async () => ({ ok: true, target: "memory", warnings: [] }) },
    settings: { passThreshold: 3, onSinkFailure: "block", allowIntakeBypass: true },
    clock: { now: () => now },
    random: () => 0,
  });
  state = createFlowState();
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// Fixed screens
// ---------------------------------------------------------------------------

describe("fixed screens", () => {
  it("shows the intake form, with the bypass only when enabled", () => {
    expect(describeNow()).toEqual({
      phase: "demographics",
      screen: { kind: "intake", genderOptions: GENDER_OPTIONS, minAge: 18, maxAge: 60 },
      actions: ["intake"],
      feedback: null,
      sidebar: [],
    });
    expect(describeNow(true).actions).toEqual(["intake", "bypass-intake"]);
  });

  it("shows the intro video and the tutorial screens", () => {
    controller.completeIntake(state, { email: "p@example.com", age: 30, gender: "Male", consent: true });
    expect(describeNow().screen).toEqual({ kind: "intro", video: "media/intro.mp4" });
    expect(describeNow().actions).toEqual(["proceed"]);

    controller.proceed(state);
    expect(describeNow().screen).toEqual({
      kind: "tutorial",
      index: 0,
      total: 2,
      screen: { id: "t1", title: "Welcome", body: "Intro text", media: [] },
    });
  });

  it("shows nothing to do once finished", () => {
    controller.bypassIntake(state);
    state.phase = "done";
    state.view = null;

    expect(describeNow()).toMatchObject({ screen: { kind: "done" }, actions: [], sidebar: [] });
  });
});

// ---------------------------------------------------------------------------
// Quiz items
// ---------------------------------------------------------------------------

describe("quiz item screens", () => {
  it("offers only the override and part jump while the video plays", () => {
    toQuiz();
    now += 2000;
    const descriptor = describeNow();

    expect(descriptor.actions).toEqual(["finish-watching", "jump-to-part"]);
    expect(descriptor.sidebar).toEqual([
      { index: 0, label: "Quiz A" },
      { index: 1, label: "Quiz B" },
    ]);
    expect(descriptor.screen).toMatchObject({
      kind: "item",
      mode: "quiz",
      partTitle: "Quiz A",
      progress: { item: 1, of: 2, subQuestion: 1, subQuestions: 1 },
      step: "watching",
      stepNumber: 1,
      video: { path: "media/test.mp4", watchSeconds: 5, remainingSeconds: 3 },
      summary: null,
      comprehension: null,
      captions: null,
      questions: [],
      allQuestionsVisible: false,
      glossary: [],
    });
  });

  it("offers proceed once the pause has elapsed", () => {
    toQuiz();
    now += 5000;
    const descriptor = describeNow();

    expect(descriptor.actions).toEqual(["proceed", "finish-watching", "skip-to-questions", "jump-to-part"]);
    expect(descriptor.screen).toMatchObject({ video: { remainingSeconds: 0 } });
  });

  it("shows the comprehension options and the answer once chosen", () => {
    toQuiz();
    controller.finishWatching(state);
    controller.proceed(state);

    expect(describeNow().actions).toEqual(["answer-comprehension", "skip-to-questions", "jump-to-part"]);
    expect(describeNow().screen).toMatchObject({
      summary: { text: "A dog runs.", typed: true },
      comprehension: { options: ["Cat", "Bird", "Dog"], choice: null, correct: null, correctAnswer: null },
      captions: null,
    });

    controller.answerComprehension(state, "Bird");
    expect(describeNow().actions).toEqual(["proceed", "skip-to-questions", "jump-to-part"]);
    expect(describeNow().screen).toMatchObject({
      comprehension: { choice: "Bird", correct: false, correctAnswer: "Dog" },
    });
  });

  it("shows captions, the question and the glossary at the questions step", () => {
    toQuiz();
    controller.finishWatching(state);
    controller.skipToQuestions(state);
    const descriptor = describeNow();

    expect(descriptor.actions).toEqual(["interact", "submit", "jump-to-part"]);
    expect(descriptor.screen).toMatchObject({
      step: "questions",
      stepNumber: 5,
      captions: [{ label: "Caption", text: "A test caption." }],
      questions: [
        {
          id: "q-a1",
          number: 1,
          kind: "single-choice",
          prompt: "What is the most dominant tone in the caption?",
          options: ["Sarcastic", "Formal", "Sad"],
          requiredSelections: undefined,
          interacted: false,
        },
      ],
      allQuestionsVisible: true,
      glossary: [
        { term: "Sarcastic", definition: "Mocking." },
        { term: "Formal", definition: DEFINITION_NOT_FOUND },
        { term: "Sad", definition: DEFINITION_NOT_FOUND },
      ],
    });
  });

  it("carries feedback on the previous answer", async () => {
    toQuiz();
    controller.finishWatching(state);
    controller.skipToQuestions(state);
    await controller.submitAnswer(state, { "q-a1": "Sad" });

    expect(describeNow().feedback).toEqual({
      questionId: "q-a1",
      answer: "Sad",
      wasCorrect: false,
      correctAnswer: "Sarcastic",
      explanation: "It mocks the situation.",
    });
    expect(describeNow().screen).toMatchObject({ progress: { item: 2, of: 2 } });
  });

  it("reports the selection count on multi-choice questions", async () => {
    toQuiz();
    controller.finishWatching(state);
    controller.skipToQuestions(state);
    await controller.submitAnswer(state, { "q-a1": "Sarcastic" });
    controller.finishWatching(state);
    controller.skipToQuestions(state);

    expect(describeNow().screen).toMatchObject({
      questions: [{ id: "q-a2", kind: "multi-choice", requiredSelections: 2 }],
    });
  });
});

// ---------------------------------------------------------------------------
// Study items and results
// ---------------------------------------------------------------------------

describe("study item screens", () => {
  it("reveals rating questions one at a time", () => {
    controller.bypassIntake(state);
    controller.finishWatching(state);
    controller.skipToQuestions(state);

    const before = describeNow();
    expect(before.sidebar).toEqual([
      { index: 1, label: "Part 1: Caption Rating" },
      { index: 2, label: "Part 2: Caption Comparison" },
      { index: 3, label: "Part 3: Intensity Change" },
    ]);
    expect(before.screen).toMatchObject({
      mode: "study",
      progress: { item: 1, of: 1 },
      questions: [{ id: "c1-tone", number: 1, interacted: false }],
      allQuestionsVisible: false,
      glossary: [
        { term: "Calm", definition: "Peaceful." },
        { term: "Unknown Trait", definition: DEFINITION_NOT_FOUND },
      ],
    });

    controller.recordInteraction(state, "c1-tone");
    expect(describeNow().screen).toMatchObject({
      questions: [
        { id: "c1-tone", interacted: true },
        { id: "c1-useful", number: 2, interacted: false },
      ],
      allQuestionsVisible: true,
    });
  });

  it("shows the summary without retyping on a later caption of the same video", async () => {
    controller.bypassIntake(state);
    controller.finishWatching(state);
    controller.skipToQuestions(state);
    controller.recordInteraction(state, "c1-tone");
    controller.recordInteraction(state, "c1-useful");
    await controller.submitAnswer(state, { "c1-tone": "Weak", "c1-useful": "Moderate" });

    expect(describeNow().screen).toMatchObject({
      step: "content",
      summary: { text: "Waves at sunset.", typed: false },
      video: { remainingSeconds: 0 },
    });
  });
});

describe("quiz results screen", () => {
  it("reports the score against the threshold", () => {
    toQuiz();
    state.phase = "quiz-results";
    state.view = null;
    state.quiz.score = 3;

    expect(describeNow()).toMatchObject({
      screen: { kind: "quiz-results", score: 3, total: 4, threshold: 3, status: "Passed" },
      actions: ["proceed"],
    });
  });
});
