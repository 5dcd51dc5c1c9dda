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

import type { Item } from "../content/types.js";
import type { Phase, PhaseEvent, Step } from "./types.js";

// ---------------------------------------------------------------------------
// Error
// ---------------------------------------------------------------------------

export class StateTransitionError extends Error {
  constructor(
    public readonly currentState: string,
    public readonly event: string,
    detail?: string,
  ) {
    super(
      `Invalid transition: cannot apply event '${event}' in state '${currentState}'${detail ? `: ${detail}` : ""}`,
    );
    this.name = "StateTransitionError";
  }
}

// ---------------------------------------------------------------------------
// Phase transition table
// ---------------------------------------------------------------------------

/**
 * Maps (currentPhase, event) → nextPhase for all valid phase transitions.
 * The only backward edge is the quiz retry.
 */
const PHASE_TRANSITIONS: Partial<Record<Phase, Partial<Record<PhaseEvent, Phase>>>> = {
  demographics: {
    "intake-completed": "intro",
    "intake-bypassed": "main-study",
  },
  intro: {
    "intro-finished": "tutorial",
  },
  tutorial: {
    "tutorial-finished": "quiz",
  },
  quiz: {
    "quiz-finished": "quiz-results",
  },
  "quiz-results": {
    "quiz-passed": "main-study",
    "quiz-retried": "quiz",
  },
  "main-study": {
    "study-finished": "done",
  },
  // Terminal phase: done.
};

/**
 * Returns the next Phase for the given event, or throws
 * StateTransitionError when the transition is not defined.
 */
export function transitionPhase(current: Phase, event: PhaseEvent): Phase {
  const next = PHASE_TRANSITIONS[current]?.[event];
  if (next === undefined) {
    throw new StateTransitionError(current, event);
  }
  return next;
}

export function canTransitionPhase(current: Phase, event: PhaseEvent): boolean {
  return PHASE_TRANSITIONS[current]?.[event] !== undefined;
}

export function isPhaseTerminal(phase: Phase): boolean {
  return phase === "done";
}

// ---------------------------------------------------------------------------
// Item steps
// ---------------------------------------------------------------------------

export const STEP_ORDER: readonly Step[] = [
  "watching",
  "summary",
  "comprehension",
  "content",
  "questions",
];

export const TERMINAL_STEP: Step = "questions";

/** 1-based position of a step in the reveal sequence. */
export function stepOrdinal(step: Step): number {
  return STEP_ORDER.indexOf(step) + 1;
}

/**
 * The step after `step` for this item. Steps the item has no content for
 * (no summary, no comprehension check) are skipped. The terminal step maps
 * to itself.
 */
export function nextStep(step: Step, item: Item): Step {
  switch (step) {
    case "watching":
      if (item.summary !== undefined) return "summary";
      return item.comprehension ? "comprehension" : "content";
    case "summary":
      return item.comprehension ? "comprehension" : "content";
    case "comprehension":
      return "content";
    case "content":
    case "questions":
      return "questions";
  }
}
