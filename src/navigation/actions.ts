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
 * Wire format of participant actions and their dispatch onto the controller.
 */

import { z } from "zod";
import type { FlowState } from "../flow/types.js";
import type { NavigationController, SubmissionOutcome } from "./controller.js";

const AnswerSchema = z.union([z.string(), z.array(z.string())]);

export const ActionSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("proceed") }),
  z.object({ type: z.literal("finish-watching") }),
  z.object({ type: z.literal("answer-comprehension"), choice: z.string() }),
  z.object({ type: z.literal("interact"), questionId: z.string().min(1) }),
  z.object({ type: z.literal("skip-to-questions") }),
  z.object({ type: z.literal("submit"), answers: z.record(z.string(), AnswerSchema) }),
  z.object({ type: z.literal("jump-to-part"), index: z.number().int() }),
  z.object({ type: z.literal("restart-quiz") }),
]);

export type Action = z.infer<typeof ActionSchema>;

/** Applies one action. Only `submit` yields an outcome. */
export async function applyAction(
  controller: NavigationController,
  state: FlowState,
  action: Action,
): Promise<SubmissionOutcome | null> {
  switch (action.type) {
    case "proceed":
      controller.proceed(state);
      return null;
    case "finish-watching":
      controller.finishWatching(state);
      return null;
    case "answer-comprehension":
      controller.answerComprehension(state, action.choice);
      return null;
    case "interact":
      controller.recordInteraction(state, action.questionId);
      return null;
    case "skip-to-questions":
      controller.skipToQuestions(state);
      return null;
    case "submit":
      return controller.submitAnswer(state, action.answers);
    case "jump-to-part":
      controller.jumpToPart(state, action.index);
      return null;
    case "restart-quiz":
      controller.restartQuiz(state);
      return null;
  }
}
