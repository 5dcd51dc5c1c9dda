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
 * Fixed option enumerations shared by quiz and study questions.
 */

export const YES_NO = ["Yes", "No"] as const;

export const RELEVANCE_SCALE = ["Not at all", "Weak", "Moderate", "Strong", "Very Strong"] as const;

export const FACTUAL_SCALE = [
  "Contradicts",
  "Inaccurate",
  "Partially",
  "Mostly Accurate",
  "Accurate",
] as const;

export const USEFULNESS_SCALE = ["Not at all", "Slightly", "Moderately", "Very", "Extremely"] as const;

export const HUMAN_LIKENESS_SCALE = [
  "Robotic",
  "Unnatural",
  "Moderate",
  "Very Human-like",
  "Natural",
] as const;

export const PAIRWISE_OPTIONS = [
  "Caption A",
  "Caption B",
  "Both Equal / Neither",
  "Cannot Determine",
] as const;

/** Default scale per rating question id; unknown ids fall back to RELEVANCE_SCALE. */
const RATING_SCALES: Readonly<Record<string, readonly string[]>> = {
  tone_relevance: RELEVANCE_SCALE,
  style_relevance: RELEVANCE_SCALE,
  factual_consistency: FACTUAL_SCALE,
  usefulness: USEFULNESS_SCALE,
  human_likeness: HUMAN_LIKENESS_SCALE,
};

export function defaultRatingScale(questionId: string): readonly string[] {
  return RATING_SCALES[questionId] ?? RELEVANCE_SCALE;
}

/** Number of selections a multi-choice question takes unless the item says otherwise. */
export const DEFAULT_REQUIRED_SELECTIONS = 2;
