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
 * Resolves question templates into fully specified Question objects.
 *
 * Templates use named placeholders: {traits}, {trait}, {application} and
 * {changeType}. Trait and application values are wrapped in highlight markup
 * before substitution; unknown placeholders are left as written.
 */

import { PAIRWISE_OPTIONS, YES_NO, defaultRatingScale } from "../questions/options.js";
import type {
  ControlScores,
  ControllabilityItemInput,
  IdentificationItemInput,
  QualityItemInput,
  QuestionTemplate,
  QuestionsFile,
} from "./schemas.js";
import type { Question } from "./types.js";

export const DEFAULT_APPLICATION = "the intended application";

const PLACEHOLDER_PATTERN = /\{(\w+)\}/g;

// ---------------------------------------------------------------------------
// Formatting helpers
// ---------------------------------------------------------------------------

export function highlight(term: string): string {
  return `<b class='highlight-trait'>${term}</b>`;
}

/** Highlight each non-empty trait and join them with " and ". */
export function formatTraits(traits: readonly string[]): string {
  return traits
    .filter((t) => t.length > 0)
    .map(highlight)
    .join(" and ");
}

export function fillTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(PLACEHOLDER_PATTERN, (match, name: string) => values[name] ?? match);
}

export function hasPlaceholder(template: string): boolean {
  return new RegExp(PLACEHOLDER_PATTERN.source).test(template);
}

function answerFields(
  correctAnswer: string | readonly string[],
  questionType: "single" | "multi",
): Pick<Question, "kind" | "correctAnswer" | "requiredSelections"> {
  if (questionType === "multi") {
    const answers = typeof correctAnswer === "string" ? [correctAnswer] : [...correctAnswer];
    return {
      kind: "multi-choice",
      correctAnswer: answers,
      requiredSelections: answers.length,
    };
  }
  const single = typeof correctAnswer === "string" ? correctAnswer : correctAnswer[0];
  return { kind: "single-choice", correctAnswer: single };
}

// ---------------------------------------------------------------------------
// Quiz questions
// ---------------------------------------------------------------------------

export function identificationQuestion(item: IdentificationItemInput): Question {
  return {
    id: item.id,
    prompt: `What is the most dominant ${item.category} in the caption?`,
    options: item.options,
    explanation: item.explanation,
    ...answerFields(item.correctAnswer, item.questionType),
  };
}

export function controllabilityQuestion(item: ControllabilityItemInput): Question {
  return {
    id: item.id,
    kind: "single-choice",
    prompt: `From Caption A to B, has the level of ${highlight(item.traitToCompare)} ${item.comparisonType}?`,
    options: item.options ?? YES_NO,
    correctAnswer: item.correctAnswer,
    explanation: item.explanation,
  };
}

export function qualityQuestions(item: QualityItemInput): Question[] {
  const application = item.application ? highlight(item.application) : "";
  return item.questions.map((q) => ({
    id: q.id,
    prompt: fillTemplate(q.text, { application }),
    options: q.options,
    explanation: q.explanation,
    ...answerFields(q.correctAnswer, q.questionType),
  }));
}

// ---------------------------------------------------------------------------
// Study questions
// ---------------------------------------------------------------------------

function traitNames(scores: ControlScores): { tone: string[]; style: string[] } {
  return { tone: Object.keys(scores.tone), style: Object.keys(scores.style) };
}

/**
 * Apply the template's override for `overrideTrait`, if any. Override text
 * that carries a placeholder is filled like the default; override text
 * without one is used verbatim.
 */
function resolveTemplate(
  template: QuestionTemplate,
  overrideTrait: string | undefined,
  values: Readonly<Record<string, string>>,
  defaultOptions: readonly string[],
): { prompt: string; options: readonly string[] } {
  const override = overrideTrait === undefined ? undefined : template.overrides[overrideTrait];
  const text = override?.text ?? template.text;
  const options = override?.options ?? template.options ?? defaultOptions;
  const prompt = override?.text && !hasPlaceholder(text) ? text : fillTemplate(text, values);
  return { prompt, options };
}

export interface RatingContext {
  controlScores: ControlScores;
  application?: string;
}

/**
 * Part 1 questions. Tone questions name the first two tone traits; style
 * questions name the first style trait, which also selects the override.
 */
export function ratingQuestions(
  templates: QuestionsFile["rating"],
  ctx: RatingContext,
): { questions: Question[]; terms: string[] } {
  const { tone, style } = traitNames(ctx.controlScores);
  const toneTraits = tone.slice(0, 2);
  const mainStyle = style[0];
  const application = ctx.application ?? DEFAULT_APPLICATION;

  const questions = templates.map((template): Question => {
    const isStyle = template.id.startsWith("style");
    const values = {
      traits: isStyle ? formatTraits(mainStyle ? [mainStyle] : []) : formatTraits(toneTraits),
      application: highlight(application),
    };
    const resolved = resolveTemplate(
      template,
      isStyle ? mainStyle : undefined,
      values,
      defaultRatingScale(template.id),
    );
    return { id: template.id, kind: "ordinal", ...resolved };
  });

  const terms = [...toneTraits, application, ...(mainStyle ? [mainStyle] : [])];
  return { questions, terms: [...new Set(terms)] };
}

/** Part 2 questions. Style questions name every style trait; the first selects the override. */
export function comparisonQuestions(
  templates: QuestionsFile["comparison"],
  controlScores: ControlScores,
): { questions: Question[]; terms: string[] } {
  const { tone, style } = traitNames(controlScores);

  const questions = templates.map((template): Question => {
    const isStyle = template.id.includes("style");
    const values = { traits: formatTraits(isStyle ? style : tone) };
    const resolved = resolveTemplate(
      template,
      isStyle ? style[0] : undefined,
      values,
      PAIRWISE_OPTIONS,
    );
    return { id: template.id, kind: "single-choice", ...resolved };
  });

  return { questions, terms: [...new Set([...tone, ...style])] };
}

export const INTENSITY_QUESTION_ID = "intensity_change";
export const CONSISTENCY_QUESTION_ID = "factual_consistency";

/** Part 3 questions: the trait-specific Yes/No change question plus the consistency check. */
export function intensityChangeQuestions(
  templates: QuestionsFile["intensityChange"],
  field: "tone" | "style",
  trait: string,
  changeType: string,
): Question[] {
  const values = { trait: highlight(trait), traits: highlight(trait), changeType };
  return [
    {
      id: INTENSITY_QUESTION_ID,
      kind: "single-choice",
      prompt: fillTemplate(templates[field], values),
      options: YES_NO,
    },
    {
      id: CONSISTENCY_QUESTION_ID,
      kind: "single-choice",
      prompt: templates.factualConsistency,
      options: YES_NO,
    },
  ];
}
