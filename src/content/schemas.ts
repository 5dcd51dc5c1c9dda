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
 * Zod schemas for the content files under the content directory.
 * These describe the files as authored; the loader turns them into the
 * frozen domain types in ./types.ts.
 */

import { z } from "zod";
import { YES_NO } from "../questions/options.js";

// ---------------------------------------------------------------------------
// Shared pieces
// ---------------------------------------------------------------------------

const NonEmpty = z.string().min(1);

export const ComprehensionSchema = z
  .object({
    correctAnswer: NonEmpty,
    distractors: z.array(NonEmpty).default([]),
  })
  .refine(
    (check) => new Set([check.correctAnswer, ...check.distractors]).size === check.distractors.length + 1,
    { message: "Comprehension choices must be distinct", path: ["distractors"] },
  );

/** category → trait name → intensity marker, e.g. { tone: { Sarcastic: "high" } } */
export const ControlScoresSchema = z
  .object({
    tone: z.record(z.string(), z.string()).default({}),
    style: z.record(z.string(), z.string()).default({}),
  })
  .prefault({});

const VideoFields = {
  videoId: z.string().optional(),
  videoPath: NonEmpty,
  durationSeconds: z.number().positive().optional(),
  videoSummary: z.string().optional(),
  comprehension: ComprehensionSchema.optional(),
};

export const AnswerSchema = z.union([NonEmpty, z.array(NonEmpty).min(1)]);
export const QuestionTypeSchema = z.enum(["single", "multi"]);

interface AnswerKey {
  options: readonly string[];
  correctAnswer: string | readonly string[];
  questionType: "single" | "multi";
}

/** Problems that would leave a scored question impossible to answer correctly. */
export function answerKeyIssues(key: AnswerKey): string[] {
  const answers = typeof key.correctAnswer === "string" ? [key.correctAnswer] : key.correctAnswer;
  const issues = answers
    .filter((answer) => !key.options.includes(answer))
    .map((answer) => `Correct answer "${answer}" is not one of the options`);
  if (key.questionType === "multi") {
    const distinct = new Set(answers).size;
    if (distinct < 2) issues.push("A multi question needs at least 2 distinct correct answers");
    else if (distinct !== answers.length) issues.push("Correct answers must be distinct");
  } else if (answers.length > 1) {
    issues.push("A single question takes exactly one correct answer");
  }
  return issues;
}

// ---------------------------------------------------------------------------
// instructions.json
// ---------------------------------------------------------------------------

export const TutorialScreenSchema = z.object({
  id: NonEmpty,
  title: NonEmpty,
  body: z.string().default(""),
  media: z.array(NonEmpty).default([]),
});

export const InstructionsFileSchema = z.object({
  introVideo: NonEmpty,
  tutorial: z.array(TutorialScreenSchema).min(1),
});

// ---------------------------------------------------------------------------
// quiz.json
// ---------------------------------------------------------------------------

export const IdentificationItemSchema = z
  .object({
    ...VideoFields,
    id: NonEmpty,
    category: z.enum(["tone", "style"]).default("tone"),
    caption: NonEmpty,
    options: z.array(NonEmpty).min(2),
    correctAnswer: AnswerSchema,
    questionType: QuestionTypeSchema.default("single"),
    explanation: z.string().optional(),
  })
  .superRefine((item, ctx) => {
    for (const message of answerKeyIssues(item)) {
      ctx.addIssue({ code: "custom", message, path: ["correctAnswer"] });
    }
  });

export const ControllabilityItemSchema = z
  .object({
    ...VideoFields,
    id: NonEmpty,
    category: z.enum(["tone", "style"]).default("tone"),
    captionA: NonEmpty,
    captionB: NonEmpty,
    traitToCompare: NonEmpty,
    comparisonType: NonEmpty,
    options: z.array(NonEmpty).min(2).optional(),
    correctAnswer: NonEmpty,
    explanation: z.string().optional(),
  })
  .superRefine((item, ctx) => {
    const key = { options: item.options ?? YES_NO, correctAnswer: item.correctAnswer, questionType: "single" } as const;
    for (const message of answerKeyIssues(key)) {
      ctx.addIssue({ code: "custom", message, path: ["correctAnswer"] });
    }
  });

export const QualityQuestionSchema = z
  .object({
    id: NonEmpty,
    text: NonEmpty,
    options: z.array(NonEmpty).min(2),
    correctAnswer: AnswerSchema,
    questionType: QuestionTypeSchema.default("single"),
    explanation: z.string().optional(),
  })
  .superRefine((question, ctx) => {
    for (const message of answerKeyIssues(question)) {
      ctx.addIssue({ code: "custom", message, path: ["correctAnswer"] });
    }
  });

export const QualityItemSchema = z.object({
  ...VideoFields,
  id: NonEmpty,
  caption: NonEmpty,
  application: z.string().optional(),
  questions: z.array(QualityQuestionSchema).min(1),
});

export const QuizPartSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("identification"),
    title: NonEmpty,
    items: z.array(IdentificationItemSchema),
  }),
  z.object({
    kind: z.literal("controllability"),
    title: NonEmpty,
    items: z.array(ControllabilityItemSchema),
  }),
  z.object({ kind: z.literal("quality"), title: NonEmpty, items: z.array(QualityItemSchema) }),
]);

export const QuizFileSchema = z.object({
  parts: z.array(QuizPartSchema).min(1),
});

// ---------------------------------------------------------------------------
// study.json
// ---------------------------------------------------------------------------

export const RatingCaptionSchema = z.object({
  captionId: NonEmpty,
  text: NonEmpty,
  application: z.string().optional(),
  controlScores: ControlScoresSchema,
});

export const RatingVideoSchema = z.object({
  ...VideoFields,
  videoId: NonEmpty,
  captions: z.array(RatingCaptionSchema).min(1),
});

export const ComparisonItemSchema = z.object({
  ...VideoFields,
  comparisonId: NonEmpty,
  captionA: NonEmpty,
  captionB: NonEmpty,
  controlScores: ControlScoresSchema,
});

/**
 * fieldToChange is optional here: items without it are dropped with a
 * warning at load time rather than failing the whole catalog.
 */
export const IntensityChangeItemSchema = z.object({
  ...VideoFields,
  changeId: NonEmpty,
  captionA: NonEmpty,
  captionB: NonEmpty,
  fieldToChange: z
    .object({ tone: NonEmpty.optional(), style: NonEmpty.optional() })
    .optional(),
  changeType: z.string().default("changed"),
});

export const StudyFileSchema = z.object({
  part1Ratings: z.array(RatingVideoSchema).default([]),
  part2Comparisons: z.array(ComparisonItemSchema).default([]),
  part3IntensityChange: z.array(IntensityChangeItemSchema).default([]),
});

// ---------------------------------------------------------------------------
// questions.json
// ---------------------------------------------------------------------------

export const TemplateOverrideSchema = z.object({
  text: NonEmpty.optional(),
  options: z.array(NonEmpty).min(2).optional(),
});

export const QuestionTemplateSchema = z.object({
  id: NonEmpty,
  text: NonEmpty,
  options: z.array(NonEmpty).min(2).optional(),
  overrides: z.record(z.string(), TemplateOverrideSchema).default({}),
});

export const QuestionsFileSchema = z.object({
  rating: z.array(QuestionTemplateSchema).min(1),
  comparison: z.array(QuestionTemplateSchema).min(1),
  intensityChange: z.object({
    tone: NonEmpty,
    style: NonEmpty,
    factualConsistency: NonEmpty,
  }),
});

// ---------------------------------------------------------------------------
// definitions.json
// ---------------------------------------------------------------------------

export const DefinitionsFileSchema = z.object({
  tones: z.record(z.string(), z.string()).default({}),
  styles: z.record(z.string(), z.string()).default({}),
  applications: z.record(z.string(), z.string()).default({}),
});

// ---------------------------------------------------------------------------
// Inferred types
// ---------------------------------------------------------------------------

export type ComprehensionInput = z.output<typeof ComprehensionSchema>;
export type ControlScores = z.output<typeof ControlScoresSchema>;
export type InstructionsFile = z.output<typeof InstructionsFileSchema>;
export type IdentificationItemInput = z.output<typeof IdentificationItemSchema>;
export type ControllabilityItemInput = z.output<typeof ControllabilityItemSchema>;
export type QualityItemInput = z.output<typeof QualityItemSchema>;
export type QualityQuestionInput = z.output<typeof QualityQuestionSchema>;
export type QuizPartInput = z.output<typeof QuizPartSchema>;
export type QuizFile = z.output<typeof QuizFileSchema>;
export type RatingVideoInput = z.output<typeof RatingVideoSchema>;
export type RatingCaptionInput = z.output<typeof RatingCaptionSchema>;
export type ComparisonItemInput = z.output<typeof ComparisonItemSchema>;
export type IntensityChangeItemInput = z.output<typeof IntensityChangeItemSchema>;
export type StudyFile = z.output<typeof StudyFileSchema>;
export type QuestionTemplate = z.output<typeof QuestionTemplateSchema>;
export type QuestionsFile = z.output<typeof QuestionsFileSchema>;
export type DefinitionsFile = z.output<typeof DefinitionsFileSchema>;
