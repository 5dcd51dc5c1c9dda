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
 * Content loading.
 * Orchestrates: read → parse JSON → validate → check media → build items → freeze.
 * Any failure is fatal; a partial catalog is never returned.
 */

import { constants } from "node:fs";
import { access, readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { z } from "zod";
import { Catalog, type CatalogData } from "./catalog.js";
import { ContentLoadError } from "./errors.js";
import {
  comparisonQuestions,
  controllabilityQuestion,
  identificationQuestion,
  intensityChangeQuestions,
  qualityQuestions,
  ratingQuestions,
} from "./question-builder.js";
import {
  type ComparisonItemInput,
  type ComprehensionInput,
  DefinitionsFileSchema,
  type IntensityChangeItemInput,
  InstructionsFileSchema,
  type QuestionsFile,
  QuestionsFileSchema,
  type QuizPartInput,
  QuizFileSchema,
  type RatingVideoInput,
  StudyFileSchema,
} from "./schemas.js";
import type {
  ComprehensionCheck,
  Item,
  QuizPart,
  StudyPart,
  VideoGroup,
} from "./types.js";

export const CONTENT_FILES = {
  instructions: "instructions.json",
  quiz: "quiz.json",
  study: "study.json",
  questions: "questions.json",
  definitions: "definitions.json",
} as const;

export const DEFAULT_WATCH_SECONDS = 10;

export interface LoadCatalogOptions {
  /** Watch duration for items that do not state one. */
  defaultWatchSeconds?: number;
}

interface MediaReference {
  path: string;
  file: string;
}

// ---------------------------------------------------------------------------
// File reading
// ---------------------------------------------------------------------------

async function readContentFile<S extends z.ZodType>(
  contentDir: string,
  fileName: string,
  schema: S,
): Promise<z.output<S>> {
  const filePath = join(contentDir, fileName);

  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      throw new ContentLoadError("Required content file not found", filePath);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ContentLoadError(`Malformed JSON: ${(error as Error).message}`, filePath);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ContentLoadError(
      issue?.message ?? "Invalid content",
      filePath,
      issue ? issue.path.map(String).join(".") : undefined,
    );
  }
  return result.data;
}

async function assertMediaExists(contentDir: string, refs: readonly MediaReference[]): Promise<void> {
  for (const ref of refs) {
    try {
      await access(resolve(contentDir, ref.path), constants.R_OK);
    } catch {
      throw new ContentLoadError(`Referenced media not found: ${ref.path}`, ref.file);
    }
  }
}

// ---------------------------------------------------------------------------
// Item building
// ---------------------------------------------------------------------------

interface VideoInput {
  videoId?: string;
  videoPath: string;
  durationSeconds?: number;
  videoSummary?: string;
  comprehension?: ComprehensionInput;
}

/** Only a check with at least one distractor is asked. */
function comprehensionCheck(input: ComprehensionInput | undefined): ComprehensionCheck | undefined {
  if (!input || input.distractors.length === 0) return undefined;
  return { correctAnswer: input.correctAnswer, distractors: input.distractors };
}

function videoFields(
  input: VideoInput,
  defaultWatchSeconds: number,
): Pick<Item, "videoId" | "videoPath" | "watchSeconds" | "summary" | "comprehension"> {
  return {
    videoId: input.videoId ?? "N/A",
    videoPath: input.videoPath,
    watchSeconds:
      input.durationSeconds !== undefined ? Math.ceil(input.durationSeconds) : defaultWatchSeconds,
    summary: input.videoSummary,
    comprehension: comprehensionCheck(input.comprehension),
  };
}

function quizItems(part: QuizPartInput, key: (id: string) => string, watch: number): Item[] {
  switch (part.kind) {
    case "identification":
      return part.items.map((item) => ({
        ...videoFields(item, watch),
        id: item.id,
        summaryKey: key(item.id),
        positionInVideo: 0,
        captions: [{ label: "Caption", text: item.caption }],
        questions: [identificationQuestion(item)],
        terms: item.options,
      }));
    case "controllability":
      return part.items.map((item) => ({
        ...videoFields(item, watch),
        id: item.id,
        summaryKey: key(item.id),
        positionInVideo: 0,
        captions: [
          { label: "Caption A", text: item.captionA },
          { label: "Caption B", text: item.captionB },
        ],
        questions: [controllabilityQuestion(item)],
        terms: [item.traitToCompare],
      }));
    case "quality":
      return part.items.map((item) => ({
        ...videoFields(item, watch),
        id: item.id,
        summaryKey: key(item.id),
        positionInVideo: 0,
        captions: [{ label: "Caption", text: item.caption }],
        questions: qualityQuestions(item),
        terms: item.application ? [item.application] : [],
      }));
  }
}

function buildQuizPart(part: QuizPartInput, index: number, watch: number): QuizPart {
  const key = (id: string): string => `quiz:${index}:${id}`;
  return { index, kind: part.kind, title: part.title, items: quizItems(part, key, watch) };
}

function buildRatingGroup(
  video: RatingVideoInput,
  templates: QuestionsFile,
  watch: number,
): VideoGroup {
  const items = video.captions.map((caption, position): Item => {
    const { questions, terms } = ratingQuestions(templates.rating, caption);
    return {
      ...videoFields(video, watch),
      id: caption.captionId,
      summaryKey: `study1:${video.videoId}`,
      positionInVideo: position,
      captions: [{ label: "Caption", text: caption.text }],
      questions,
      terms,
    };
  });
  return { videoId: video.videoId, items };
}

function buildComparisonGroup(
  comparison: ComparisonItemInput,
  templates: QuestionsFile,
  watch: number,
): VideoGroup {
  const { questions, terms } = comparisonQuestions(templates.comparison, comparison.controlScores);
  const item: Item = {
    ...videoFields(comparison, watch),
    id: comparison.comparisonId,
    summaryKey: `study2:${comparison.comparisonId}`,
    positionInVideo: 0,
    captions: [
      { label: "Caption A", text: comparison.captionA },
      { label: "Caption B", text: comparison.captionB },
    ],
    questions,
    terms,
  };
  return { videoId: item.videoId, items: [item] };
}

function buildIntensityGroup(
  change: IntensityChangeItemInput,
  templates: QuestionsFile,
  watch: number,
): VideoGroup | undefined {
  const field = change.fieldToChange?.tone !== undefined ? "tone" : "style";
  const trait = change.fieldToChange?.[field];
  if (trait === undefined) {
    console.warn(`[content] Skipping intensity-change item ${change.changeId}: no fieldToChange`);
    return undefined;
  }

  const item: Item = {
    ...videoFields(change, watch),
    id: change.changeId,
    summaryKey: `study3:${change.changeId}`,
    positionInVideo: 0,
    captions: [
      { label: "Caption A", text: change.captionA },
      { label: "Caption B", text: change.captionB },
    ],
    questions: intensityChangeQuestions(
      templates.intensityChange,
      field,
      trait,
      change.changeType,
    ),
    terms: [trait],
  };
  return { videoId: item.videoId, items: [item] };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Load, validate and freeze the content catalog from `contentDir`.
 * @throws ContentLoadError naming the missing or malformed file or media path.
 */
export async function loadCatalog(
  contentDir: string,
  options: LoadCatalogOptions = {},
): Promise<Catalog> {
  const dir = resolve(contentDir);
  const watch = options.defaultWatchSeconds ?? DEFAULT_WATCH_SECONDS;

  const instructions = await readContentFile(dir, CONTENT_FILES.instructions, InstructionsFileSchema);
  const quiz = await readContentFile(dir, CONTENT_FILES.quiz, QuizFileSchema);
  const study = await readContentFile(dir, CONTENT_FILES.study, StudyFileSchema);
  const templates = await readContentFile(dir, CONTENT_FILES.questions, QuestionsFileSchema);
  const definitions = await readContentFile(dir, CONTENT_FILES.definitions, DefinitionsFileSchema);

  const media: MediaReference[] = [
    { path: instructions.introVideo, file: CONTENT_FILES.instructions },
    ...instructions.tutorial.flatMap((screen) =>
      screen.media.map((path) => ({ path, file: CONTENT_FILES.instructions })),
    ),
  ];
  for (const part of quiz.parts) {
    const videos: readonly VideoInput[] = part.items;
    for (const video of videos) media.push({ path: video.videoPath, file: CONTENT_FILES.quiz });
  }
  const studyVideos: readonly VideoInput[] = [
    ...study.part1Ratings,
    ...study.part2Comparisons,
    ...study.part3IntensityChange,
  ];
  for (const video of studyVideos) media.push({ path: video.videoPath, file: CONTENT_FILES.study });
  await assertMediaExists(dir, media);

  const studyParts: StudyPart[] = [
    {
      number: 1,
      kind: "rating",
      title: "Part 1: Caption Rating",
      groups: study.part1Ratings.map((video) => buildRatingGroup(video, templates, watch)),
    },
    {
      number: 2,
      kind: "comparison",
      title: "Part 2: Caption Comparison",
      groups: study.part2Comparisons.map((c) => buildComparisonGroup(c, templates, watch)),
    },
    {
      number: 3,
      kind: "intensity-change",
      title: "Part 3: Intensity Change",
      groups: study.part3IntensityChange
        .map((c) => buildIntensityGroup(c, templates, watch))
        .filter((g): g is VideoGroup => g !== undefined),
    },
  ];

  const data: CatalogData = {
    introVideo: instructions.introVideo,
    tutorial: instructions.tutorial,
    quizParts: quiz.parts.map((part, index) => buildQuizPart(part, index, watch)),
    studyParts,
    definitions: { ...definitions.tones, ...definitions.styles, ...definitions.applications },
  };

  for (const part of data.quizParts) {
    if (part.items.length === 0) console.warn(`[content] Quiz part "${part.title}" is empty`);
  }
  for (const part of studyParts) {
    if (part.groups.length === 0) console.warn(`[content] Study part ${part.number} is empty`);
  }

  return new Catalog(data, dir);
}
