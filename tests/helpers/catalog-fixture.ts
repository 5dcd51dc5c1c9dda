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
 * In-memory catalog shared by the flow, controller and view tests.
 *
 * Quiz (4 scorable questions):
 *   part 0 "Quiz A": q-a1 (summary + comprehension, single-choice),
 *                    q-a2 (multi-choice, no summary or check)
 *   part 1 "Quiz B": q-b1 with two single-choice sub-questions
 * Study:
 *   part 1: vid-1 with captions s1-c1, s1-c2 (two ordinal questions each)
 *   part 2: s2-1 (one pairwise question)
 *   part 3: empty
 */

import { Catalog, type CatalogData } from "../../src/content/catalog.js";
import type { Item, Question } from "../../src/content/types.js";
import { PAIRWISE_OPTIONS, RELEVANCE_SCALE } from "../../src/questions/options.js";

export function makeItem(overrides: Partial<Item> & Pick<Item, "id">): Item {
  return {
    videoId: "vid-test",
    videoPath: "media/test.mp4",
    watchSeconds: 5,
    summaryKey: `key:${overrides.id}`,
    positionInVideo: 0,
    captions: [{ label: "Caption", text: "A test caption." }],
    questions: [],
    terms: [],
    ...overrides,
  };
}

const ratingQuestions = (prefix: string): Question[] => [
  { id: `${prefix}-tone`, kind: "ordinal", prompt: "How <b>calm</b> is it?", options: RELEVANCE_SCALE },
  { id: `${prefix}-useful`, kind: "ordinal", prompt: "How useful is it?", options: RELEVANCE_SCALE },
];

export function makeCatalogData(): CatalogData {
  return {
    introVideo: "media/intro.mp4",
    tutorial: [
      { id: "t1", title: "Welcome", body: "Intro text", media: [] },
      { id: "t2", title: "Traits", body: "Trait text", media: [] },
    ],
    quizParts: [
      {
        index: 0,
        kind: "identification",
        title: "Quiz A",
        items: [
          makeItem({
            id: "q-a1",
            videoId: "vid-a1",
            watchSeconds: 5,
            summary: "A dog runs.",
            summaryKey: "quiz:0:q-a1",
            comprehension: { correctAnswer: "Dog", distractors: ["Cat", "Bird"] },
            questions: [
              {
                id: "q-a1",
                kind: "single-choice",
                prompt: "What is the most dominant tone in the caption?",
                options: ["Sarcastic", "Formal", "Sad"],
                correctAnswer: "Sarcastic",
                explanation: "It mocks the situation.",
              },
            ],
            terms: ["Sarcastic", "Formal", "Sad"],
          }),
          makeItem({
            id: "q-a2",
            videoId: "vid-a2",
            watchSeconds: 3,
            summaryKey: "quiz:0:q-a2",
            questions: [
              {
                id: "q-a2",
                kind: "multi-choice",
                prompt: "What is the most dominant tone in the caption?",
                options: ["Humorous", "Casual", "Formal", "Angry"],
                correctAnswer: ["Humorous", "Casual"],
                requiredSelections: 2,
              },
            ],
          }),
        ],
      },
      {
        index: 1,
        kind: "quality",
        title: "Quiz B",
        items: [
          makeItem({
            id: "q-b1",
            videoId: "vid-b1",
            watchSeconds: 2,
            summaryKey: "quiz:1:q-b1",
            questions: [
              {
                id: "b1-factual",
                kind: "single-choice",
                prompt: "Is it factual?",
                options: ["Yes", "No"],
                correctAnswer: "Yes",
              },
              {
                id: "b1-useful",
                kind: "single-choice",
                prompt: "Is it useful?",
                options: ["Yes", "No"],
                correctAnswer: "No",
              },
            ],
          }),
        ],
      },
    ],
    studyParts: [
      {
        number: 1,
        kind: "rating",
        title: "Part 1: Caption Rating",
        groups: [
          {
            videoId: "vid-1",
            items: [
              makeItem({
                id: "s1-c1",
                videoId: "vid-1",
                watchSeconds: 4,
                summary: "Waves at sunset.",
                summaryKey: "study1:vid-1",
                positionInVideo: 0,
                questions: ratingQuestions("c1"),
                terms: ["Calm", "Unknown Trait"],
              }),
              makeItem({
                id: "s1-c2",
                videoId: "vid-1",
                watchSeconds: 4,
                summary: "Waves at sunset.",
                summaryKey: "study1:vid-1",
                positionInVideo: 1,
                questions: ratingQuestions("c2"),
              }),
            ],
          },
        ],
      },
      {
        number: 2,
        kind: "comparison",
        title: "Part 2: Caption Comparison",
        groups: [
          {
            videoId: "vid-2",
            items: [
              makeItem({
                id: "s2-1",
                videoId: "vid-2",
                watchSeconds: 4,
                summaryKey: "study2:s2-1",
                captions: [
                  { label: "Caption A", text: "First." },
                  { label: "Caption B", text: "Second." },
                ],
                questions: [
                  {
                    id: "tone_comparison",
                    kind: "single-choice",
                    prompt: "Which caption is calmer?",
                    options: PAIRWISE_OPTIONS,
                  },
                ],
              }),
            ],
          },
        ],
      },
      { number: 3, kind: "intensity-change", title: "Part 3: Intensity Change", groups: [] },
    ],
    definitions: { Calm: "Peaceful.", Sarcastic: "Mocking." },
  };
}

export function makeCatalog(data: CatalogData = makeCatalogData()): Catalog {
  return new Catalog(data, "/content");
}
