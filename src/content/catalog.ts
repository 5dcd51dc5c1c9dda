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

import { resolve } from "node:path";
import { countScorableQuestions } from "../questions/score-calculator.js";
import {
  DEFINITION_NOT_FOUND,
  type QuizPart,
  type StudyPart,
  type StudyPartNumber,
  type TutorialScreen,
} from "./types.js";

export interface CatalogData {
  /** Relative to the content directory, like every media path below. */
  introVideo: string;
  tutorial: TutorialScreen[];
  quizParts: QuizPart[];
  studyParts: StudyPart[];
  /** Flattened glossary: trait or application name → definition. */
  definitions: Record<string, string>;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Immutable, pre-loaded study content. Built once by loadCatalog(); there is
 * no mutation API.
 */
export class Catalog {
  private readonly data: Readonly<CatalogData>;

  constructor(
    data: CatalogData,
    readonly contentDir: string,
  ) {
    this.data = deepFreeze(data);
  }

  /** Absolute path of a media file referenced by the content. */
  mediaPath(relativePath: string): string {
    return resolve(this.contentDir, relativePath);
  }

  get introVideo(): string {
    return this.data.introVideo;
  }

  tutorialScreens(): readonly TutorialScreen[] {
    return this.data.tutorial;
  }

  quizParts(): readonly QuizPart[] {
    return this.data.quizParts;
  }

  studyParts(): readonly StudyPart[] {
    return this.data.studyParts;
  }

  studyPart(number: StudyPartNumber): StudyPart | undefined {
    return this.data.studyParts.find((p) => p.number === number);
  }

  definitions(): Readonly<Record<string, string>> {
    return this.data.definitions;
  }

  definitionFor(term: string): string {
    return this.data.definitions[term] ?? DEFINITION_NOT_FOUND;
  }

  scorableQuizQuestionCount(): number {
    return countScorableQuestions(this.data.quizParts);
  }

  toJSON(): Readonly<CatalogData> {
    return this.data;
  }
}
