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
 * Generates JSON Schema from the Zod schemas using Zod v4's built-in toJSONSchema.
 * Output: config/schema/study.schema.json, content/schema/content.schema.json
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { StudyConfigSchema } from "../src/config/schema.js";
import {
  DefinitionsFileSchema,
  InstructionsFileSchema,
  QuestionsFileSchema,
  QuizFileSchema,
  StudyFileSchema,
} from "../src/content/schemas.js";

function writeSchema(dir: string, fileName: string, schema: object): void {
  mkdirSync(dir, { recursive: true });
  const outputPath = join(dir, fileName);
  writeFileSync(outputPath, `${JSON.stringify(schema, null, 2)}\n`);
  console.log(`Generated: ${outputPath}`);
}

writeSchema(join(process.cwd(), "config", "schema"), "study.schema.json", {
  $schema: "http://json-schema.org/draft-07/schema#",
  title: "Caption Study Configuration Schema",
  description: "Schema for config/study.yaml.",
  definitions: {
    StudyConfig: z.toJSONSchema(StudyConfigSchema, { io: "input" }),
  },
});

writeSchema(join(process.cwd(), "content", "schema"), "content.schema.json", {
  $schema: "http://json-schema.org/draft-07/schema#",
  title: "Caption Study Content Schema",
  description: "Schemas for the JSON files in the content directory.",
  definitions: {
    InstructionsFile: z.toJSONSchema(InstructionsFileSchema, { io: "input" }),
    QuizFile: z.toJSONSchema(QuizFileSchema, { io: "input" }),
    StudyFile: z.toJSONSchema(StudyFileSchema, { io: "input" }),
    QuestionsFile: z.toJSONSchema(QuestionsFileSchema, { io: "input" }),
    DefinitionsFile: z.toJSONSchema(DefinitionsFileSchema, { io: "input" }),
  },
});
