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
 * Startup validation entry point.
 * Loads dotenv, config and content, logs what was loaded and the catalog hash.
 */

import { config as loadDotenv } from "dotenv";
import { createStudyRuntime, getConfigDir } from "./runtime.js";

async function main(): Promise<void> {
  loadDotenv();

  const configDir = getConfigDir();

  try {
    const { config, catalog, catalogHash } = await createStudyRuntime(configDir);

    console.log(`[config] Loaded ${configDir}/study.yaml`);
    console.log(`[config] Pass threshold: ${config.study.passThreshold}, sink failure policy: ${config.study.onSinkFailure}`);
    console.log(
      config.sink.sheets?.spreadsheetId
        ? `[config] Primary response store: Google Sheets (${config.sink.sheets.sheetName})`
        : "[config] No primary response store; responses go to the local backup only",
    );

    const quizItems = catalog.quizParts().reduce((sum, part) => sum + part.items.length, 0);
    console.log(
      `[content] ${catalog.quizParts().length} quiz parts, ${quizItems} items, ${catalog.scorableQuizQuestionCount()} scorable questions`,
    );
    for (const part of catalog.studyParts()) {
      const items = part.groups.reduce((sum, group) => sum + group.items.length, 0);
      console.log(`[content] ${part.title}: ${part.groups.length} videos, ${items} items`);
    }
    console.log(`[content] Catalog hash: ${catalogHash} (SHA-256)`);
  } catch (error) {
    console.error("ERROR: Study startup failed");
    console.error((error as Error).message);
    process.exit(1);
  }
}

await main();
