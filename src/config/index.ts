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
 * Public config API.
 * Orchestrates: read → substitute → parse → validate → resolve paths → freeze.
 */

import { readFile } from "node:fs/promises";
import { isAbsolute, join, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { type EnvSource, substituteEnvVars } from "./env-substitute.js";
import { ConfigError, ConfigValidationError, zodIssuesToDetails } from "./errors.js";
import { type StudyConfig, StudyConfigSchema } from "./schema.js";

export const CONFIG_FILE = "study.yaml";

export interface LoadConfigOptions {
  env?: EnvSource;
  /** Directory that relative paths in the config resolve against. Defaults to process.cwd(). */
  baseDir?: string;
}

function resolvePath(baseDir: string, path: string): string {
  if (path === "" || isAbsolute(path)) return path;
  return resolve(baseDir, path);
}

async function readConfigText(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      throw new ConfigError({ file: filePath, message: `Config file not found: ${filePath}` });
    }
    throw error;
  }
}

/**
 * Load, validate, and freeze the study configuration from `<configDir>/study.yaml`.
 * @throws ConfigError for a missing file, a YAML syntax error or an unresolved env var.
 * @throws ConfigValidationError when the parsed document does not match the schema.
 */
export async function loadStudyConfig(
  configDir: string,
  options: LoadConfigOptions = {},
): Promise<StudyConfig> {
  const filePath = join(configDir, CONFIG_FILE);
  const raw = await readConfigText(filePath);
  const substituted = substituteEnvVars(raw, filePath, options.env);

  let parsed: unknown;
  try {
    parsed = parseYaml(substituted);
  } catch (error) {
    throw new ConfigError({
      file: filePath,
      message: `Failed to parse YAML: ${(error as Error).message}`,
    });
  }

  // An empty file parses to null; treat it as "all defaults".
  const result = StudyConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigValidationError(zodIssuesToDetails(result.error, filePath));
  }

  const baseDir = options.baseDir ?? process.cwd();
  const { study, content, sink, session } = result.data;

  return Object.freeze({
    study: Object.freeze({ ...study }),
    content: Object.freeze({ dir: resolvePath(baseDir, content.dir) }),
    sink: Object.freeze({
      localBackupFile: resolvePath(baseDir, sink.localBackupFile),
      sheets: sink.sheets
        ? Object.freeze({ ...sink.sheets, keyFile: resolvePath(baseDir, sink.sheets.keyFile) })
        : undefined,
    }),
    session: Object.freeze({ ...session }),
  });
}

export type { StudyConfig } from "./schema.js";
