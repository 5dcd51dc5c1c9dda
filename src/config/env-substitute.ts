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
 * ${VAR} and ${VAR:-default} substitution on raw YAML text, before parsing.
 */

import { ConfigError } from "./errors.js";

const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;
const DEFAULT_SEPARATOR = ":-";

export type EnvSource = Record<string, string | undefined>;

/**
 * @throws ConfigError naming the first variable that is unset and has no default.
 */
export function substituteEnvVars(
  text: string,
  sourceFile: string,
  env: EnvSource = process.env,
): string {
  const unresolved: string[] = [];

  const result = text.replace(ENV_VAR_PATTERN, (match, expr: string) => {
    const sep = expr.indexOf(DEFAULT_SEPARATOR);
    const varName = sep === -1 ? expr : expr.slice(0, sep);
    const fallback = sep === -1 ? undefined : expr.slice(sep + DEFAULT_SEPARATOR.length);

    const value = env[varName];
    if (value !== undefined) return value;
    if (fallback !== undefined) return fallback;

    unresolved.push(varName);
    return match;
  });

  const first = unresolved[0];
  if (first !== undefined) {
    throw new ConfigError({
      file: sourceFile,
      message: `Unresolved environment variable: \${${first}}`,
    });
  }

  return result;
}
