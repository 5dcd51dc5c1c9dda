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

import { describe, expect, it } from "vitest";
import { substituteEnvVars } from "../../../src/config/env-substitute.js";
import { ConfigError } from "../../../src/config/errors.js";

describe("substituteEnvVars", () => {
  it("substitutes ${VAR} with env value", () => {
    const result = substituteEnvVars("dir: ${CONTENT_DIR}", "study.yaml", {
      CONTENT_DIR: "/srv/content",
    });
    expect(result).toBe("dir: /srv/content");
  });

  it("substitutes multiple variables in one string", () => {
    const result = substituteEnvVars("${A}-${B}", "study.yaml", { A: "one", B: "two" });
    expect(result).toBe("one-two");
  });

  it("supports ${VAR:-default} fallback syntax", () => {
    const result = substituteEnvVars("passThreshold: ${PASS_THRESHOLD:-5}", "study.yaml", {});
    expect(result).toBe("passThreshold: 5");
  });

  it("uses env value over default when both available", () => {
    const result = substituteEnvVars("passThreshold: ${PASS_THRESHOLD:-5}", "study.yaml", {
      PASS_THRESHOLD: "3",
    });
    expect(result).toBe("passThreshold: 3");
  });

  it("supports empty default value", () => {
    const result = substituteEnvVars('id: "${SHEET_ID:-}"', "study.yaml", {});
    expect(result).toBe('id: ""');
  });

  it("throws ConfigError naming the unresolved variable", () => {
    expect(() => substituteEnvVars("x: ${MISSING_VAR}", "config/study.yaml", {})).toThrow(
      ConfigError,
    );

    try {
      substituteEnvVars("x: ${MISSING_VAR}", "config/study.yaml", {});
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect((error as ConfigError).message).toBe(
        "Unresolved environment variable: ${MISSING_VAR}",
      );
      expect((error as ConfigError).file).toBe("config/study.yaml");
    }
  });

  it("leaves text without placeholders unchanged", () => {
    expect(substituteEnvVars("scoring: any-correct", "study.yaml", {})).toBe(
      "scoring: any-correct",
    );
  });
});
