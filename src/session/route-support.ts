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
 * Shared plumbing for the study route handlers.
 */

import { NextResponse } from "next/server";
import type { FlowState } from "../flow/types.js";
import { notReadyResponse } from "../navigation/error-response.js";
import { type StudyRuntime, getStudyRuntime } from "../runtime.js";
import { type ScreenDescriptor, describeScreen } from "../view/derive-screen.js";

/** The loaded runtime, or a 503 response when config or content failed to load. */
export async function loadRuntime(): Promise<StudyRuntime | NextResponse> {
  try {
    return await getStudyRuntime();
  } catch (error) {
    return notReadyResponse(error);
  }
}

export function screenFor(runtime: StudyRuntime, state: FlowState): ScreenDescriptor {
  return describeScreen(runtime.catalog, state, {
    passThreshold: runtime.config.study.passThreshold,
    allowIntakeBypass: runtime.config.study.allowIntakeBypass,
    now: Date.now(),
  });
}

/** Parsed JSON body, or undefined when the body is not valid JSON. */
export async function readJsonBody(request: Request): Promise<unknown> {
  try {
    return await request.json();
  } catch {
    return undefined;
  }
}
