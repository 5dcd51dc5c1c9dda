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

import { NextResponse } from "next/server";
import { StateTransitionError } from "../flow/state-machine.js";
import { SessionNotFoundError } from "../session/registry.js";
import { SinkWriteError, ValidationError } from "./errors.js";

/** Maps a failed participant action onto the JSON error contract. */
export function toErrorResponse(error: unknown): NextResponse {
  if (error instanceof ValidationError) {
    return NextResponse.json(
      { error: "validation_error", message: "Some answers are incomplete", issues: error.issues },
      { status: 400 },
    );
  }
  if (error instanceof StateTransitionError) {
    return NextResponse.json({ error: "invalid_transition", message: error.message }, { status: 409 });
  }
  if (error instanceof SinkWriteError) {
    return NextResponse.json(
      { error: "persistence_failed", message: error.message, warnings: error.warnings },
      { status: 502 },
    );
  }
  if (error instanceof SessionNotFoundError) {
    return NextResponse.json(
      { error: "no_session", message: "Participant session expired or unknown" },
      { status: 401 },
    );
  }

  console.error("[api] Unexpected error:", error);
  return NextResponse.json(
    { error: "internal_error", message: "An unexpected error occurred" },
    { status: 500 },
  );
}

export function noSessionResponse(): NextResponse {
  return NextResponse.json(
    { error: "no_session", message: "No participant session; start one first" },
    { status: 401 },
  );
}

export function notReadyResponse(error: unknown): NextResponse {
  console.error("[api] Study runtime failed to load:", error);
  return NextResponse.json(
    { error: "not_ready", message: "Study content or configuration failed to load" },
    { status: 503 },
  );
}

export function invalidBodyResponse(message: string): NextResponse {
  return NextResponse.json({ error: "validation_error", message, issues: [] }, { status: 400 });
}
