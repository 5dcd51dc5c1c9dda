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
 * Participant action API route.
 * POST /api/study/actions
 * Body: { "type": <action>, ...fields }. Returns the next screen and, for
 * submissions, the per-question outcome.
 */

import { ActionSchema, applyAction } from "@/navigation/actions.js";
import { invalidBodyResponse, noSessionResponse, toErrorResponse } from "@/navigation/error-response.js";
import { loadRuntime, readJsonBody, screenFor } from "@/session/route-support.js";
import { readParticipantId } from "@/session/session-manager.js";
import { NextResponse } from "next/server";

export const dynamic = "force-dynamic";

export async function POST(request: Request): Promise<NextResponse> {
  const runtime = await loadRuntime();
  if (runtime instanceof NextResponse) return runtime;

  const parsed = ActionSchema.safeParse(await readJsonBody(request));
  if (!parsed.success) {
    return invalidBodyResponse(`Invalid action: ${parsed.error.issues[0]?.message ?? "malformed body"}`);
  }

  try {
    const participantId = await readParticipantId(runtime.config.session);
    if (!participantId) return noSessionResponse();

    const result = await runtime.registry.run(participantId, async (session) => {
      const outcome = await applyAction(runtime.controller, session.state, parsed.data);
      return { outcome, screen: screenFor(runtime, session.state) };
    });
    return NextResponse.json(result, { status: 200 });
  } catch (error) {
    return toErrorResponse(error);
  }
}
