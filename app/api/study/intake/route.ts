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
 * Intake form API route.
 * POST /api/study/intake
 * Body: the intake form fields, or { "bypass": true } where bypass is enabled.
 */

import { noSessionResponse, toErrorResponse } from "@/navigation/error-response.js";
import { loadRuntime, readJsonBody, screenFor } from "@/session/route-support.js";
import { readParticipantId } from "@/session/session-manager.js";
import { NextResponse } from "next/server";
import { z } from "zod";

export const dynamic = "force-dynamic";

const BypassSchema = z.object({ bypass: z.literal(true) });

export async function POST(request: Request): Promise<NextResponse> {
  const runtime = await loadRuntime();
  if (runtime instanceof NextResponse) return runtime;

  try {
    const participantId = await readParticipantId(runtime.config.session);
    if (!participantId) return noSessionResponse();

    const body = await readJsonBody(request);
    const screen = await runtime.registry.run(participantId, (session) => {
      if (BypassSchema.safeParse(body).success) {
        runtime.controller.bypassIntake(session.state);
      } else {
        runtime.controller.completeIntake(session.state, body ?? {});
      }
      return screenFor(runtime, session.state);
    });
    return NextResponse.json({ screen }, { status: 200 });
  } catch (error) {
    return toErrorResponse(error);
  }
}
