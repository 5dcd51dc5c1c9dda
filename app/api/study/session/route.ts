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
 * Participant session API route.
 * POST /api/study/session starts a session and binds it to the cookie.
 * GET  /api/study/session returns the current screen.
 */

import { noSessionResponse, toErrorResponse } from "@/navigation/error-response.js";
import { loadRuntime, screenFor } from "@/session/route-support.js";
import { bindParticipant, readParticipantId } from "@/session/session-manager.js";
import { NextResponse } from "next/server";

export const dynamic = "force-dynamic";

export async function POST(): Promise<NextResponse> {
  const runtime = await loadRuntime();
  if (runtime instanceof NextResponse) return runtime;

  try {
    const session = runtime.registry.create();
    await bindParticipant(runtime.config.session, session.id);
    console.log(`[session] Participant session started: ${session.id}`);
    return NextResponse.json({ screen: screenFor(runtime, session.state) }, { status: 201 });
  } catch (error) {
    return toErrorResponse(error);
  }
}

export async function GET(): Promise<NextResponse> {
  const runtime = await loadRuntime();
  if (runtime instanceof NextResponse) return runtime;

  try {
    const participantId = await readParticipantId(runtime.config.session);
    if (!participantId) return noSessionResponse();

    const screen = await runtime.registry.run(participantId, (session) =>
      screenFor(runtime, session.state),
    );
    return NextResponse.json({ screen }, { status: 200 });
  } catch (error) {
    return toErrorResponse(error);
  }
}
