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
 * Unit tests for POST and GET /api/study/session
 * The runtime and the cookie layer are mocked; the registry and controller are real.
 */

vi.mock("@/runtime.js", () => ({
  getStudyRuntime: vi.fn(),
}));

vi.mock("@/session/session-manager.js", () => ({
  readParticipantId: vi.fn(),
  bindParticipant: vi.fn().mockResolvedValue(undefined),
}));

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { getStudyRuntime } from "@/runtime.js";
import { bindParticipant, readParticipantId } from "@/session/session-manager.js";

import { GET, POST } from "../../../app/api/study/session/route.js";
import { type TestRuntime, makeTestRuntime } from "../../helpers/runtime.js";

let test: TestRuntime;

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
  test = makeTestRuntime();
  vi.mocked(getStudyRuntime).mockResolvedValue(test.runtime);
  vi.mocked(readParticipantId).mockResolvedValue(undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.clearAllMocks();
});

describe("POST /api/study/session", () => {
  it("creates a session, binds the cookie and returns the intake screen", async () => {
    const res = await POST();
    const body = await res.json();

    expect(res.status).toBe(201);
    expect(body.screen.phase).toBe("demographics");
    expect(body.screen.actions).toEqual(["intake", "bypass-intake"]);
    expect(test.runtime.registry.size).toBe(1);

    const [settings, participantId] = vi.mocked(bindParticipant).mock.calls[0] ?? [];
    expect(settings).toEqual({ cookieName: "study_session", ttlSeconds: 3600 });
    expect(participantId && test.runtime.registry.get(participantId)?.state.phase).toBe("demographics");
    expect(console.log).toHaveBeenCalledWith(`[session] Participant session started: ${participantId}`);
  });

  it("returns 503 when the runtime failed to load", async () => {
    vi.mocked(getStudyRuntime).mockRejectedValue(new Error("content/quiz.json: missing"));

    const res = await POST();

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      error: "not_ready",
      message: "Study content or configuration failed to load",
    });
  });

  it("returns 500 when the cookie cannot be written", async () => {
    vi.mocked(bindParticipant).mockRejectedValueOnce(
      new Error("SESSION_SECRET must be set and at least 32 characters"),
    );

    const res = await POST();

    expect(res.status).toBe(500);
    expect((await res.json()).error).toBe("internal_error");
  });
});

describe("GET /api/study/session", () => {
  it("returns 401 without a participant cookie", async () => {
    const res = await GET();

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: "no_session",
      message: "No participant session; start one first",
    });
  });

  it("returns 401 for a cookie whose session is gone", async () => {
    vi.mocked(readParticipantId).mockResolvedValue("expired-id");

    const res = await GET();

    expect(res.status).toBe(401);
    expect((await res.json()).message).toBe("Participant session expired or unknown");
  });

  it("returns the current screen for a known session", async () => {
    const session = test.runtime.registry.create();
    test.runtime.controller.completeIntake(session.state, {
      email: "p@example.com",
      age: 41,
      gender: "Other / Prefer not to say",
      consent: true,
    });
    vi.mocked(readParticipantId).mockResolvedValue(session.id);

    const res = await GET();
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.screen).toMatchObject({
      phase: "intro",
      screen: { kind: "intro", video: "media/intro.mp4" },
      actions: ["proceed"],
    });
  });
});
