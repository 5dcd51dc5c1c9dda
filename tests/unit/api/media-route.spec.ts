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
 * Unit tests for GET /api/study/media/{...path}
 */

vi.mock("@/runtime.js", () => ({
  getStudyRuntime: vi.fn(),
}));

import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { getStudyRuntime } from "@/runtime.js";

import { GET } from "../../../app/api/study/media/[...path]/route.js";
import { makeTestRuntime } from "../../helpers/runtime.js";

let contentDir: string;

function get(path: string[]) {
  return GET(new Request("http://localhost:3000/api/study/media"), { params: Promise.resolve({ path }) });
}

beforeEach(async () => {
  contentDir = await mkdtemp(join(tmpdir(), "study-media-"));
  await mkdir(join(contentDir, "media"));
  await writeFile(join(contentDir, "media", "clip.mp4"), Buffer.from([1, 2, 3]));
  vi.mocked(getStudyRuntime).mockResolvedValue(makeTestRuntime(contentDir).runtime);
});

afterEach(async () => {
  await rm(contentDir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe("GET /api/study/media", () => {
  it("serves a file from the content directory with its content type", async () => {
    const res = await get(["media", "clip.mp4"]);

    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Type")).toBe("video/mp4");
    expect(new Uint8Array(await res.arrayBuffer())).toEqual(new Uint8Array([1, 2, 3]));
  });

  it("returns 404 for a missing file", async () => {
    const res = await get(["media", "absent.mp4"]);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "not_found", message: "Media not found" });
  });

  it("refuses paths that leave the content directory", async () => {
    const res = await get(["..", "secrets.txt"]);

    expect(res.status).toBe(404);
  });
});
