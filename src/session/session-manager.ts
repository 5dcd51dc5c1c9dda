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
 * Encrypted cookie binding a browser to its participant session.
 * The cookie carries only the registry id; the flow state stays server-side.
 */

import { getIronSession } from "iron-session";
import { cookies } from "next/headers";

export interface StudyCookieData {
  participantId?: string;
}

function getSessionSecret(): string {
  const secret = process.env.SESSION_SECRET;
  if (!secret || secret.length < 32) {
    throw new Error("SESSION_SECRET must be set and at least 32 characters");
  }
  return secret;
}

function getSessionOptions(cookieName: string, ttlSeconds: number) {
  return {
    password: getSessionSecret(),
    cookieName,
    ttl: ttlSeconds,
    cookieOptions: {
      httpOnly: true,
      secure: process.env.NODE_ENV === "production",
      sameSite: "lax" as const,
      path: "/",
    },
  };
}

export interface CookieSettings {
  cookieName: string;
  ttlSeconds: number;
}

export async function readParticipantId(settings: CookieSettings): Promise<string | undefined> {
  const cookieStore = await cookies();
  const session = await getIronSession<StudyCookieData>(
    cookieStore,
    getSessionOptions(settings.cookieName, settings.ttlSeconds),
  );
  return session.participantId;
}

export async function bindParticipant(settings: CookieSettings, participantId: string): Promise<void> {
  const cookieStore = await cookies();
  const session = await getIronSession<StudyCookieData>(
    cookieStore,
    getSessionOptions(settings.cookieName, settings.ttlSeconds),
  );
  session.participantId = participantId;
  await session.save();
}
