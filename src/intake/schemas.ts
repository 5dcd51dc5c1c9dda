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
 * Zod schemas for the participant intake form.
 */

import { z } from "zod";

export const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export const MIN_AGE = 18;
export const MAX_AGE = 60;

export const GENDER_OPTIONS = ["Male", "Female", "Other / Prefer not to say"] as const;

export const IntakeSubmissionSchema = z.object({
  email: z
    .string({ error: "Please fill in all fields to continue." })
    .trim()
    .min(1, "Please fill in all fields to continue.")
    .regex(EMAIL_PATTERN, "Please enter a valid email address."),
  age: z.coerce
    .number({ error: "Please select your age." })
    .int("Please select your age.")
    .min(MIN_AGE, `Participants must be at least ${MIN_AGE}.`)
    .max(MAX_AGE, `Please select an age between ${MIN_AGE} and ${MAX_AGE}.`),
  gender: z.enum(GENDER_OPTIONS, { error: "Please select your gender." }),
  consent: z.literal(true, { error: "You must be over 18 and agree to participate." }),
});

/** Identity captured at intake; read-only for the rest of the session. */
export interface Participant {
  readonly email: string;
  readonly age: number;
  readonly gender: string;
}

/** Canned identity used by the intake bypass. */
export const DEBUG_PARTICIPANT: Participant = Object.freeze({
  email: "debug@test.com",
  age: 25,
  gender: "Prefer not to say",
});

export type IntakeSubmission = z.infer<typeof IntakeSubmissionSchema>;
