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
import { IntakeSubmissionSchema } from "../../../src/intake/schemas.js";

const VALID = { email: "p@example.com", age: 30, gender: "Male", consent: true };

function messages(input: unknown): string[] {
  const result = IntakeSubmissionSchema.safeParse(input);
  return result.success ? [] : result.error.issues.map((issue) => issue.message);
}

describe("IntakeSubmissionSchema", () => {
  it("accepts a complete form and trims the email", () => {
    const result = IntakeSubmissionSchema.safeParse({ ...VALID, email: "  p@example.com " });

    expect(result.success).toBe(true);
    expect(result.data?.email).toBe("p@example.com");
  });

  it("coerces the age from the form's string value", () => {
    expect(IntakeSubmissionSchema.parse({ ...VALID, age: "45" }).age).toBe(45);
  });

  it("accepts ages 18 and 60", () => {
    expect(messages({ ...VALID, age: 18 })).toEqual([]);
    expect(messages({ ...VALID, age: 60 })).toEqual([]);
  });

  it("rejects ages outside 18 to 60", () => {
    expect(messages({ ...VALID, age: 17 })).toEqual(["Participants must be at least 18."]);
    expect(messages({ ...VALID, age: 61 })).toEqual(["Please select an age between 18 and 60."]);
  });

  it("rejects a fractional age", () => {
    expect(messages({ ...VALID, age: 30.5 })).toEqual(["Please select your age."]);
  });

  it("rejects an email without a domain suffix", () => {
    expect(messages({ ...VALID, email: "p@example" })).toEqual(["Please enter a valid email address."]);
  });

  it("rejects a blank email as a missing field", () => {
    expect(messages({ ...VALID, email: "   " })).toEqual([
      "Please fill in all fields to continue.",
      "Please enter a valid email address.",
    ]);
  });

  it("rejects a gender outside the listed options", () => {
    expect(messages({ ...VALID, gender: "Unknown" })).toEqual(["Please select your gender."]);
  });

  it("requires consent to be given", () => {
    expect(messages({ ...VALID, consent: false })).toEqual([
      "You must be over 18 and agree to participate.",
    ]);
  });
});
