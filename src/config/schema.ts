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
 * Zod schemas for the study configuration file.
 * All objects are .strict() so typos in config keys fail at startup.
 */

import { z } from "zod";

export const SinkFailurePolicySchema = z.enum(["block", "advance"]);

/** Only the single-attempt policy is supported; the enum keeps the choice explicit in config. */
export const ScoringPolicySchema = z.enum(["any-correct"]);

export const StudySettingsSchema = z
  .object({
    passThreshold: z.number().int().min(0).default(5),
    defaultWatchSeconds: z.number().int().positive().default(10),
    onSinkFailure: SinkFailurePolicySchema.default("block"),
    scoring: ScoringPolicySchema.default("any-correct"),
    allowIntakeBypass: z.boolean().default(false),
  })
  .strict();

export const ContentSettingsSchema = z
  .object({
    dir: z.string().min(1).default("content"),
  })
  .strict();

export const SheetsSettingsSchema = z
  .object({
    spreadsheetId: z.string().default(""),
    sheetName: z.string().min(1).default("Sheet1"),
    keyFile: z.string().default(""),
  })
  .strict();

export const SinkSettingsSchema = z
  .object({
    localBackupFile: z.string().min(1).default("data/responses_backup.jsonl"),
    sheets: SheetsSettingsSchema.optional(),
  })
  .strict();

export const SessionSettingsSchema = z
  .object({
    cookieName: z.string().min(1).default("caption_study_session"),
    ttlSeconds: z.number().int().positive().default(7200),
  })
  .strict();

export const StudyConfigSchema = z
  .object({
    study: StudySettingsSchema.prefault({}),
    content: ContentSettingsSchema.prefault({}),
    sink: SinkSettingsSchema.prefault({}),
    session: SessionSettingsSchema.prefault({}),
  })
  .strict();

export type SinkFailurePolicy = z.infer<typeof SinkFailurePolicySchema>;
export type ScoringPolicy = z.infer<typeof ScoringPolicySchema>;
export type StudySettings = z.output<typeof StudySettingsSchema>;
export type SheetsSettings = z.output<typeof SheetsSettingsSchema>;
export type SinkSettings = z.output<typeof SinkSettingsSchema>;
export type SessionSettings = z.output<typeof SessionSettingsSchema>;
export type StudyConfigInput = z.input<typeof StudyConfigSchema>;
export type StudyConfig = z.output<typeof StudyConfigSchema>;
