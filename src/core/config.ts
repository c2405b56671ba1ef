import { z } from "zod";

import { DELETE_POLICIES, FRAMEWORKS } from "../workspace/model.js";

// A single path segment: no separators, no leading dot.
const PATH_SEGMENT = /^[A-Za-z0-9][A-Za-z0-9 _.-]*$/;

export const ContextPreviewSchema = z
  .object({
    current: z.number().int().positive().default(200),
    connected: z.number().int().positive().default(100),
  })
  .strict();

export const SettingsSchema = z
  .object({
    storage_root: z.string().min(1).optional(),
    project_namespace: z
      .string()
      .regex(PATH_SEGMENT, "must be a single folder name without separators")
      .optional(),
    debounce_ms: z.number().int().min(0).max(60_000).default(400),
    delete_policy: z.enum(DELETE_POLICIES).default("orphan"),
    detect_toolchains: z.boolean().default(true),
    create_environments: z.boolean().default(false),
    enabled_frameworks: z.array(z.enum(FRAMEWORKS)).min(1).optional(),
    context_preview: ContextPreviewSchema.default({}),
  })
  .strict();

export type Settings = z.infer<typeof SettingsSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;
