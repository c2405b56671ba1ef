import { z, type ZodIssue } from "zod";

import { CODE_LANGUAGES, DEFAULT_PROJECT_NAME, FRAMEWORKS, NODE_TYPES } from "./model.js";

export const SNAPSHOT_VERSION = "1.0";

export const PositionSchema = z
  .object({
    x: z.number().finite(),
    y: z.number().finite(),
  })
  .strict();

export const ProjectFileSchema = z
  .object({
    id: z.string().min(1),
    path: z.string(),
    name: z.string(),
    content: z.string(),
    language: z.enum(CODE_LANGUAGES),
  })
  .strict();

/** Node ids name the node's project folder, so they must be one plain path segment. */
export const NodeIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-][A-Za-z0-9._-]*$/, "Node ids must be a single folder name without path separators");

export const WorkspaceNodeSchema = z
  .object({
    id: NodeIdSchema,
    name: z.string(),
    nodeType: z.enum(NODE_TYPES),
    framework: z.enum(FRAMEWORKS),
    language: z.enum(CODE_LANGUAGES),
    position: PositionSchema,
    files: z.array(ProjectFileSchema),
    selectedFileId: z.string().nullable().default(null),
    connections: z.array(z.string()).default([]),
    projectPath: z.string().nullable().default(null),
    environmentPath: z.string().nullable().default(null),
  })
  .strict();

export const WorkspaceSnapshotSchema = z
  .object({
    version: z.literal(SNAPSHOT_VERSION),
    projectName: z.string().default(DEFAULT_PROJECT_NAME),
    nodes: z.array(WorkspaceNodeSchema),
    selectedNodeId: z.string().nullable().default(null),
    canvasOffset: PositionSchema.default({ x: 0, y: 0 }),
    canvasScale: z.number().default(1),
    created: z.string(),
    modified: z.string(),
  })
  .strict();

export type WorkspaceSnapshot = z.infer<typeof WorkspaceSnapshotSchema>;
export type NodeSnapshot = z.infer<typeof WorkspaceNodeSchema>;

export function formatSchemaIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "invalid_enum_value") {
      const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
      return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
    }
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }

    return `${location}: ${issue.message}`;
  });
}
