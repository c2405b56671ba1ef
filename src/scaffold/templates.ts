import path from "node:path";
import { fileURLToPath } from "node:url";

import fse from "fs-extra";
import Handlebars from "handlebars";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { NODE_TYPE_LABELS, type NodeType } from "../workspace/model.js";

import { getScaffoldEntry, type ScaffoldEntry } from "./catalog.js";
import { getLanguageInfo } from "./languages.js";

// =============================================================================
// TYPES
// =============================================================================

export type ScaffoldContext = {
  name: string;
  /** Lowercase, dash-separated form of the node name; safe for package names. */
  slug: string;
  /** PascalCase form of the node name; safe for type and module names. */
  identifier: string;
  nodeTypeLabel: string;
  frameworkLabel: string;
  languageLabel: string;
  mainFile: string;
  runtimeVersion: string;
  dependencies: readonly string[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function buildScaffoldContext(input: {
  entry: ScaffoldEntry;
  nodeName: string;
  nodeType: NodeType;
  runtimeVersion?: string;
}): ScaffoldContext {
  const { entry } = input;
  return {
    name: input.nodeName,
    slug: toSlug(input.nodeName),
    identifier: toIdentifier(input.nodeName),
    nodeTypeLabel: NODE_TYPE_LABELS[input.nodeType],
    frameworkLabel: entry.label,
    languageLabel: getLanguageInfo(entry.language).label,
    mainFile: entry.mainFile,
    runtimeVersion: input.runtimeVersion ?? "",
    dependencies: entry.dependencies,
  };
}

/** Renders `templates/scaffold/<name>.hbs`. Synchronous so node creation never awaits. */
export function renderScaffoldTemplate(name: string, context: ScaffoldContext): string {
  const template = loadTemplate(name);

  try {
    return template(context);
  } catch (err) {
    throw createTemplateError("Scaffold template failed to render.", `Scaffold template "${name}" could not be rendered.`, err);
  }
}

export function renderMainFile(input: {
  framework: ScaffoldEntry["framework"];
  nodeName: string;
  nodeType: NodeType;
}): string {
  const entry = getScaffoldEntry(input.framework);
  const context = buildScaffoldContext({ entry, nodeName: input.nodeName, nodeType: input.nodeType });
  return renderScaffoldTemplate(`main/${entry.framework}`, context);
}

export function toSlug(name: string): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "project";
}

export function toIdentifier(name: string): string {
  const words = name.split(/[^A-Za-z0-9]+/).filter((word) => word.length > 0);
  const joined = words.map((word) => word[0].toUpperCase() + word.slice(1)).join("");
  if (!joined) return "Project";
  return /^[0-9]/.test(joined) ? `Project${joined}` : joined;
}

// =============================================================================
// INTERNALS
// =============================================================================

const TEMPLATE_CACHE = new Map<string, Handlebars.TemplateDelegate>();
const TEMPLATE_HINT = "Ensure the templates/scaffold directory ships with the package.";

let templatesRoot: string | null = null;

function loadTemplate(name: string): Handlebars.TemplateDelegate {
  const cached = TEMPLATE_CACHE.get(name);
  if (cached) return cached;

  const templatePath = path.join(resolveTemplatesRoot(), `${name}.hbs`);
  let raw: string;

  try {
    raw = fse.readFileSync(templatePath, "utf8");
  } catch (err) {
    throw createTemplateError("Scaffold template missing.", `Scaffold template "${name}" not found at ${templatePath}.`, err);
  }

  let compiled: Handlebars.TemplateDelegate;
  try {
    compiled = Handlebars.compile(raw, { noEscape: true, strict: true });
  } catch (err) {
    throw createTemplateError("Scaffold template invalid.", `Scaffold template "${name}" failed to compile.`, err);
  }

  TEMPLATE_CACHE.set(name, compiled);
  return compiled;
}

function resolveTemplatesRoot(): string {
  if (templatesRoot) return templatesRoot;
  const startDir = fileURLToPath(new URL(".", import.meta.url));
  templatesRoot = path.join(findPackageRoot(startDir), "templates", "scaffold");
  return templatesRoot;
}

// Walks upward so both src/ and dist/ builds find the shipped templates.
function findPackageRoot(startDir: string): string {
  let current = startDir;

  while (true) {
    if (fse.existsSync(path.join(current, "package.json"))) return current;

    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }

  throw createTemplateError(
    "Scaffold templates unavailable.",
    `package.json not found while resolving templates from ${startDir}.`,
  );
}

function createTemplateError(title: string, message: string, cause?: unknown): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.scaffold,
    title,
    message,
    hint: TEMPLATE_HINT,
    cause,
  });
}
