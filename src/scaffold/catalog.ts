/*
Purpose: static scaffold table keyed by framework; the single place that knows a
framework's language, main file, directory layout and once-only files.
Assumptions: rows are pure data; template names resolve under templates/scaffold/.
Usage: getScaffoldEntry("fastapi").mainFile; listFrameworks(settings.enabled_frameworks).
*/

import path from "node:path";

import { FRAMEWORKS, type CodeLanguage, type Framework, type NodeType } from "../workspace/model.js";

// =============================================================================
// TYPES
// =============================================================================

export type RuntimeId = "node" | "python" | "swift" | "go" | "rust" | "java";

export type EnvironmentKind = "python-venv";

export type ScaffoldTemplateFile = {
  /** Path relative to the project root. */
  path: string;
  /** Template name relative to templates/scaffold, without the .hbs suffix. */
  template: string;
};

export type ScaffoldEntry = {
  framework: Framework;
  label: string;
  language: CodeLanguage;
  mainFile: string;
  directories: readonly string[];
  manifest?: ScaffoldTemplateFile;
  /** Written once when absent (README, ignore files, package markers). */
  extras: readonly ScaffoldTemplateFile[];
  /** Package names a manifest template lists. */
  dependencies: readonly string[];
  runtime?: RuntimeId;
  environment?: EnvironmentKind;
  defaultNodeType: NodeType;
};

// =============================================================================
// SHARED ROW PARTS
// =============================================================================

const README: ScaffoldTemplateFile = { path: "README.md", template: "extras/readme" };

const NODE_PROJECT = {
  language: "javascript",
  directories: ["src", "dist"],
  manifest: { path: "package.json", template: "manifests/package.json" },
  extras: [README, { path: ".gitignore", template: "extras/gitignore-node" }],
  runtime: "node",
} as const;

const PYTHON_PROJECT = {
  language: "python",
  directories: ["src", "tests", "docs"],
  manifest: { path: "requirements.txt", template: "manifests/requirements.txt" },
  extras: [
    README,
    { path: ".gitignore", template: "extras/gitignore-python" },
    { path: "src/__init__.py", template: "extras/empty" },
    { path: "tests/__init__.py", template: "extras/empty" },
  ],
  runtime: "python",
  environment: "python-venv",
} as const;

const SWIFT_PROJECT = {
  language: "swift",
  directories: ["Sources", "Tests"],
  manifest: { path: "Package.swift", template: "manifests/Package.swift" },
  extras: [README, { path: ".gitignore", template: "extras/gitignore-swift" }],
  dependencies: [],
  runtime: "swift",
} as const;

// =============================================================================
// CATALOG
// =============================================================================

export const SCAFFOLD_CATALOG = {
  nodejs: {
    ...NODE_PROJECT,
    framework: "nodejs",
    label: "Node.js",
    mainFile: "src/index.js",
    dependencies: [],
    defaultNodeType: "cloud-backend",
  },
  angular: {
    ...NODE_PROJECT,
    framework: "angular",
    label: "Angular",
    language: "typescript",
    mainFile: "src/main.ts",
    dependencies: ["@angular/core", "@angular/platform-browser"],
    defaultNodeType: "website",
  },
  react: {
    ...NODE_PROJECT,
    framework: "react",
    label: "React",
    mainFile: "src/index.js",
    directories: ["src", "public"],
    dependencies: ["react", "react-dom"],
    defaultNodeType: "website",
  },
  vue: {
    ...NODE_PROJECT,
    framework: "vue",
    label: "Vue",
    mainFile: "src/main.js",
    directories: ["src", "public"],
    dependencies: ["vue"],
    defaultNodeType: "website",
  },
  nextjs: {
    ...NODE_PROJECT,
    framework: "nextjs",
    label: "Next.js",
    mainFile: "pages/index.js",
    directories: ["pages", "public"],
    dependencies: ["next", "react", "react-dom"],
    defaultNodeType: "website",
  },
  express: {
    ...NODE_PROJECT,
    framework: "express",
    label: "Express",
    mainFile: "src/index.js",
    dependencies: ["express"],
    defaultNodeType: "cloud-backend",
  },
  nestjs: {
    ...NODE_PROJECT,
    framework: "nestjs",
    label: "NestJS",
    language: "typescript",
    mainFile: "src/main.ts",
    dependencies: ["@nestjs/common", "@nestjs/core"],
    defaultNodeType: "cloud-backend",
  },
  django: {
    ...PYTHON_PROJECT,
    framework: "django",
    label: "Django",
    mainFile: "manage.py",
    dependencies: ["django"],
    defaultNodeType: "website",
  },
  flask: {
    ...PYTHON_PROJECT,
    framework: "flask",
    label: "Flask",
    mainFile: "app.py",
    dependencies: ["flask"],
    defaultNodeType: "website",
  },
  fastapi: {
    ...PYTHON_PROJECT,
    framework: "fastapi",
    label: "FastAPI",
    mainFile: "main.py",
    dependencies: ["fastapi", "uvicorn"],
    defaultNodeType: "cloud-backend",
  },
  purepy: {
    ...PYTHON_PROJECT,
    framework: "purepy",
    label: "Pure Python",
    mainFile: "src/main.py",
    dependencies: [],
    defaultNodeType: "custom",
  },
  rust: {
    framework: "rust",
    label: "Rust",
    language: "rust",
    mainFile: "src/main.rs",
    directories: ["src"],
    manifest: { path: "Cargo.toml", template: "manifests/Cargo.toml" },
    extras: [README, { path: ".gitignore", template: "extras/gitignore-rust" }],
    dependencies: [],
    runtime: "rust",
    defaultNodeType: "custom",
  },
  swift: {
    ...SWIFT_PROJECT,
    framework: "swift",
    label: "Swift",
    mainFile: "Sources/main.swift",
    defaultNodeType: "macos-app",
  },
  swiftui: {
    ...SWIFT_PROJECT,
    framework: "swiftui",
    label: "SwiftUI",
    mainFile: "Sources/App.swift",
    defaultNodeType: "iphone-app",
  },
  go: {
    framework: "go",
    label: "Go",
    language: "go",
    mainFile: "main.go",
    directories: [],
    manifest: { path: "go.mod", template: "manifests/go.mod" },
    extras: [README],
    dependencies: [],
    runtime: "go",
    defaultNodeType: "cloud-backend",
  },
  java: {
    framework: "java",
    label: "Java",
    language: "java",
    mainFile: "src/main/java/Main.java",
    directories: ["src/main/java", "src/test/java"],
    manifest: { path: "pom.xml", template: "manifests/pom.xml" },
    extras: [README, { path: ".gitignore", template: "extras/gitignore-java" }],
    dependencies: [],
    runtime: "java",
    defaultNodeType: "custom",
  },
  spring: {
    framework: "spring",
    label: "Spring",
    language: "java",
    mainFile: "src/main/java/Application.java",
    directories: ["src/main/java", "src/main/resources", "src/test/java"],
    manifest: { path: "pom.xml", template: "manifests/pom-spring.xml" },
    extras: [README, { path: ".gitignore", template: "extras/gitignore-java" }],
    dependencies: ["spring-boot-starter-web"],
    runtime: "java",
    defaultNodeType: "cloud-backend",
  },
  docker: {
    framework: "docker",
    label: "Docker",
    language: "dockerfile",
    mainFile: "Dockerfile",
    directories: [],
    extras: [README],
    dependencies: [],
    defaultNodeType: "cloud-backend",
  },
  kubernetes: {
    framework: "kubernetes",
    label: "Kubernetes",
    language: "kubernetes",
    mainFile: "deployment.yaml",
    directories: [],
    extras: [README],
    dependencies: [],
    defaultNodeType: "cloud-backend",
  },
  terraform: {
    framework: "terraform",
    label: "Terraform",
    language: "terraform",
    mainFile: "main.tf",
    directories: [],
    extras: [README, { path: ".gitignore", template: "extras/gitignore-terraform" }],
    dependencies: [],
    defaultNodeType: "cloud-backend",
  },
} satisfies Record<Framework, ScaffoldEntry>;

// =============================================================================
// LOOKUPS
// =============================================================================

export function getScaffoldEntry(framework: Framework): ScaffoldEntry {
  return SCAFFOLD_CATALOG[framework];
}

export function mainFileName(framework: Framework): string {
  return path.posix.basename(getScaffoldEntry(framework).mainFile);
}

export function isFramework(value: string): value is Framework {
  return FRAMEWORKS.some((framework) => framework === value);
}

/** Catalog rows in declaration order, limited to the enabled set when one is given. */
export function listFrameworks(enabled?: readonly Framework[]): ScaffoldEntry[] {
  const allowed = enabled ? new Set(enabled) : null;
  return FRAMEWORKS.filter((framework) => !allowed || allowed.has(framework)).map((framework) =>
    getScaffoldEntry(framework),
  );
}

/**
 * True when a node file at `candidate` would collide with the scaffold: it names a
 * scaffold directory or one of its parents, or nests under or above a scaffold file.
 * Sitting exactly on a scaffold file is allowed; that file is then edited in place.
 */
export function conflictsWithScaffold(entry: ScaffoldEntry, candidate: string): boolean {
  if (entry.directories.some((dir) => dir === candidate || dir.startsWith(`${candidate}/`))) {
    return true;
  }
  const scaffoldFiles = entry.manifest ? [entry.manifest, ...entry.extras] : entry.extras;
  return scaffoldFiles.some(
    (file) => file.path !== candidate && (file.path.startsWith(`${candidate}/`) || candidate.startsWith(`${file.path}/`)),
  );
}
