import path from "node:path";

import { CODE_LANGUAGES, type CodeLanguage } from "../workspace/model.js";

export type LanguageInfo = {
  label: string;
  /** Extension used when a new file of this language is created. */
  extension: string;
  /** Extensions that imply this language when a file is added by path. */
  extensions: readonly string[];
  /** Exact file names that imply this language regardless of extension. */
  fileNames?: readonly string[];
};

export const LANGUAGE_TABLE = {
  swift: { label: "Swift", extension: "swift", extensions: ["swift"] },
  python: { label: "Python", extension: "py", extensions: ["py", "pyw"] },
  javascript: { label: "JavaScript", extension: "js", extensions: ["js", "jsx", "mjs", "cjs", "vue"] },
  typescript: { label: "TypeScript", extension: "ts", extensions: ["ts", "tsx", "mts", "cts"] },
  html: { label: "HTML", extension: "html", extensions: ["html", "htm"] },
  css: { label: "CSS", extension: "css", extensions: ["css", "scss", "less"] },
  json: { label: "JSON", extension: "json", extensions: ["json"] },
  yaml: { label: "YAML", extension: "yaml", extensions: ["yaml", "yml"] },
  dockerfile: {
    label: "Dockerfile",
    extension: "dockerfile",
    extensions: ["dockerfile"],
    fileNames: ["Dockerfile"],
  },
  kubernetes: { label: "Kubernetes", extension: "yaml", extensions: [] },
  terraform: { label: "Terraform", extension: "tf", extensions: ["tf", "tfvars"] },
  cloudformation: { label: "CloudFormation", extension: "yaml", extensions: [] },
  sql: { label: "SQL", extension: "sql", extensions: ["sql"] },
  bash: { label: "Bash", extension: "sh", extensions: ["sh", "bash", "zsh"] },
  markdown: { label: "Markdown", extension: "md", extensions: ["md", "markdown"] },
  rust: { label: "Rust", extension: "rs", extensions: ["rs"] },
  go: { label: "Go", extension: "go", extensions: ["go"] },
  java: { label: "Java", extension: "java", extensions: ["java"] },
  plaintext: { label: "Plain Text", extension: "txt", extensions: ["txt"] },
} satisfies Record<CodeLanguage, LanguageInfo>;

export function getLanguageInfo(language: CodeLanguage): LanguageInfo {
  return LANGUAGE_TABLE[language];
}

/**
 * Infers a language from a file path. The first language in table order that
 * claims the file name or extension wins; otherwise the fallback is returned.
 */
export function languageForPath(filePath: string, fallback: CodeLanguage): CodeLanguage {
  const baseName = path.posix.basename(filePath);
  const extension = path.posix.extname(baseName).slice(1).toLowerCase();

  for (const language of CODE_LANGUAGES) {
    const info: LanguageInfo = LANGUAGE_TABLE[language];
    if (info.fileNames?.includes(baseName)) {
      return language;
    }
  }

  if (!extension) return fallback;

  for (const language of CODE_LANGUAGES) {
    const info: LanguageInfo = LANGUAGE_TABLE[language];
    if (info.extensions.includes(extension)) {
      return language;
    }
  }

  return fallback;
}
