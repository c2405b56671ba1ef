import type { IdSource } from "../core/ids.js";
import { logWorkspaceEvent, silentLogger, type EventLogger } from "../core/logger.js";
import { errorMessage } from "../core/utils.js";
import { getScaffoldEntry } from "../scaffold/catalog.js";
import { renderMainFile } from "../scaffold/templates.js";

import { fileNameOf, type Framework, type NodeType, type ProjectFile } from "./model.js";

/**
 * Builds the catalog main file for a framework, rendered for the given node name.
 * A template that fails to load or render leaves the file empty and is logged.
 */
export function createMainFile(input: {
  ids: IdSource;
  framework: Framework;
  nodeName: string;
  nodeType: NodeType;
  logger?: EventLogger;
}): ProjectFile {
  const entry = getScaffoldEntry(input.framework);
  return {
    id: input.ids.next(),
    path: entry.mainFile,
    name: fileNameOf(entry.mainFile),
    content: renderMainFileOrEmpty(input),
    language: entry.language,
  };
}

export function createProjectFile(input: {
  ids: IdSource;
  path: string;
  content?: string;
  language: ProjectFile["language"];
}): ProjectFile {
  return {
    id: input.ids.next(),
    path: input.path,
    name: fileNameOf(input.path),
    content: input.content ?? "",
    language: input.language,
  };
}

function renderMainFileOrEmpty(input: {
  framework: Framework;
  nodeName: string;
  nodeType: NodeType;
  logger?: EventLogger;
}): string {
  try {
    return renderMainFile({ framework: input.framework, nodeName: input.nodeName, nodeType: input.nodeType });
  } catch (err) {
    logWorkspaceEvent(input.logger ?? silentLogger, "scaffold.render_failed", {
      framework: input.framework,
      message: errorMessage(err),
    });
    return "";
  }
}
