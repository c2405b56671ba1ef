import { Command } from "commander";

import { loadSettings } from "../core/config-loader.js";
import { settingsPath } from "../core/paths.js";
import { listFrameworks } from "../scaffold/catalog.js";
import { formatContextPrompt } from "../workspace/context.js";
import { NODE_TYPE_LABELS } from "../workspace/model.js";

import { expectApplied, parseNumber, resolveNodeRef, withWorkspace } from "./command-context.js";

export function registerWorkspaceCommands(program: Command): void {
  program
    .command("frameworks")
    .description("List the frameworks nodes can be created with")
    .action(() => {
      const settings = loadSettings(settingsPath());
      for (const entry of listFrameworks(settings.enabled_frameworks)) {
        console.log(
          `${entry.framework.padEnd(11)}  ${entry.label.padEnd(14)}  ${entry.language.padEnd(10)}  ${entry.mainFile}  [${NODE_TYPE_LABELS[entry.defaultNodeType]}]`,
        );
      }
    });

  program
    .command("materialize")
    .description("Create project folders on disk for one node or for all nodes")
    .argument("[node]", "Node id, id prefix or name (default: all)")
    .action(async (ref: string | undefined) => {
      await withWorkspace(async (store) => {
        if (ref) {
          const node = resolveNodeRef(store, ref);
          const report = expectApplied(await store.materializeNode(node.id), "Materialize");
          if (report) {
            console.log(`${node.name}: ${report.projectPath}`);
            for (const written of [...report.scaffolded, ...report.written]) console.log(`  wrote ${written}`);
          }
          return;
        }

        const outcomes = await store.materializeAll();
        if (outcomes.length === 0) {
          console.log("No nodes to materialize.");
          return;
        }

        let failures = 0;
        for (const { nodeId, result } of outcomes) {
          const name = store.getNode(nodeId)?.name ?? nodeId;
          if (result.status === "applied") {
            console.log(`${name}: ${result.value.projectPath}`);
          } else if (result.status === "failed") {
            failures += 1;
            console.error(`${name}: ${result.error.message}`);
          }
        }
        if (failures > 0) process.exitCode = 1;
      });
    });

  program
    .command("context")
    .description("Print the assistant context for a node")
    .argument("<node>", "Node id, id prefix or name")
    .option("--json", "Print the structured context as JSON", false)
    .action(async (ref: string, opts: { json: boolean }) => {
      await withWorkspace(
        (store) => {
          const node = resolveNodeRef(store, ref);
          const context = store.buildContext(node.id);
          if (!context) return;
          if (opts.json) {
            console.log(JSON.stringify(context, null, 2));
          } else {
            process.stdout.write(formatContextPrompt(context));
          }
        },
        { save: false },
      );
    });

  const canvas = program.command("canvas").description("Adjust the canvas view and project name");

  canvas
    .command("show")
    .description("Print the project name and canvas transform")
    .action(async () => {
      await withWorkspace(
        (store) => {
          const state = store.getState();
          console.log(`Project: ${state.projectName}`);
          console.log(`Offset: (${state.canvasOffset.x}, ${state.canvasOffset.y})`);
          console.log(`Scale: ${state.canvasScale}`);
          console.log(`Nodes: ${state.nodeOrder.length}`);
        },
        { save: false },
      );
    });

  canvas
    .command("name")
    .description("Rename the project")
    .argument("<name>", "Project name")
    .action(async (name: string) => {
      await withWorkspace((store) => {
        expectApplied(store.setProjectName(name), "Rename project");
        console.log(`Project: ${store.getState().projectName}`);
      });
    });

  canvas
    .command("pan")
    .description("Pan the canvas by a delta")
    .argument("<dx>", "Horizontal delta")
    .argument("<dy>", "Vertical delta")
    .action(async (dx: string, dy: string) => {
      await withWorkspace((store) => {
        const offset = expectApplied(
          store.panCanvas({ x: parseNumber(dx, "dx"), y: parseNumber(dy, "dy") }),
          "Pan canvas",
        );
        if (offset) console.log(`Offset: (${offset.x}, ${offset.y})`);
      });
    });

  canvas
    .command("zoom")
    .description("Set the canvas scale (clamped to 0.5..2)")
    .argument("<scale>", "Scale factor")
    .action(async (scale: string) => {
      await withWorkspace((store) => {
        const applied = expectApplied(store.setCanvasScale(parseNumber(scale, "scale")), "Zoom canvas");
        if (applied !== null) console.log(`Scale: ${applied}`);
      });
    });

  canvas
    .command("reset")
    .description("Reset the canvas offset and scale")
    .action(async () => {
      await withWorkspace((store) => {
        store.resetCanvas();
        console.log("Canvas reset.");
      });
    });
}
