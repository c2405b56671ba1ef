import { buildCli } from "./cli/index.js";
import { writeErrorLines } from "./core/error-format.js";

export { buildCli };

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = buildCli();
  try {
    await program.parseAsync(argv);
  } catch (err) {
    const debug = program.opts<{ debug?: boolean }>().debug === true;
    writeErrorLines(err, { mode: debug ? "debug" : "short", stream: process.stderr });
    process.exitCode = 1;
  }
}
