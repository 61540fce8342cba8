import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { loadCommandDeps } from "./deps.js";
import { buildProgram } from "./program.js";

export async function runMain(argv: string[] = process.argv, runtime: RuntimeEnv = defaultRuntime): Promise<void> {
  const program = buildProgram({
    runtime,
    loadDeps: (request) => loadCommandDeps(runtime, request),
  });
  await program.parseAsync(argv);
}
