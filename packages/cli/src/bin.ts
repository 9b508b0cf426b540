import { createProgram } from "./index.js";
import { exitWithError } from "./output.js";

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => exitWithError(err, process.argv.includes("--json")));
