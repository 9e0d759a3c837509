import WebfoldCommand from "./cli";
import { describeError, exitCodeOf } from "./errors";

WebfoldCommand.run(process.argv.slice(2), import.meta.url).catch((error: unknown) => {
  const exitCode = exitCodeOf(error);
  if (exitCode !== 0) {
    console.error(describeError(error));
  }
  process.exit(exitCode);
});
