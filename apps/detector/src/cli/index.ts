export { parseCommandLine, UsageError, USAGE, type Command } from "./args.js";
export {
    runCli,
    EXIT_OK,
    EXIT_FAILURE,
    EXIT_CLIENT_ERROR,
    type CliDependencies,
} from "./run.js";
