/**
 * @fileoverview Command-line parsing
 *
 * @module cli/args
 */

export type Command =
    | {
        readonly kind: "classify";
        readonly text: string;
        readonly modelVersion?: string;
        readonly promptVersion?: string;
        readonly provider?: string;
    }
    | { readonly kind: "reprocess"; readonly requestId: string }
    | { readonly kind: "history"; readonly limit: number }
    | { readonly kind: "templates" }
    | { readonly kind: "help" };

export const USAGE = `Usage: injection-detector <command> [options]

Commands:
  classify <text...>       Classify text as benign or malicious
      --model <name>           Model version (default: DEFAULT_MODEL)
      --prompt-version <v>     Prompt version (default: DEFAULT_PROMPT_VERSION)
      --provider <name>        Provider name (only the configured one is accepted)
  reprocess <request-id>   Re-normalize stored responses for a request
  history [--limit <n>]    Show the most recent audit records (default 20)
  templates                List registered prompt versions
  help                     Show this message`;

/**
 * Invalid command line
 */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "UsageError";
    }
}

const DEFAULT_HISTORY_LIMIT = 20;

/**
 * Split arguments into positionals and `--flag value` pairs.
 */
function splitArgs(args: readonly string[], allowed: readonly string[]): {
    positionals: string[];
    flags: Map<string, string>;
} {
    const positionals: string[] = [];
    const flags = new Map<string, string>();

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];

        if (arg === "--") {
            positionals.push(...args.slice(i + 1));
            break;
        }

        if (!arg.startsWith("--")) {
            positionals.push(arg);
            continue;
        }

        const name = arg.slice(2);
        if (!allowed.includes(name)) {
            throw new UsageError(`Unknown option: ${arg}`);
        }

        const value = args[i + 1];
        if (value === undefined || value.startsWith("--")) {
            throw new UsageError(`Option ${arg} requires a value`);
        }

        flags.set(name, value);
        i++;
    }

    return { positionals, flags };
}

/**
 * Parse process arguments (without the node and script entries).
 *
 * @throws UsageError on unknown commands, unknown options or missing values
 */
export function parseCommandLine(argv: readonly string[]): Command {
    const command: string | undefined = argv[0];
    const rest = argv.slice(1);

    switch (command) {
        case undefined:
        case "help":
        case "--help":
        case "-h":
            return { kind: "help" };

        case "classify": {
            const { positionals, flags } = splitArgs(rest, ["model", "prompt-version", "provider"]);
            const text = positionals.join(" ");

            if (text.trim().length === 0) {
                throw new UsageError("classify requires the text to classify");
            }

            const modelVersion = flags.get("model");
            const promptVersion = flags.get("prompt-version");
            const provider = flags.get("provider");

            return {
                kind: "classify",
                text,
                ...(modelVersion !== undefined && { modelVersion }),
                ...(promptVersion !== undefined && { promptVersion }),
                ...(provider !== undefined && { provider }),
            };
        }

        case "reprocess": {
            const { positionals } = splitArgs(rest, []);
            if (positionals.length !== 1) {
                throw new UsageError("reprocess requires exactly one request id");
            }
            return { kind: "reprocess", requestId: positionals[0] };
        }

        case "history": {
            const { positionals, flags } = splitArgs(rest, ["limit"]);
            if (positionals.length > 0) {
                throw new UsageError(`Unexpected argument: ${positionals[0]}`);
            }

            const raw = flags.get("limit");
            if (raw === undefined) {
                return { kind: "history", limit: DEFAULT_HISTORY_LIMIT };
            }

            const limit = Number(raw);
            if (!Number.isInteger(limit) || limit <= 0) {
                throw new UsageError(`--limit must be a positive integer, received '${raw}'`);
            }
            return { kind: "history", limit };
        }

        case "templates":
            return { kind: "templates" };

        default:
            throw new UsageError(`Unknown command: ${command}`);
    }
}
