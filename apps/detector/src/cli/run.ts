/**
 * @fileoverview Command runner
 *
 * Executes one parsed command against a Detector and maps failures to exit
 * codes: 2 for usage and client input errors, 1 for everything else.
 *
 * @module cli/run
 */

import {
    describeError,
    isDetectorError,
    toClassificationResponse,
    type ClassificationRecord,
    type DetectorLogger,
    type ProviderRegistry,
    type ReprocessedRecord,
} from "@injection-detector/core";
import type { AppConfig } from "../config/index.js";
import { Detector } from "../detector.js";
import { USAGE, UsageError, parseCommandLine, type Command } from "./args.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CLIENT_ERROR = 2;

export interface CliDependencies {
    config: AppConfig;
    providers: ProviderRegistry;
    logger: DetectorLogger;

    /** Receives command output, one block per call */
    stdout: (text: string) => void;

    /** Receives error messages and usage text */
    stderr: (text: string) => void;
}

function toJson(value: unknown): string {
    return JSON.stringify(value, null, 2);
}

function reprocessedToJson(entry: ReprocessedRecord): Record<string, unknown> {
    return {
        request_id    : entry.requestId,
        created_at    : entry.createdAt,
        classification: entry.verdict.classification,
        confidence    : entry.verdict.confidence,
        reasoning     : entry.verdict.reasoning,
        severity      : entry.verdict.severity,
        model_version : entry.verdict.modelVersion,
        prompt_version: entry.verdict.promptVersion,
    };
}

function recordToJson(record: ClassificationRecord): Record<string, unknown> {
    return {
        request_id    : record.requestId,
        input_text    : record.inputText,
        classification: record.classification,
        confidence    : record.confidence,
        model_version : record.modelVersion,
        prompt_version: record.promptVersion,
        raw_response  : record.rawResponse,
        created_at    : record.createdAt,
    };
}

async function execute(command: Exclude<Command, { kind: "help" }>, detector: Detector, deps: CliDependencies): Promise<number> {
    switch (command.kind) {
        case "classify": {
            const result = await detector.classify({
                text         : command.text,
                modelVersion : command.modelVersion,
                promptVersion: command.promptVersion,
                provider     : command.provider,
            });
            deps.stdout(toJson(toClassificationResponse(result)));
            return EXIT_OK;
        }

        case "reprocess": {
            const entries = await detector.reprocess(command.requestId);
            if (entries.length === 0) {
                deps.stderr(`No stored responses for request ${command.requestId}`);
                return EXIT_FAILURE;
            }
            deps.stdout(toJson(entries.map(reprocessedToJson)));
            return EXIT_OK;
        }

        case "history": {
            const records = await detector.history(command.limit);
            deps.stdout(toJson(records.map(recordToJson)));
            return EXIT_OK;
        }

        case "templates": {
            const lines = detector.templates.list().map(template =>
                template.description ? `${template.version}\t${template.description}` : template.version
            );
            deps.stdout(lines.join("\n"));
            return EXIT_OK;
        }
    }
}

/**
 * Run the CLI.
 *
 * @param argv - Arguments after the script name
 * @returns Process exit code
 */
export async function runCli(argv: readonly string[], deps: CliDependencies): Promise<number> {
    let command: Command;
    try {
        command = parseCommandLine(argv);
    }
    catch (error) {
        if (error instanceof UsageError) {
            deps.stderr(`${error.message}\n\n${USAGE}`);
            return EXIT_CLIENT_ERROR;
        }
        throw error;
    }

    if (command.kind === "help") {
        deps.stdout(USAGE);
        return EXIT_OK;
    }

    let detector: Detector | null = null;
    try {
        detector = new Detector(deps.config, { providers: deps.providers, logger: deps.logger });
        return await execute(command, detector, deps);
    }
    catch (error) {
        deps.logger.error("Command failed", {
            command: command.kind,
            error  : isDetectorError(error) ? error.toJSON() : describeError(error),
        });
        deps.stderr(`Error: ${describeError(error)}`);

        return isDetectorError(error) && error.isClientError() ? EXIT_CLIENT_ERROR : EXIT_FAILURE;
    }
    finally {
        detector?.close();
    }
}
