/**
 * @fileoverview Prompt Injection Detector - Main Entry Point
 *
 * Loads configuration, registers the built-in providers and runs one CLI
 * command.
 *
 * @module detector
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { ProviderRegistry, createConsoleLogger } from "@injection-detector/core";
import { loadConfig } from "./config/index.js";
import { registerBuiltinProviders } from "./providers/index.js";
import { runCli } from "./cli/index.js";

async function main(): Promise<number> {
    const config = loadConfig();
    const logger = createConsoleLogger("Detector", config.logLevel);

    const providers = new ProviderRegistry();
    registerBuiltinProviders(providers);

    logger.debug(`${config.appName} v${config.appVersion}`, { providers: providers.names() });

    return runCli(process.argv.slice(2), {
        config,
        providers,
        logger,
        stdout: (text) => console.log(text),
        stderr: (text) => console.error(text),
    });
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error("[FATAL]", error);
        process.exitCode = 1;
    });
