/**
 * @fileoverview Template File Loader
 *
 * Loads additional prompt versions from a YAML file:
 *
 * ```yaml
 * templates:
 *   - version: v4
 *     description: Stricter role-play rule
 *     prompt: |
 *       ... Text to analyze: "{{text}}" ...
 *       - "classification": ...
 *       - "confidence": ...
 *       - "reasoning": ...
 *       - "severity": ...
 * ```
 *
 * @module @injection-detector/core/templates/loadTemplates
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import {
    createPromptTemplate,
    findMissingVerdictFields,
    TEXT_PLACEHOLDER,
    type PromptTemplate,
} from "../contracts/PromptTemplate.js";
import { DetectorErrorCode, TemplateRegistrationError, describeError } from "../contracts/errors.js";
import type { DetectorLogger } from "../contracts/Logger.js";
import { createConsoleLogger } from "../contracts/Logger.js";

function invalid(message: string): TemplateRegistrationError {
    return new TemplateRegistrationError(message, DetectorErrorCode.TEMPLATE_FILE_INVALID);
}

/**
 * Validate one raw YAML entry and build its template.
 */
function toTemplate(raw: unknown, index: number): PromptTemplate {
    if (typeof raw !== "object" || raw === null) {
        throw invalid(`Invalid template at index ${index}: expected a mapping`);
    }

    const version = "version" in raw ? raw.version : undefined;
    const prompt = "prompt" in raw ? raw.prompt : undefined;
    const description = "description" in raw ? raw.description : undefined;

    if (typeof version !== "string" || version.trim().length === 0) {
        throw invalid(`Invalid template at index ${index}: missing or invalid 'version'`);
    }

    if (typeof prompt !== "string" || prompt.trim().length === 0) {
        throw invalid(`Invalid template ${version}: missing or invalid 'prompt'`);
    }

    if (!prompt.includes(TEXT_PLACEHOLDER)) {
        throw invalid(`Invalid template ${version}: prompt must contain ${TEXT_PLACEHOLDER}`);
    }

    const missing = findMissingVerdictFields(prompt);
    if (missing.length > 0) {
        throw invalid(`Invalid template ${version}: prompt does not request ${missing.map(f => `"${f}"`).join(", ")}`);
    }

    if (description !== undefined && typeof description !== "string") {
        throw invalid(`Invalid template ${version}: 'description' must be a string`);
    }

    return createPromptTemplate(version, prompt, description);
}

/**
 * Load prompt templates from a YAML file.
 *
 * @param filePath - Path to the templates file
 * @returns Templates in file order
 * @throws TemplateRegistrationError if the file is missing or invalid
 */
export function loadTemplatesFromFile(filePath: string): PromptTemplate[] {
    if (!existsSync(filePath)) {
        throw invalid(`Template file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    const parsed: unknown = parseYaml(content);

    if (typeof parsed !== "object" || parsed === null || !("templates" in parsed) || !Array.isArray(parsed.templates)) {
        throw invalid("Invalid template file format: expected { templates: [...] }");
    }

    const templates = parsed.templates.map((raw: unknown, index: number) => toTemplate(raw, index));

    const seen = new Set<string>();
    for (const template of templates) {
        if (seen.has(template.version)) {
            throw invalid(`Duplicate template version in file: ${template.version}`);
        }
        seen.add(template.version);
    }

    return templates;
}

/**
 * Load templates, logging and returning an empty list on any failure.
 *
 * @param filePath - Path to the templates file
 * @param logger - Where the failure is reported
 */
export function loadTemplatesWithFallback(
    filePath: string,
    logger: DetectorLogger = createConsoleLogger("Templates")
): PromptTemplate[] {
    try {
        return loadTemplatesFromFile(filePath);
    }
    catch (error) {
        logger.warn("Failed to load prompt templates, using built-ins only", {
            filePath,
            error: describeError(error),
        });
        return [];
    }
}
