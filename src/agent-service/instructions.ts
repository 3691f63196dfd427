/**
 * agent-service/instructions.ts — Loads the agent's system instructions
 *
 * Read from instructions.md (AGENT_INSTRUCTIONS_PATH), resolved against the
 * project root (two levels up from src/agent-service/ and dist/agent-service/).
 */

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join, resolve } from "path";
import { logger } from "../logger.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = join(__dirname, "..", "..");

const FALLBACK_INSTRUCTIONS =
    "You are an assistant that uses the tools available to you to answer the user. " +
    "Always prefer calling a tool over answering from memory.";

export function loadInstructions(path: string): string {
    const fullPath = resolve(PROJECT_ROOT, path);
    try {
        const text = readFileSync(fullPath, "utf-8").trim();
        logger.info("Agent instructions loaded", { path: fullPath, chars: text.length });
        return text || FALLBACK_INSTRUCTIONS;
    } catch (err) {
        logger.warn("Agent instructions not found — using built-in fallback", {
            path: fullPath,
            err: String(err),
        });
        return FALLBACK_INSTRUCTIONS;
    }
}
