#!/usr/bin/env node
/**
 * cli.ts — Operator commands
 *
 *   agent-tool-bridge register                 discover MCP tools, publish them on the agent
 *   agent-tool-bridge delete                   delete the agent
 *   agent-tool-bridge tools                    print the synthesized function stubs
 *   agent-tool-bridge invoke <name> [json]     call one tool through the router
 */

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { config } from "./config.js";
import { logger } from "./logger.js";
import { describeError } from "./errors.js";
import { createRuntime, type Runtime } from "./runtime.js";
import { AGENT_ID_SETTING } from "./state.js";
import { discoverStubs } from "./sync.js";
import { parseArguments } from "./tools/index.js";

async function withRuntime(fn: (runtime: Runtime) => Promise<void>): Promise<void> {
    const runtime = createRuntime(config);
    try {
        await fn(runtime);
    } finally {
        await runtime.shutdown();
    }
}

async function register(): Promise<void> {
    await withRuntime(async (runtime) => {
        const result = await runtime.sync();
        console.log(`${result.created ? "Created" : "Updated"} agent ${result.agentId}`);
        for (const stub of result.stubs) {
            console.log(`  • ${stub.name}`);
        }
        if (result.created) {
            console.log(`\nAdd AGENT_ID=${result.agentId} to .env to pin this agent.`);
        }
    });
}

async function deleteAgent(): Promise<void> {
    await withRuntime(async (runtime) => {
        const agentId = runtime.resolveAgentId();
        if (!agentId) {
            console.log("No agent id configured or stored — nothing to delete.");
            return;
        }
        await runtime.registrar.remove(agentId);
        runtime.state.deleteSetting(AGENT_ID_SETTING);
        console.log(`Deleted agent ${agentId}`);
    });
}

async function listStubs(): Promise<void> {
    await withRuntime(async (runtime) => {
        const { stubs } = await discoverStubs(runtime.catalog, runtime.router);
        console.log(JSON.stringify(stubs.map((s) => s.definition), null, 2));
    });
}

async function invoke(name: string, rawArgs: string): Promise<void> {
    await withRuntime(async (runtime) => {
        runtime.router.setCatalog(await runtime.catalog.listTools());
        const output = await runtime.router.invoke({ name, arguments: parseArguments(name, rawArgs) });
        console.log(output);
    });
}

async function main(): Promise<void> {
    await yargs(hideBin(process.argv))
        .scriptName("agent-tool-bridge")
        .command("register", "Discover MCP tools and register them on the agent", {}, register)
        .command("delete", "Delete the configured agent", {}, deleteAgent)
        .command("tools", "Print the function stubs synthesized from the MCP catalog", {}, listStubs)
        .command(
            "invoke <name> [arguments]",
            "Call one tool through the invocation router",
            (y) =>
                y
                    .positional("name", { type: "string", demandOption: true, describe: "Tool name" })
                    .positional("arguments", { type: "string", default: "{}", describe: "JSON object of arguments" }),
            (argv) => invoke(argv.name, argv.arguments)
        )
        .demandCommand(1, "Pick a command")
        .strict()
        .help()
        .parseAsync();
}

main().catch((err) => {
    logger.error("Command failed", { err: describeError(err) });
    process.exit(1);
});
