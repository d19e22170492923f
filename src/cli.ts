#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { readResource, toResponse, findOperation } from "@kaggle-tools/langchain-tools";
import { loadConfig } from "./config.js";
import { createContext } from "./context.js";
import type { AppContext } from "./context.js";
import { DEFAULT_PORT, startServer } from "./server.js";

async function openContext(): Promise<AppContext> {
    return createContext(loadConfig());
}

function parseJsonArgs(json: string | undefined): unknown {
    if (json === undefined) return {};
    try {
        return JSON.parse(json);
    } catch {
        throw new Error("--json must be a valid JSON object");
    }
}

const program = new Command();

program.name("kaggle-tools").description("Validated, cached access to the Kaggle read-only API");

program
    .command("call")
    .description("Run one operation and print its JSON response")
    .argument("<operation>", "operation name, see `list`")
    .option("-j, --json <args>", "operation arguments as a JSON object")
    .action(async (name: string, options: { json?: string }) => {
        const context = await openContext();
        const entry = findOperation(context.catalog, name);
        if (!entry) {
            console.error(`Unknown operation: ${name}`);
            process.exitCode = 1;
            return;
        }
        const response = toResponse(await entry.run(parseJsonArgs(options.json)));
        console.log(JSON.stringify(response, null, 2));
        if (response.status === "error") {
            process.exitCode = 1;
        }
    });

program
    .command("resource")
    .description("Print a markdown resource")
    .argument("<uri>", "resource URI, e.g. kaggle://competitions/active")
    .action(async (uri: string) => {
        const context = await openContext();
        const text = await readResource(context.resources, uri);
        if (text === undefined) {
            console.error(`Unknown resource: ${uri}`);
            process.exitCode = 1;
            return;
        }
        console.log(text);
    });

program
    .command("list")
    .description("List operations and resources")
    .action(async () => {
        const context = await openContext();
        console.log("Operations:");
        for (const entry of context.catalog) {
            console.log(`  ${entry.name.padEnd(28)} ${entry.description}`);
        }
        console.log("\nResources:");
        for (const resource of context.resources) {
            console.log(`  ${resource.uri.padEnd(36)} ${resource.description}`);
        }
    });

program
    .command("serve")
    .description("Start the HTTP API")
    .option("-p, --port <port>", "port to listen on", String(DEFAULT_PORT))
    .action(async (options: { port: string }) => {
        const port = Number(options.port);
        if (!Number.isInteger(port) || port < 0 || port > 65535) {
            throw new Error(`Invalid port: ${options.port}`);
        }
        startServer(await openContext(), { port });
    });

try {
    await program.parseAsync(process.argv);
} catch (error) {
    if (error instanceof Error) {
        console.error(`Error: ${error.message}`);
    } else {
        console.error("Unknown error");
    }
    process.exit(1);
}
