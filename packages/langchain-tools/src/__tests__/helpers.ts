import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { vi } from "vitest";
import { OperationInvoker, ResultCache } from "@kaggle-tools/core";
import type { Logger } from "@kaggle-tools/core";
import { KaggleClient } from "@kaggle-tools/kaggle-client";
import type { FetchFn } from "@kaggle-tools/kaggle-client";
import { createKaggleOperations } from "../operations.js";

type Route = () => Response;

export function json(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

export function silentLogger(): Logger {
    const logger: Logger = {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        child: () => logger,
    };
    return logger;
}

/**
 * In-process stand-in for the Kaggle API, keyed by path below /api/v1
 */
export function createFakeKaggle(routes: Record<string, Route>) {
    const hits: string[] = [];
    const urls: URL[] = [];
    const fetchImpl: FetchFn = async (input) => {
        const url = new URL(String(input));
        const route = url.pathname.replace(/^\/api\/v1/, "");
        hits.push(route);
        urls.push(url);
        const handler = routes[route];
        return handler ? handler() : json({ message: "Not Found" }, 404);
    };
    return {
        fetch: fetchImpl,
        hits,
        urls,
        count: (route: string) => hits.filter((h) => h === route).length,
    };
}

export async function createTestSetup(routes: Record<string, Route>) {
    const kaggle = createFakeKaggle(routes);
    const downloadRoot = await fs.mkdtemp(path.join(os.tmpdir(), "kaggle-tools-ops-"));
    const cache = new ResultCache();
    const invoker = new OperationInvoker({
        cache,
        logger: silentLogger(),
        defaultTtlMs: 60_000,
        sleep: async () => {},
    });
    const client = new KaggleClient({
        credentials: { username: "test-user", key: "test-secret" },
        fetch: kaggle.fetch,
        baseUrl: "https://kaggle.test/api/v1",
    });
    const operations = createKaggleOperations({
        invoker,
        client,
        downloadRoot,
        defaultPageSize: 20,
        maxPageSize: 100,
        ttl: { competitionsMs: 3_600_000, datasetsMs: 21_600_000, modelsMs: 21_600_000 },
    });
    return {
        kaggle,
        cache,
        invoker,
        operations,
        downloadRoot,
        cleanup: () => fs.rm(downloadRoot, { recursive: true, force: true }),
    };
}

export const competitionsFixture = [
    {
        id: 1001,
        ref: "https://www.kaggle.com/competitions/spaceship-titanic",
        title: "Spaceship Titanic",
        url: "https://www.kaggle.com/competitions/spaceship-titanic",
        category: "Getting Started",
        reward: "Knowledge",
        deadline: "2030-01-01T00:00:00Z",
        teamCount: 2000,
    },
    {
        id: 1002,
        ref: "ocean-forecasting",
        title: "Ocean Forecasting",
        url: "https://www.kaggle.com/competitions/ocean-forecasting",
        category: "Featured",
        reward: "$50,000",
        deadline: "2026-10-23T00:00:00Z",
        teamCount: 300,
    },
    {
        id: 1003,
        ref: "protein-folding-lite",
        title: "Protein Folding Lite",
        url: "https://www.kaggle.com/competitions/protein-folding-lite",
        category: "Research",
        reward: "25,000 Usd",
        deadline: "2026-12-01T00:00:00Z",
        teamCount: 120,
    },
    {
        id: 1004,
        ref: "closed-challenge",
        title: "Closed Challenge",
        url: "https://www.kaggle.com/competitions/closed-challenge",
        category: "Featured",
        reward: "$10,000",
        deadline: "2026-01-01T00:00:00Z",
        teamCount: 800,
    },
];

export const datasetsFixture = [
    {
        ref: "alice/city-weather",
        title: "City Weather",
        totalBytes: 2048,
        downloadCount: 100,
        voteCount: 10,
        usabilityRating: 0.9,
        licenseName: "CC0-1.0",
        lastUpdated: "2026-09-01T00:00:00Z",
    },
    {
        ref: "bob/street-images",
        title: "Street Images",
        totalBytes: 5 * 1024 * 1024 * 1024,
        downloadCount: 50,
        voteCount: 4,
        usabilityRating: 0.5,
        licenseName: "CC-BY-SA-4.0",
        lastUpdated: "2026-08-01T00:00:00Z",
    },
];

export const modelsFixture = {
    models: [{ ref: "carol/tiny-lm", title: "Tiny LM", author: "carol", slug: "tiny-lm" }],
    nextPageToken: "",
};
