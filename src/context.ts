import * as fs from "fs/promises";
import { ConsoleLogger, OperationInvoker, ResultCache } from "@kaggle-tools/core";
import type { Logger } from "@kaggle-tools/core";
import { createCredentialsProvider, KaggleClient } from "@kaggle-tools/kaggle-client";
import type { FetchFn } from "@kaggle-tools/kaggle-client";
import {
    createKaggleOperations,
    createKaggleResources,
    createKaggleTools,
    createOperationCatalog,
} from "@kaggle-tools/langchain-tools";
import type { CatalogEntry, KaggleOperations, KaggleResource } from "@kaggle-tools/langchain-tools";
import type { AppConfig } from "./config.js";

export interface AppContext {
    config: AppConfig;
    logger: Logger;
    cache: ResultCache;
    invoker: OperationInvoker;
    client: KaggleClient;
    operations: KaggleOperations;
    catalog: CatalogEntry[];
    resources: KaggleResource[];
    tools: ReturnType<typeof createKaggleTools>;
}

export interface ContextOverrides {
    logger?: Logger;
    fetch?: FetchFn;
}

/**
 * Wire logger → cache → invoker → client → operations → catalog, resources and tools
 */
export async function createContext(config: AppConfig, overrides: ContextOverrides = {}): Promise<AppContext> {
    const logger = overrides.logger ?? new ConsoleLogger({ level: config.logLevel });
    await fs.mkdir(config.downloadRoot, { recursive: true });

    const cache = new ResultCache({ maxEntries: config.cacheMaxEntries });
    const invoker = new OperationInvoker({
        cache,
        logger: logger.child("invoker"),
        defaultTtlMs: config.ttl.competitionsMs,
        retry: { maxAttempts: config.retryMaxAttempts },
    });

    const credentials = createCredentialsProvider({
        env: { KAGGLE_USERNAME: config.kaggle.username, KAGGLE_KEY: config.kaggle.key },
        configDir: config.kaggle.configDir,
    });
    const client = new KaggleClient({
        credentials,
        baseUrl: config.kaggle.baseUrl,
        timeoutMs: config.kaggle.timeoutMs,
        fetch: overrides.fetch,
    });

    const operations = createKaggleOperations({
        invoker,
        client,
        downloadRoot: config.downloadRoot,
        defaultPageSize: config.defaultPageSize,
        maxPageSize: config.maxPageSize,
        ttl: config.ttl,
    });
    const catalog = createOperationCatalog(operations);

    logger.debug(`Download root: ${config.downloadRoot}`);
    return {
        config,
        logger,
        cache,
        invoker,
        client,
        operations,
        catalog,
        resources: createKaggleResources(operations),
        tools: createKaggleTools(catalog),
    };
}
