import path from "path";
import { z } from "zod";
import { formatZodError, LOG_LEVELS } from "@kaggle-tools/core";
import type { LogLevel } from "@kaggle-tools/core";
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from "@kaggle-tools/kaggle-client";

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

const positiveInt = z.coerce.number().int("must be an integer").positive("must be positive");
const optionalText = z
    .string()
    .optional()
    .transform((value) => (value?.trim() ? value.trim() : undefined));

const envSchema = z
    .object({
        KAGGLE_USERNAME: optionalText,
        KAGGLE_KEY: optionalText,
        KAGGLE_CONFIG_DIR: optionalText,
        KAGGLE_API_BASE_URL: z.url("must be a URL").default(DEFAULT_BASE_URL),
        KAGGLE_DOWNLOAD_PATH: z.string().trim().min(1, "must be non-empty").default("./kaggle_data"),
        LOG_LEVEL: z.enum(LOG_LEVELS, `must be one of: ${LOG_LEVELS.join(", ")}`).default("info"),
        DEFAULT_PAGE_SIZE: positiveInt.default(20),
        MAX_PAGE_SIZE: positiveInt.default(100),
        // seconds
        CACHE_TTL_COMPETITIONS: positiveInt.default(3600),
        CACHE_TTL_DATASETS: positiveInt.default(21600),
        CACHE_TTL_MODELS: positiveInt.default(21600),
        CACHE_MAX_ENTRIES: positiveInt.optional(),
        REQUEST_TIMEOUT_MS: positiveInt.default(DEFAULT_TIMEOUT_MS),
        RETRY_MAX_ATTEMPTS: positiveInt.default(3),
    })
    .refine((env) => env.DEFAULT_PAGE_SIZE <= env.MAX_PAGE_SIZE, {
        message: "cannot exceed MAX_PAGE_SIZE",
        path: ["DEFAULT_PAGE_SIZE"],
    });

export interface AppConfig {
    kaggle: {
        username: string | undefined;
        key: string | undefined;
        /** Directory holding kaggle.json; unset means ~/.kaggle */
        configDir: string | undefined;
        baseUrl: string;
        timeoutMs: number;
    };
    /** Absolute directory downloads land under */
    downloadRoot: string;
    logLevel: LogLevel;
    defaultPageSize: number;
    maxPageSize: number;
    ttl: {
        competitionsMs: number;
        datasetsMs: number;
        modelsMs: number;
    };
    cacheMaxEntries: number | undefined;
    retryMaxAttempts: number;
}

/**
 * Read configuration from environment variables
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(`Invalid configuration: ${formatZodError(parsed.error)}`);
    }
    const vars = parsed.data;

    return {
        kaggle: {
            username: vars.KAGGLE_USERNAME,
            key: vars.KAGGLE_KEY,
            configDir: vars.KAGGLE_CONFIG_DIR,
            baseUrl: vars.KAGGLE_API_BASE_URL,
            timeoutMs: vars.REQUEST_TIMEOUT_MS,
        },
        downloadRoot: path.resolve(cwd, vars.KAGGLE_DOWNLOAD_PATH),
        logLevel: vars.LOG_LEVEL,
        defaultPageSize: vars.DEFAULT_PAGE_SIZE,
        maxPageSize: vars.MAX_PAGE_SIZE,
        ttl: {
            competitionsMs: vars.CACHE_TTL_COMPETITIONS * 1000,
            datasetsMs: vars.CACHE_TTL_DATASETS * 1000,
            modelsMs: vars.CACHE_TTL_MODELS * 1000,
        },
        cacheMaxEntries: vars.CACHE_MAX_ENTRIES,
        retryMaxAttempts: vars.RETRY_MAX_ATTEMPTS,
    };
}
