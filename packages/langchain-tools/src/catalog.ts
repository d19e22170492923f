/**
 * Operation catalog: name, description and input schema of every operation,
 * with a runner that accepts untyped input (tool calls, CLI JSON, HTTP bodies)
 */

import { z } from "zod";
import { createErrorEnvelope, formatZodError } from "@kaggle-tools/core";
import type { Operation, OperationResult } from "@kaggle-tools/core";
import {
    COMPETITION_CATEGORIES,
    COMPETITION_SORT_ORDERS,
    DATASET_FILE_TYPES,
    DATASET_LICENSES,
    DATASET_SIZES,
    DATASET_SORT_ORDERS,
    MODEL_SORT_ORDERS,
} from "./filters.js";
import type { KaggleOperations } from "./operations.js";

export interface CatalogEntry {
    name: string;
    description: string;
    schema: z.ZodObject;
    run(input: unknown): Promise<OperationResult<unknown>>;
}

function oneOf(values: readonly string[]): string {
    return values.join(", ");
}

const page = z.number().int().optional().describe("Page number, starting at 1. Default 1.");
const pageSize = z.number().int().optional().describe("Results per page. Default 20.");
const search = z.string().optional().describe("Free-text search term. Empty means no filter.");

const downloadFields = {
    fileName: z
        .string()
        .optional()
        .describe("Single file to download. Omit to download the whole bundle as a zip archive."),
    subdirectory: z
        .string()
        .optional()
        .describe("Relative directory under the download root. Defaults to the source identifier."),
    force: z.boolean().optional().describe("Replace files that already exist. Default false."),
};

const competitionId = z.string().describe("Competition slug, e.g. 'titanic'");
const datasetRef = z.string().describe("Dataset reference in the format 'owner/dataset-name'");

export const operationSchemas = {
    list_competitions: z.object({
        search,
        category: z.string().optional().describe(`One of: ${oneOf(COMPETITION_CATEGORIES)}. Default all.`),
        sortBy: z.string().optional().describe(`One of: ${oneOf(COMPETITION_SORT_ORDERS)}. Default deadline.`),
        page,
        pageSize,
    }),
    get_competition_details: z.object({ competitionId }),
    list_competition_files: z.object({ competitionId }),
    download_competition_files: z.object({ competitionId, ...downloadFields }),
    search_datasets: z.object({
        search,
        sortBy: z.string().optional().describe(`One of: ${oneOf(DATASET_SORT_ORDERS)}. Default hottest.`),
        size: z.string().optional().describe(`One of: ${oneOf(DATASET_SIZES)}. Default all.`),
        fileType: z.string().optional().describe(`One of: ${oneOf(DATASET_FILE_TYPES)}. Default all.`),
        license: z.string().optional().describe(`One of: ${oneOf(DATASET_LICENSES)}. Default all.`),
        tagIds: z.string().optional().describe("Comma-separated numeric tag ids"),
        user: z.string().optional().describe("Only datasets owned by this user"),
        page,
        pageSize,
    }),
    get_dataset_details: z.object({ datasetRef }),
    download_dataset: z.object({
        datasetRef,
        ...downloadFields,
        unzip: z
            .boolean()
            .optional()
            .describe("Extract the whole-dataset archive and remove it. Ignored with fileName. Default true."),
    }),
    list_models: z.object({
        search,
        sortBy: z.string().optional().describe(`One of: ${oneOf(MODEL_SORT_ORDERS)}. Default hottest.`),
        owner: z.string().optional().describe("Only models published by this owner"),
        page,
        pageSize,
    }),
    get_model_details: z.object({
        modelRef: z.string().describe("Model reference in the format 'owner/model-slug'"),
    }),
};

export type OperationName = keyof typeof operationSchemas;

const descriptions: Record<OperationName, string> = {
    list_competitions: "List Kaggle competitions with optional search, category and sort filters.",
    get_competition_details:
        "Get details of one Kaggle competition: reward, deadline, category, team count and evaluation metric.",
    list_competition_files: "List the data files of a Kaggle competition with their sizes.",
    download_competition_files:
        "Download a competition file, or all competition files as one zip archive, into the local download directory.",
    search_datasets: "Search public Kaggle datasets by term, owner, size, file type, license and tags.",
    get_dataset_details: "Get metadata and the file list of one Kaggle dataset.",
    download_dataset:
        "Download a dataset file, or the whole dataset (extracted unless unzip is false), into the local download directory.",
    list_models: "List Kaggle models with optional search, owner and sort filters.",
    get_model_details: "Get metadata of one Kaggle model.",
};

function entry<S extends z.ZodObject, R>(name: OperationName, schema: S, operation: Operation<z.output<S>, R>): CatalogEntry {
    return {
        name,
        description: descriptions[name],
        schema,
        run: async (input) => {
            const parsed = schema.safeParse(input ?? {});
            if (!parsed.success) {
                return { ok: false, error: createErrorEnvelope("Validation", formatZodError(parsed.error)) };
            }
            return operation(parsed.data);
        },
    };
}

export function createOperationCatalog(operations: KaggleOperations): CatalogEntry[] {
    return [
        entry("list_competitions", operationSchemas.list_competitions, operations.listCompetitions),
        entry("get_competition_details", operationSchemas.get_competition_details, operations.getCompetitionDetails),
        entry("list_competition_files", operationSchemas.list_competition_files, operations.listCompetitionFiles),
        entry(
            "download_competition_files",
            operationSchemas.download_competition_files,
            operations.downloadCompetitionFiles
        ),
        entry("search_datasets", operationSchemas.search_datasets, operations.searchDatasets),
        entry("get_dataset_details", operationSchemas.get_dataset_details, operations.getDatasetDetails),
        entry("download_dataset", operationSchemas.download_dataset, operations.downloadDataset),
        entry("list_models", operationSchemas.list_models, operations.listModels),
        entry("get_model_details", operationSchemas.get_model_details, operations.getModelDetails),
    ];
}

export function findOperation(catalog: CatalogEntry[], name: string): CatalogEntry | undefined {
    return catalog.find((e) => e.name === name);
}
