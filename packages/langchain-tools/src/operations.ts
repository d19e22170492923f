/**
 * Kaggle operations
 *
 * Each operation validates its arguments, then reads through the result cache
 * and the error normalizer owned by the shared OperationInvoker. Downloads are
 * never cached but still run one at a time per destination path, compared
 * case-sensitively.
 */

import path from "node:path";
import {
    ok,
    sanitizeDownloadPath,
    sanitizeFilename,
    validateChoice,
    validateCompetitionId,
    validateDatasetRef,
    validateModelRef,
    validatePagination,
    validateSearchTerm,
    validateSlug,
    validationError,
} from "@kaggle-tools/core";
import type { Operation, OperationInvoker, ValidationResult } from "@kaggle-tools/core";
import { fileExists, writeArchive, writeDownload } from "@kaggle-tools/kaggle-client";
import type { Competition, DataFile, Dataset, KaggleClient, Model } from "@kaggle-tools/kaggle-client";
import type { Readable } from "node:stream";
import {
    COMPETITION_CATEGORIES,
    COMPETITION_SORT_ORDERS,
    DATASET_FILE_TYPES,
    DATASET_LICENSES,
    DATASET_SIZE_BOUNDS,
    DATASET_SIZES,
    DATASET_SORT_ORDERS,
    MODEL_SORT_ORDERS,
    toApiCompetitionSort,
    toApiModelSort,
    unlessAll,
} from "./filters.js";
import type {
    CompetitionCategory,
    CompetitionSortOrder,
    DatasetFileType,
    DatasetLicense,
    DatasetSize,
    DatasetSortOrder,
    ModelSortOrder,
} from "./filters.js";
import { formatFileSize } from "./responses.js";

// ============ Arguments ============

interface PageArgs {
    page?: number;
    pageSize?: number;
}

export interface ListCompetitionsArgs extends PageArgs {
    search?: string;
    category?: string;
    sortBy?: string;
}

export interface CompetitionArgs {
    competitionId: string;
}

export interface DownloadArgs {
    fileName?: string;
    /** Directory under the download root; defaults to the competition id or dataset ref */
    subdirectory?: string;
    /** Replace files that already exist */
    force?: boolean;
}

export interface DownloadCompetitionArgs extends CompetitionArgs, DownloadArgs {}

export interface SearchDatasetsArgs extends PageArgs {
    search?: string;
    sortBy?: string;
    size?: string;
    fileType?: string;
    license?: string;
    /** Comma-separated numeric tag ids */
    tagIds?: string;
    user?: string;
}

export interface DatasetArgs {
    datasetRef: string;
}

export interface DownloadDatasetArgs extends DatasetArgs, DownloadArgs {
    /** Extract the whole-dataset archive into the download directory. Default true. */
    unzip?: boolean;
}

export interface ListModelsArgs extends PageArgs {
    search?: string;
    sortBy?: string;
    owner?: string;
}

export interface ModelArgs {
    modelRef: string;
}

// ============ Results ============

export interface SizedFile extends DataFile {
    size: string;
}

export interface Page {
    page: number;
    pageSize: number;
    /** Entries returned for this page */
    totalCount: number;
}

export interface CompetitionList extends Page {
    competitions: Competition[];
}

export interface CompetitionFiles {
    competitionId: string;
    files: SizedFile[];
    totalFiles: number;
}

export interface DatasetSummary extends Dataset {
    size: string;
}

export interface DatasetList extends Page {
    datasets: DatasetSummary[];
}

export interface DatasetDetails extends DatasetSummary {
    files: SizedFile[];
}

export interface ModelList extends Page {
    models: Model[];
    nextPageToken: string | null;
}

export interface DownloadReport {
    /** Competition id or dataset ref */
    source: string;
    /** Directory relative to the download root */
    downloadPath: string;
    downloadedFiles: string[];
    totalFiles: number;
    sizeBytes: number | null;
    size: string;
    /** True when existing files were kept because `force` was not set and nothing new was written */
    skipped: boolean;
}

export interface KaggleOperations {
    listCompetitions: Operation<ListCompetitionsArgs, CompetitionList>;
    getCompetitionDetails: Operation<CompetitionArgs, Competition>;
    listCompetitionFiles: Operation<CompetitionArgs, CompetitionFiles>;
    downloadCompetitionFiles: Operation<DownloadCompetitionArgs, DownloadReport>;
    searchDatasets: Operation<SearchDatasetsArgs, DatasetList>;
    getDatasetDetails: Operation<DatasetArgs, DatasetDetails>;
    downloadDataset: Operation<DownloadDatasetArgs, DownloadReport>;
    listModels: Operation<ListModelsArgs, ModelList>;
    getModelDetails: Operation<ModelArgs, Model>;
}

export interface KaggleOperationsOptions {
    invoker: OperationInvoker;
    client: KaggleClient;
    /** Absolute directory every download lands under */
    downloadRoot: string;
    defaultPageSize: number;
    maxPageSize: number;
    ttl: {
        competitionsMs: number;
        datasetsMs: number;
        modelsMs: number;
    };
}

// ============ Validation helpers ============

function validatePage(args: PageArgs, defaultPageSize: number, maxPageSize: number) {
    return validatePagination(args.page ?? 1, args.pageSize ?? defaultPageSize, maxPageSize);
}

function validateOptionalSlug(label: string, value: unknown): ValidationResult<string | undefined> {
    if (value === undefined || value === null || value === "") return ok(undefined);
    return validateSlug(label, value);
}

function validateTagIds(value: unknown): ValidationResult<string | undefined> {
    if (value === undefined || value === null || value === "") return ok(undefined);
    if (typeof value !== "string" || !/^\d+(,\d+)*$/.test(value.replace(/\s+/g, ""))) {
        return validationError("tagIds must be a comma-separated list of numeric tag ids");
    }
    return ok(value.replace(/\s+/g, ""));
}

function validateFlag(field: string, value: unknown, fallback: boolean): ValidationResult<boolean> {
    if (value === undefined) return ok(fallback);
    if (typeof value !== "boolean") return validationError(`${field} must be a boolean`);
    return ok(value);
}

interface DownloadTarget {
    /** Remote file name, absent for the whole bundle */
    fileName: string | undefined;
    destination: string;
    force: boolean;
    /** Extract the bundle into the destination's directory instead of storing it */
    unzip: boolean;
}

/**
 * Resolve where a download lands. The requested file name is collapsed into
 * one safe segment; the subdirectory is checked against the download root.
 */
async function validateDownloadTarget(
    root: string,
    args: DownloadArgs & { unzip?: unknown },
    defaultSubdirectory: string,
    bundleName: string
): Promise<ValidationResult<DownloadTarget>> {
    const force = validateFlag("force", args.force, false);
    if (!force.ok) return force;
    const unzip = validateFlag("unzip", args.unzip, false);
    if (!unzip.ok) return unzip;

    let fileName: string | undefined;
    let localName = bundleName;
    if (args.fileName !== undefined && args.fileName !== "") {
        const sanitized = sanitizeFilename(args.fileName);
        if (!sanitized.ok) return sanitized;
        fileName = args.fileName.trim();
        localName = sanitized.value;
    }

    const subdirectory = args.subdirectory ?? defaultSubdirectory;
    const destination = await sanitizeDownloadPath(root, `${subdirectory}/${localName}`);
    if (!destination.ok) return destination;
    return ok({
        fileName,
        destination: destination.value,
        force: force.value,
        unzip: unzip.value && fileName === undefined,
    });
}

/**
 * Downloads share a flight only when they write the same path. Cache keys
 * fold case, paths on disk may not.
 */
function downloadFlightKey(target: DownloadTarget): string {
    return target.unzip ? `${path.dirname(target.destination)}/` : target.destination;
}

// ============ Mapping helpers ============

function withSize(file: DataFile): SizedFile {
    return { ...file, size: formatFileSize(file.sizeBytes) };
}

function summarize(dataset: Dataset): DatasetSummary {
    return { ...dataset, size: formatFileSize(dataset.sizeBytes) };
}

async function download(
    root: string,
    source: string,
    target: DownloadTarget,
    open: () => Promise<Readable>
): Promise<DownloadReport> {
    const directory = path.dirname(target.destination);
    const downloadPath = path.relative(root, directory);
    const name = path.basename(target.destination);
    const report = (sizeBytes: number | null, skipped: boolean): DownloadReport => ({
        source,
        downloadPath,
        downloadedFiles: skipped ? [] : [name],
        totalFiles: skipped ? 0 : 1,
        sizeBytes,
        size: formatFileSize(sizeBytes),
        skipped,
    });

    if (target.unzip) {
        const extracted = await writeArchive(await open(), directory, { force: target.force });
        const skipped = extracted.files.length === 0 && extracted.skipped.length > 0;
        return {
            source,
            downloadPath,
            downloadedFiles: extracted.files,
            totalFiles: extracted.files.length,
            sizeBytes: skipped ? null : extracted.sizeBytes,
            size: formatFileSize(skipped ? null : extracted.sizeBytes),
            skipped,
        };
    }
    if (!target.force && (await fileExists(target.destination))) {
        return report(null, true);
    }
    const written = await writeDownload(await open(), target.destination, { force: target.force });
    return written ? report(written.sizeBytes, false) : report(null, true);
}

/**
 * Define every Kaggle operation on `invoker`
 */
export function createKaggleOperations(options: KaggleOperationsOptions): KaggleOperations {
    const { invoker, client, downloadRoot, defaultPageSize, maxPageSize, ttl } = options;

    // ============ Competitions ============

    const listCompetitions = invoker.define({
        name: "list_competitions",
        ttlMs: ttl.competitionsMs,
        validate: (args: ListCompetitionsArgs) => {
            const search = validateSearchTerm(args.search);
            if (!search.ok) return search;
            const category = validateChoice<CompetitionCategory>("category", args.category ?? "all", COMPETITION_CATEGORIES);
            if (!category.ok) return category;
            const sortBy = validateChoice<CompetitionSortOrder>("sortBy", args.sortBy ?? "deadline", COMPETITION_SORT_ORDERS);
            if (!sortBy.ok) return sortBy;
            const page = validatePage(args, defaultPageSize, maxPageSize);
            if (!page.ok) return page;
            return ok({ search: search.value, category: category.value, sortBy: sortBy.value, ...page.value });
        },
        call: async ({ search, category, sortBy, page, pageSize }): Promise<CompetitionList> => {
            const competitions = await client.listCompetitions({
                search,
                category: unlessAll(category),
                sortBy: toApiCompetitionSort(sortBy),
                page,
            });
            return { competitions: competitions.slice(0, pageSize), page, pageSize, totalCount: competitions.length };
        },
    });

    const getCompetitionDetails = invoker.define({
        name: "get_competition_details",
        ttlMs: ttl.competitionsMs,
        validate: (args: CompetitionArgs) => validateCompetitionId(args.competitionId),
        call: (competitionId) => client.getCompetition(competitionId),
    });

    const listCompetitionFiles = invoker.define({
        name: "list_competition_files",
        ttlMs: ttl.competitionsMs,
        validate: (args: CompetitionArgs) => validateCompetitionId(args.competitionId),
        call: async (competitionId): Promise<CompetitionFiles> => {
            const files = (await client.listCompetitionFiles(competitionId)).map(withSize);
            return { competitionId, files, totalFiles: files.length };
        },
    });

    const downloadCompetitionFiles = invoker.define({
        name: "download_competition_files",
        cacheable: false,
        flightKey: downloadFlightKey,
        validate: async (args: DownloadCompetitionArgs) => {
            const id = validateCompetitionId(args.competitionId);
            if (!id.ok) return id;
            const target = await validateDownloadTarget(downloadRoot, args, id.value, `${id.value}.zip`);
            if (!target.ok) return target;
            return ok({ competitionId: id.value, ...target.value });
        },
        call: ({ competitionId, ...target }) =>
            download(downloadRoot, competitionId, target, () =>
                client.downloadCompetition(competitionId, target.fileName)
            ),
    });

    // ============ Datasets ============

    const searchDatasets = invoker.define({
        name: "search_datasets",
        ttlMs: ttl.datasetsMs,
        validate: (args: SearchDatasetsArgs) => {
            const search = validateSearchTerm(args.search);
            if (!search.ok) return search;
            const sortBy = validateChoice<DatasetSortOrder>("sortBy", args.sortBy ?? "hottest", DATASET_SORT_ORDERS);
            if (!sortBy.ok) return sortBy;
            const size = validateChoice<DatasetSize>("size", args.size ?? "all", DATASET_SIZES);
            if (!size.ok) return size;
            const fileType = validateChoice<DatasetFileType>("fileType", args.fileType ?? "all", DATASET_FILE_TYPES);
            if (!fileType.ok) return fileType;
            const license = validateChoice<DatasetLicense>("license", args.license ?? "all", DATASET_LICENSES);
            if (!license.ok) return license;
            const tagIds = validateTagIds(args.tagIds);
            if (!tagIds.ok) return tagIds;
            const user = validateOptionalSlug("user", args.user);
            if (!user.ok) return user;
            const page = validatePage(args, defaultPageSize, maxPageSize);
            if (!page.ok) return page;
            return ok({
                search: search.value,
                sortBy: sortBy.value,
                size: size.value,
                fileType: fileType.value,
                license: license.value,
                tagIds: tagIds.value,
                user: user.value,
                ...page.value,
            });
        },
        call: async ({ search, sortBy, size, fileType, license, tagIds, user, page, pageSize }): Promise<DatasetList> => {
            const datasets = await client.listDatasets({
                search,
                sortBy,
                fileType: unlessAll(fileType),
                license: unlessAll(license),
                tagIds,
                user,
                page,
                ...DATASET_SIZE_BOUNDS[size],
            });
            return {
                datasets: datasets.slice(0, pageSize).map(summarize),
                page,
                pageSize,
                totalCount: datasets.length,
            };
        },
    });

    const getDatasetDetails = invoker.define({
        name: "get_dataset_details",
        ttlMs: ttl.datasetsMs,
        validate: (args: DatasetArgs) => validateDatasetRef(args.datasetRef),
        call: async ({ owner, name }): Promise<DatasetDetails> => {
            const [dataset, files] = await Promise.all([
                client.getDataset(owner, name),
                client.listDatasetFiles(owner, name),
            ]);
            return { ...summarize(dataset), files: files.map(withSize) };
        },
    });

    const downloadDataset = invoker.define({
        name: "download_dataset",
        cacheable: false,
        flightKey: downloadFlightKey,
        validate: async (args: DownloadDatasetArgs) => {
            const ref = validateDatasetRef(args.datasetRef);
            if (!ref.ok) return ref;
            const { owner, name } = ref.value;
            const target = await validateDownloadTarget(
                downloadRoot,
                { ...args, unzip: args.unzip ?? true },
                `${owner}/${name}`,
                `${name}.zip`
            );
            if (!target.ok) return target;
            return ok({ owner, name, ...target.value });
        },
        call: ({ owner, name, ...target }) =>
            download(downloadRoot, `${owner}/${name}`, target, () =>
                client.downloadDataset(owner, name, target.fileName)
            ),
    });

    // ============ Models ============

    const listModels = invoker.define({
        name: "list_models",
        ttlMs: ttl.modelsMs,
        validate: (args: ListModelsArgs) => {
            const search = validateSearchTerm(args.search);
            if (!search.ok) return search;
            const sortBy = validateChoice<ModelSortOrder>("sortBy", args.sortBy ?? "hottest", MODEL_SORT_ORDERS);
            if (!sortBy.ok) return sortBy;
            const owner = validateOptionalSlug("owner", args.owner);
            if (!owner.ok) return owner;
            const page = validatePage(args, defaultPageSize, maxPageSize);
            if (!page.ok) return page;
            return ok({ search: search.value, sortBy: sortBy.value, owner: owner.value, ...page.value });
        },
        call: async ({ search, sortBy, owner, page, pageSize }): Promise<ModelList> => {
            // The models endpoint pages by token; page numbers above 1 are passed as the token
            const result = await client.listModels({
                search,
                sortBy: toApiModelSort(sortBy),
                owner,
                pageSize,
                pageToken: page > 1 ? String(page) : undefined,
            });
            return {
                models: result.models,
                page,
                pageSize,
                totalCount: result.models.length,
                nextPageToken: result.nextPageToken,
            };
        },
    });

    const getModelDetails = invoker.define({
        name: "get_model_details",
        ttlMs: ttl.modelsMs,
        validate: (args: ModelArgs) => validateModelRef(args.modelRef),
        call: ({ owner, slug }) => client.getModel(owner, slug),
    });

    return {
        listCompetitions,
        getCompetitionDetails,
        listCompetitionFiles,
        downloadCompetitionFiles,
        searchDatasets,
        getDatasetDetails,
        downloadDataset,
        listModels,
        getModelDetails,
    };
}
