/**
 * Accepted values of the enumerated operation filters, and how they map onto
 * Kaggle API query parameters
 */

export const COMPETITION_CATEGORIES = [
    "all",
    "featured",
    "research",
    "recruitment",
    "gettingStarted",
    "masters",
    "playground",
] as const;

export const COMPETITION_SORT_ORDERS = [
    "deadline",
    "grouped",
    "prize",
    "earliestDeadline",
    "latestDeadline",
    "numberOfTeams",
    "recentlyCreated",
] as const;

export const DATASET_SORT_ORDERS = ["hottest", "votes", "updated", "active", "published"] as const;
export const DATASET_SIZES = ["all", "small", "medium", "large"] as const;
export const DATASET_FILE_TYPES = ["all", "csv", "sqlite", "json", "bigQuery", "parquet"] as const;
export const DATASET_LICENSES = ["all", "cc", "gpl", "odb", "other"] as const;

export const MODEL_SORT_ORDERS = ["hottest", "downloadCount", "voteCount", "notebookCount", "createTime"] as const;

export type CompetitionCategory = (typeof COMPETITION_CATEGORIES)[number];
export type CompetitionSortOrder = (typeof COMPETITION_SORT_ORDERS)[number];
export type DatasetSortOrder = (typeof DATASET_SORT_ORDERS)[number];
export type DatasetSize = (typeof DATASET_SIZES)[number];
export type DatasetFileType = (typeof DATASET_FILE_TYPES)[number];
export type DatasetLicense = (typeof DATASET_LICENSES)[number];
export type ModelSortOrder = (typeof MODEL_SORT_ORDERS)[number];

const MB = 1024 * 1024;
const GB = 1024 * MB;

/** Byte bounds behind the size buckets */
export const DATASET_SIZE_BOUNDS: Record<DatasetSize, { minSize?: number; maxSize?: number }> = {
    all: {},
    small: { maxSize: 10 * MB },
    medium: { minSize: 10 * MB, maxSize: GB },
    large: { minSize: GB },
};

/** "deadline" is the friendly name for the soonest deadline first */
export function toApiCompetitionSort(sortBy: CompetitionSortOrder): string {
    return sortBy === "deadline" ? "earliestDeadline" : sortBy;
}

export function toApiModelSort(sortBy: ModelSortOrder): string {
    return sortBy === "hottest" ? "hotness" : sortBy;
}

/** "all" means no filter */
export function unlessAll<T extends string>(value: T): T | undefined {
    return value === "all" ? undefined : value;
}
