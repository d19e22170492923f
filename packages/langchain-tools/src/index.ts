export {
    createKaggleOperations,
    type CompetitionArgs,
    type CompetitionFiles,
    type CompetitionList,
    type DatasetArgs,
    type DatasetDetails,
    type DatasetList,
    type DatasetSummary,
    type DownloadArgs,
    type DownloadCompetitionArgs,
    type DownloadDatasetArgs,
    type DownloadReport,
    type KaggleOperations,
    type KaggleOperationsOptions,
    type ListCompetitionsArgs,
    type ListModelsArgs,
    type ModelArgs,
    type ModelList,
    type SearchDatasetsArgs,
    type SizedFile,
} from "./operations.js";
export { createOperationCatalog, findOperation, operationSchemas, type CatalogEntry, type OperationName } from "./catalog.js";
export { createKaggleResources, readResource, parsePrize, type KaggleResource, type KaggleResourcesOptions } from "./resources.js";
export { createKaggleTools } from "./tools.js";
export { formatFileSize, toResponse, type ErrorResponse, type OperationResponse, type SuccessResponse } from "./responses.js";
export * from "./filters.js";
