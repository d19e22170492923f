/**
 * JSON envelopes returned to tool callers
 */

import type { ErrorEnvelope, OperationResult } from "@kaggle-tools/core";

export interface SuccessResponse<T> {
    status: "success";
    data: T;
    cached: boolean;
    timestamp: string;
}

export interface ErrorResponse {
    status: "error";
    error: ErrorEnvelope;
    timestamp: string;
}

export type OperationResponse<T> = SuccessResponse<T> | ErrorResponse;

export function toResponse<T>(result: OperationResult<T>, now: Date = new Date()): OperationResponse<T> {
    const timestamp = now.toISOString();
    if (!result.ok) {
        return { status: "error", error: result.error, timestamp };
    }
    return { status: "success", data: result.value, cached: result.cached, timestamp };
}

const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB"];

/**
 * Human-readable byte size, e.g. `1.5 KB`
 */
export function formatFileSize(sizeBytes: number | null | undefined): string {
    if (sizeBytes === null || sizeBytes === undefined || !Number.isFinite(sizeBytes)) {
        return "unknown";
    }
    if (sizeBytes === 0) {
        return "0 B";
    }
    let size = sizeBytes;
    let unit = 0;
    while (size >= 1024 && unit < SIZE_UNITS.length - 1) {
        size /= 1024;
        unit++;
    }
    return `${size.toFixed(1)} ${SIZE_UNITS[unit]}`;
}
