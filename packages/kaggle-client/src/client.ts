/**
 * KaggleClient - read-only access to the Kaggle REST API (v1)
 */

import { Readable } from 'stream';
import type { z } from 'zod';
import { MissingCredentialsError } from '@kaggle-tools/core';
import type { CredentialsProvider, KaggleCredentials } from './credentials.js';
import { KaggleApiError, RequestTimeoutError } from './errors.js';
import {
  competitionFilesSchema,
  competitionSchema,
  datasetFilesSchema,
  datasetSchema,
  modelListSchema,
  modelSchema,
  toCompetition,
  toDataFile,
  toDataset,
  toModel,
} from './schemas.js';
import type { Competition, DataFile, Dataset, Model } from './schemas.js';

export const DEFAULT_BASE_URL = 'https://www.kaggle.com/api/v1';
export const DEFAULT_TIMEOUT_MS = 30_000;

type QueryValue = string | number | boolean | undefined;

export type FetchFn = typeof fetch;

export interface KaggleClientOptions {
  credentials: CredentialsProvider | KaggleCredentials | undefined;
  baseUrl?: string;
  /** Applies until the response headers (downloads) or the whole JSON body arrived */
  timeoutMs?: number;
  /** fetch implementation override used in tests */
  fetch?: FetchFn;
  userAgent?: string;
}

export interface ListCompetitionsParams {
  search?: string;
  category?: string;
  sortBy?: string;
  page?: number;
}

export interface ListDatasetsParams {
  search?: string;
  sortBy?: string;
  fileType?: string;
  license?: string;
  tagIds?: string;
  user?: string;
  minSize?: number;
  maxSize?: number;
  page?: number;
}

export interface ListModelsParams {
  search?: string;
  sortBy?: string;
  owner?: string;
  pageSize?: number;
  pageToken?: string;
}

export interface ModelPage {
  models: Model[];
  nextPageToken: string | null;
  totalResults: number | null;
}

function segment(value: string): string {
  return encodeURIComponent(value);
}

export class KaggleClient {
  private readonly credentials: CredentialsProvider;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchFn;
  private readonly userAgent: string;

  constructor(options: KaggleClientOptions) {
    const { credentials } = options;
    this.credentials = typeof credentials === 'function' ? credentials : async () => credentials;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
    this.userAgent = options.userAgent ?? 'kaggle-tools/0.1.0';
  }

  // ============ Competitions ============

  async listCompetitions(params: ListCompetitionsParams = {}): Promise<Competition[]> {
    const raw = await this.getJson(
      '/competitions/list',
      {
        search: params.search,
        category: params.category,
        sortBy: params.sortBy,
        page: params.page,
      },
      competitionSchema.array()
    );
    return raw.map(toCompetition);
  }

  /**
   * The v1 API has no single-competition endpoint; search and match by slug,
   * numeric id or URL suffix.
   */
  async getCompetition(id: string): Promise<Competition> {
    const wanted = id.toLowerCase();
    const candidates = await this.listCompetitions({ search: id });
    const match = candidates.find(
      (c) =>
        c.id.toLowerCase() === wanted ||
        (c.numericId !== null && String(c.numericId) === id) ||
        c.url.toLowerCase().endsWith(`/${wanted}`)
    );
    if (!match) {
      throw new KaggleApiError(404, '/competitions/list', 'Competition Not Found');
    }
    return match;
  }

  async listCompetitionFiles(id: string): Promise<DataFile[]> {
    const raw = await this.getJson(`/competitions/data/list/${segment(id)}`, {}, competitionFilesSchema);
    const files = Array.isArray(raw) ? raw : (raw.files ?? []);
    return files.map(toDataFile);
  }

  /**
   * Stream one competition file, or the whole bundle as a zip archive
   */
  async downloadCompetition(id: string, fileName?: string): Promise<Readable> {
    const endpoint = fileName
      ? `/competitions/data/download/${segment(id)}/${segment(fileName)}`
      : `/competitions/data/download-all/${segment(id)}`;
    return this.getStream(endpoint);
  }

  // ============ Datasets ============

  async listDatasets(params: ListDatasetsParams = {}): Promise<Dataset[]> {
    const raw = await this.getJson(
      '/datasets/list',
      {
        search: params.search,
        sortBy: params.sortBy,
        filetype: params.fileType,
        license: params.license,
        tagids: params.tagIds,
        user: params.user,
        minSize: params.minSize,
        maxSize: params.maxSize,
        page: params.page,
      },
      datasetSchema.array()
    );
    return raw.map(toDataset);
  }

  async getDataset(owner: string, slug: string): Promise<Dataset> {
    const raw = await this.getJson(`/datasets/view/${segment(owner)}/${segment(slug)}`, {}, datasetSchema);
    return toDataset(raw);
  }

  async listDatasetFiles(owner: string, slug: string): Promise<DataFile[]> {
    const raw = await this.getJson(`/datasets/list/${segment(owner)}/${segment(slug)}`, {}, datasetFilesSchema);
    if (raw.errorMessage) {
      throw new Error(raw.errorMessage);
    }
    return (raw.datasetFiles ?? []).map(toDataFile);
  }

  async downloadDataset(owner: string, slug: string, fileName?: string): Promise<Readable> {
    const base = `/datasets/download/${segment(owner)}/${segment(slug)}`;
    return this.getStream(fileName ? `${base}/${segment(fileName)}` : base);
  }

  // ============ Models ============

  async listModels(params: ListModelsParams = {}): Promise<ModelPage> {
    const raw = await this.getJson(
      '/models/list',
      {
        search: params.search,
        sortBy: params.sortBy,
        owner: params.owner,
        pageSize: params.pageSize,
        pageToken: params.pageToken,
      },
      modelListSchema
    );
    return {
      models: (raw.models ?? []).map(toModel),
      nextPageToken: raw.nextPageToken || null,
      totalResults: raw.totalResults ?? null,
    };
  }

  async getModel(owner: string, slug: string): Promise<Model> {
    const raw = await this.getJson(`/models/${segment(owner)}/${segment(slug)}/get`, {}, modelSchema);
    return toModel(raw);
  }

  // ============ Transport ============

  private async getJson<T>(endpoint: string, query: Record<string, QueryValue>, schema: z.ZodType<T>): Promise<T> {
    return this.withTimeout(async (signal) => {
      const response = await this.send(endpoint, query, signal, 'application/json');
      const json: unknown = await response.json();
      return schema.parse(json);
    });
  }

  private async getStream(endpoint: string): Promise<Readable> {
    // The timer only covers the wait for response headers
    const response = await this.withTimeout((signal) => this.send(endpoint, {}, signal, '*/*'));
    if (!response.body) {
      throw new Error(`Kaggle API ${endpoint} returned an empty body`);
    }
    return Readable.fromWeb(response.body);
  }

  private async withTimeout<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new RequestTimeoutError(this.timeoutMs)), this.timeoutMs);
    try {
      return await task(controller.signal);
    } finally {
      clearTimeout(timer);
    }
  }

  private async send(
    endpoint: string,
    query: Record<string, QueryValue>,
    signal: AbortSignal,
    accept: string
  ): Promise<Response> {
    const credentials = await this.credentials();
    if (!credentials) {
      throw new MissingCredentialsError(
        'No Kaggle API credentials configured. Set KAGGLE_USERNAME and KAGGLE_KEY or provide kaggle.json'
      );
    }

    const url = new URL(`${this.baseUrl}${endpoint}`);
    for (const [name, value] of Object.entries(query)) {
      if (value === undefined || value === '') continue;
      url.searchParams.set(name, String(value));
    }

    const token = Buffer.from(`${credentials.username}:${credentials.key}`).toString('base64');
    const response = await this.fetchImpl(url, {
      method: 'GET',
      headers: {
        Authorization: `Basic ${token}`,
        Accept: accept,
        'User-Agent': this.userAgent,
      },
      redirect: 'follow',
      signal,
    });
    if (!response.ok) {
      throw new KaggleApiError(response.status, endpoint, response.statusText);
    }
    return response;
  }
}
