/**
 * Response schemas for the Kaggle REST API and their domain mappings
 *
 * The API adds and drops fields between releases, so every field is optional
 * and unknown fields are stripped. Mappers turn the raw records into the
 * camel-cased records the rest of the system works with.
 */

import { z } from 'zod';

export const KAGGLE_WEB_URL = 'https://www.kaggle.com';

const text = z.string().nullish();
const count = z.number().nullish();
const flag = z.boolean().nullish();
/** Byte sizes arrive as numbers or numeric strings */
const bytes = z.union([z.number(), z.string()]).nullish();

const tagSchema = z.union([
  z.string(),
  z.object({
    ref: text,
    name: text,
  }),
]);

export const competitionSchema = z.object({
  id: z.union([z.number(), z.string()]).nullish(),
  ref: text,
  title: text,
  url: text,
  description: text,
  organizationName: text,
  category: text,
  reward: text,
  deadline: text,
  enabledDate: text,
  mergerDeadline: text,
  newEntrantDeadline: text,
  maxTeamSize: count,
  maxDailySubmissions: count,
  evaluationMetric: text,
  teamCount: count,
  totalTeams: count,
  kernelCount: count,
  userHasEntered: flag,
  userRank: count,
  awardsPoints: flag,
  tags: z.array(tagSchema).nullish(),
});

export const dataFileSchema = z.object({
  ref: text,
  name: text,
  totalBytes: bytes,
  size: bytes,
  creationDate: text,
  description: text,
});

/** Older API releases return a bare array, newer ones wrap it */
export const competitionFilesSchema = z.union([
  z.array(dataFileSchema),
  z.object({
    files: z.array(dataFileSchema).nullish(),
    nextPageToken: text,
  }),
]);

export const datasetSchema = z.object({
  id: z.union([z.number(), z.string()]).nullish(),
  ref: text,
  title: text,
  subtitle: text,
  description: text,
  ownerName: text,
  ownerRef: text,
  url: text,
  totalBytes: bytes,
  size: bytes,
  lastUpdated: text,
  downloadCount: count,
  voteCount: count,
  viewCount: count,
  usabilityRating: count,
  licenseName: text,
  isPrivate: flag,
  tags: z.array(tagSchema).nullish(),
});

export const datasetFilesSchema = z.object({
  datasetFiles: z.array(dataFileSchema).nullish(),
  errorMessage: text,
  nextPageToken: text,
});

export const modelSchema = z.object({
  id: z.union([z.number(), z.string()]).nullish(),
  ref: text,
  title: text,
  subtitle: text,
  author: text,
  slug: text,
  isPrivate: flag,
  description: text,
  publishTime: text,
  url: text,
});

export const modelListSchema = z.object({
  models: z.array(modelSchema).nullish(),
  nextPageToken: text,
  totalResults: count,
});

export type RawCompetition = z.infer<typeof competitionSchema>;
export type RawDataFile = z.infer<typeof dataFileSchema>;
export type RawDataset = z.infer<typeof datasetSchema>;
export type RawModel = z.infer<typeof modelSchema>;

export interface Competition {
  /** URL slug, e.g. `titanic` */
  id: string;
  numericId: number | null;
  title: string;
  url: string;
  description: string | null;
  organizationName: string | null;
  category: string | null;
  reward: string | null;
  deadline: string | null;
  enabledDate: string | null;
  mergerDeadline: string | null;
  maxTeamSize: number | null;
  maxDailySubmissions: number | null;
  evaluationMetric: string | null;
  teamCount: number | null;
  userHasEntered: boolean | null;
  tags: string[];
}

export interface DataFile {
  name: string;
  sizeBytes: number | null;
  creationDate: string | null;
}

export interface Dataset {
  /** `owner/slug` */
  ref: string;
  title: string;
  subtitle: string | null;
  description: string | null;
  ownerName: string | null;
  sizeBytes: number | null;
  lastUpdated: string | null;
  downloadCount: number | null;
  voteCount: number | null;
  usabilityRating: number | null;
  licenseName: string | null;
  tags: string[];
  url: string;
}

export interface Model {
  /** `owner/slug` */
  ref: string;
  title: string;
  subtitle: string | null;
  author: string | null;
  slug: string | null;
  isPrivate: boolean | null;
  description: string | null;
  publishTime: string | null;
  url: string;
}

function lastSegment(value: string): string {
  const parts = value.split('/').filter(Boolean);
  return parts[parts.length - 1] ?? value;
}

function toSizeBytes(value: number | string | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : null;
}

function tagNames(tags: RawCompetition['tags']): string[] {
  const names: string[] = [];
  for (const tag of tags ?? []) {
    const name = typeof tag === 'string' ? tag : (tag.name ?? tag.ref);
    if (name) names.push(name);
  }
  return names;
}

/**
 * Competitions are addressed by the slug at the end of their ref or URL
 */
export function toCompetition(raw: RawCompetition): Competition {
  const source = raw.ref ?? raw.url ?? (raw.id !== null && raw.id !== undefined ? String(raw.id) : '');
  const id = lastSegment(source);
  const numericId = typeof raw.id === 'number' ? raw.id : null;
  return {
    id,
    numericId,
    title: raw.title ?? id,
    url: raw.url ?? `${KAGGLE_WEB_URL}/competitions/${id}`,
    description: raw.description ?? null,
    organizationName: raw.organizationName ?? null,
    category: raw.category ?? null,
    reward: raw.reward ?? null,
    deadline: raw.deadline ?? null,
    enabledDate: raw.enabledDate ?? null,
    mergerDeadline: raw.mergerDeadline ?? null,
    maxTeamSize: raw.maxTeamSize ?? null,
    maxDailySubmissions: raw.maxDailySubmissions ?? null,
    evaluationMetric: raw.evaluationMetric ?? null,
    teamCount: raw.teamCount ?? raw.totalTeams ?? null,
    userHasEntered: raw.userHasEntered ?? null,
    tags: tagNames(raw.tags),
  };
}

export function toDataFile(raw: RawDataFile): DataFile {
  return {
    name: raw.name ?? (raw.ref ? lastSegment(raw.ref) : ''),
    sizeBytes: toSizeBytes(raw.totalBytes ?? raw.size),
    creationDate: raw.creationDate ?? null,
  };
}

export function toDataset(raw: RawDataset): Dataset {
  const ref = raw.ref ?? '';
  return {
    ref,
    title: raw.title ?? ref,
    subtitle: raw.subtitle ?? null,
    description: raw.description ?? null,
    ownerName: raw.ownerName ?? null,
    sizeBytes: toSizeBytes(raw.totalBytes ?? raw.size),
    lastUpdated: raw.lastUpdated ?? null,
    downloadCount: raw.downloadCount ?? null,
    voteCount: raw.voteCount ?? null,
    usabilityRating: raw.usabilityRating ?? null,
    licenseName: raw.licenseName ?? null,
    tags: tagNames(raw.tags),
    url: `${KAGGLE_WEB_URL}/datasets/${ref}`,
  };
}

export function toModel(raw: RawModel): Model {
  const ref = raw.ref ?? [raw.author, raw.slug].filter(Boolean).join('/');
  return {
    ref,
    title: raw.title ?? ref,
    subtitle: raw.subtitle ?? null,
    author: raw.author ?? null,
    slug: raw.slug ?? null,
    isPrivate: raw.isPrivate ?? null,
    description: raw.description ?? null,
    publishTime: raw.publishTime ?? null,
    url: raw.url ?? `${KAGGLE_WEB_URL}/models/${ref}`,
  };
}
