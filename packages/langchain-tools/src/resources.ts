/**
 * Aggregate markdown resources
 *
 * Every resource is assembled from the cached list operations, so reading
 * several resources in a row costs at most one remote call per list.
 */

import type { ErrorEnvelope, OperationResult } from "@kaggle-tools/core";
import type { Competition } from "@kaggle-tools/kaggle-client";
import type { DatasetSummary, KaggleOperations } from "./operations.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const MB = 1024 * 1024;
const GB = 1024 * MB;

export interface KaggleResource {
    uri: string;
    name: string;
    description: string;
    read(): Promise<string>;
}

export interface KaggleResourcesOptions {
    /** Time source override used in tests */
    now?: () => Date;
}

class ResourceError extends Error {
    constructor(readonly envelope: ErrorEnvelope) {
        super(envelope.message);
    }
}

function unwrap<T>(result: OperationResult<T>): T {
    if (!result.ok) {
        throw new ResourceError(result.error);
    }
    return result.value;
}

function formatError(envelope: ErrorEnvelope): string {
    return `Error [${envelope.kind}]: ${envelope.message}`;
}

function display(value: string | number | null | undefined, fallback = "Not specified"): string {
    return value === null || value === undefined || value === "" ? fallback : String(value);
}

function parseTime(value: string | null): number | null {
    if (!value) return null;
    const time = Date.parse(value);
    return Number.isNaN(time) ? null : time;
}

/**
 * Cash prizes look like "$25,000" or "25,000 Usd"; "Knowledge", "Kudos" and swag are not cash
 */
export function parsePrize(reward: string | null): number | null {
    if (!reward || !/\$|usd/i.test(reward)) return null;
    const digits = reward.replace(/[^0-9]/g, "");
    return digits ? Number(digits) : null;
}

function countBy<T>(items: T[], key: (item: T) => string): [string, number][] {
    const counts = new Map<string, number>();
    for (const item of items) {
        const k = key(item);
        counts.set(k, (counts.get(k) ?? 0) + 1);
    }
    return [...counts.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}

function categoryOf(competition: Competition): string {
    return competition.category ?? "Unknown";
}

/** Usability arrives as a 0..1 score; shown out of 10 */
function usabilityOutOfTen(dataset: DatasetSummary): string {
    return dataset.usabilityRating === null ? "Unknown" : `${(dataset.usabilityRating * 10).toFixed(1)}/10`;
}

function daysUntil(deadline: string | null, now: number): number | null {
    const time = parseTime(deadline);
    return time === null ? null : Math.floor((time - now) / DAY_MS);
}

export function createKaggleResources(
    operations: KaggleOperations,
    options: KaggleResourcesOptions = {}
): KaggleResource[] {
    const now = options.now ?? (() => new Date());

    const competitions = async () => unwrap(await operations.listCompetitions({})).competitions;
    const datasets = async () => unwrap(await operations.searchDatasets({})).datasets;
    const models = async () => unwrap(await operations.listModels({})).models;

    // ============ Renderers ============

    async function activeCompetitions(): Promise<string> {
        const current = now().getTime();
        const active = (await competitions()).filter((c) => {
            const deadline = parseTime(c.deadline);
            return deadline === null || deadline > current;
        });

        let result = "# Active Kaggle Competitions\n\n";
        for (const c of active.slice(0, 20)) {
            result += `## ${c.title}\n`;
            result += `- **ID**: ${c.id}\n`;
            result += `- **Category**: ${display(c.category)}\n`;
            result += `- **Reward**: ${display(c.reward)}\n`;
            result += `- **Deadline**: ${display(c.deadline)}\n`;
            result += `- **Teams**: ${display(c.teamCount)}\n`;
            result += `- **URL**: ${c.url}\n\n`;
        }
        return result;
    }

    async function popularDatasets(): Promise<string> {
        let result = "# Popular Kaggle Datasets\n\n";
        for (const d of await datasets()) {
            result += `## ${d.title}\n`;
            result += `- **Reference**: ${d.ref}\n`;
            result += `- **Size**: ${d.size}\n`;
            result += `- **Downloads**: ${display(d.downloadCount, "Unknown")}\n`;
            result += `- **Votes**: ${display(d.voteCount, "Unknown")}\n`;
            result += `- **Usability**: ${usabilityOutOfTen(d)}\n`;
            result += `- **License**: ${display(d.licenseName, "Unknown")}\n`;
            result += `- **Last Updated**: ${display(d.lastUpdated, "Unknown")}\n`;
            result += `- **URL**: ${d.url}\n\n`;
        }
        return result;
    }

    async function hotTopics(): Promise<string> {
        const [comps, sets] = await Promise.all([competitions(), datasets()]);

        let result = "# Trending Topics on Kaggle\n\n";
        result += "## Hot Competition Categories\n\n";
        for (const [category, count] of countBy(comps.slice(0, 20), categoryOf)) {
            result += `- **${category}**: ${count} active competitions\n`;
        }

        result += "\n## High-Value Competitions\n\n";
        for (const c of comps.filter((c) => parsePrize(c.reward) !== null).slice(0, 5)) {
            result += `- **${c.title}**: ${c.reward}\n`;
        }

        result += "\n## Dataset Sizes\n\n";
        const buckets = { Small: 0, Medium: 0, Large: 0 };
        for (const d of sets.slice(0, 50)) {
            if (d.sizeBytes === null) continue;
            if (d.sizeBytes < 10 * MB) buckets.Small++;
            else if (d.sizeBytes < GB) buckets.Medium++;
            else buckets.Large++;
        }
        for (const [bucket, count] of Object.entries(buckets)) {
            result += `- **${bucket} Datasets**: ${count} popular entries\n`;
        }
        return result;
    }

    async function upcomingDeadlines(): Promise<string> {
        const current = now().getTime();
        const upcoming: { competition: Competition; days: number }[] = [];
        for (const competition of await competitions()) {
            const days = daysUntil(competition.deadline, current);
            if (days !== null && days >= 0 && days <= 60) {
                upcoming.push({ competition, days });
            }
        }
        upcoming.sort((a, b) => a.days - b.days);

        let result = "# Upcoming Competition Deadlines\n\n";
        result += "## Next 30 Days\n\n";
        for (const { competition, days } of upcoming.filter((u) => u.days <= 30).slice(0, 10)) {
            result += `- **${competition.title}** (${days <= 7 ? "URGENT" : "Soon"})\n`;
            result += `  - Days left: ${days}\n`;
            result += `  - Reward: ${display(competition.reward)}\n`;
            result += `  - Deadline: ${display(competition.deadline)}\n\n`;
        }

        result += "## In 31 to 60 Days\n\n";
        for (const { competition, days } of upcoming.filter((u) => u.days > 30)) {
            result += `- **${competition.title}**\n`;
            result += `  - Days left: ${days}\n`;
            result += `  - Reward: ${display(competition.reward)}\n\n`;
        }
        return result;
    }

    async function gettingStarted(): Promise<string> {
        const [comps, sets] = await Promise.all([competitions(), datasets()]);

        let result = "# Kaggle Getting Started Guide\n\n";
        result += "## Step 1: Start with These Competitions\n\n";
        const beginner = comps.filter((c) => /getting\s*started/i.test(c.category ?? ""));
        for (const c of beginner.slice(0, 5)) {
            result += `- **${c.title}**\n`;
            result += `  - Reward: ${display(c.reward)}\n`;
            result += `  - URL: ${c.url}\n\n`;
        }

        result += "## Step 2: Practice Datasets\n\n";
        const practice = sets.slice(0, 20).filter((d) => (d.usabilityRating ?? 0) >= 0.8);
        for (const d of practice.slice(0, 5)) {
            result += `- **${d.title}**\n`;
            result += `  - Reference: ${d.ref}\n`;
            result += `  - Size: ${d.size}\n`;
            result += `  - Usability: ${usabilityOutOfTen(d)}\n\n`;
        }

        result += "## Tips\n\n";
        result += "- Start with 'Getting Started' competitions; they never expire\n";
        result += "- Read public notebooks and past winning write-ups\n";
        result += "- Explore the data before reaching for complex models\n";
        return result;
    }

    async function platformStats(): Promise<string> {
        const [comps, sets, mods] = await Promise.all([competitions(), datasets(), models()]);
        const categories = countBy(comps, categoryOf);
        const prizePool = comps.reduce((sum, c) => sum + (parsePrize(c.reward) ?? 0), 0);
        const downloads = sets.reduce((sum, d) => sum + (d.downloadCount ?? 0), 0);
        const rated = sets.filter((d) => d.usabilityRating !== null);
        const averageUsability = rated.length
            ? rated.reduce((sum, d) => sum + (d.usabilityRating ?? 0), 0) / rated.length
            : null;

        let result = "# Kaggle Platform Statistics\n\n";
        result += "## Competitions\n\n";
        result += `- **Listed Competitions**: ${comps.length}\n`;
        result += `- **Total Prize Pool**: $${prizePool.toLocaleString("en-US")}\n`;
        result += `- **Categories**: ${categories.length}\n`;
        for (const [category, count] of categories) {
            result += `  - ${category}: ${count} competitions\n`;
        }

        result += "\n## Datasets\n\n";
        result += `- **Listed Datasets**: ${sets.length}\n`;
        result += `- **Total Downloads**: ${downloads.toLocaleString("en-US")}\n`;
        result += `- **Average Usability Rating**: ${
            averageUsability === null ? "Unknown" : `${(averageUsability * 10).toFixed(1)}/10`
        }\n`;

        result += "\n## Models\n\n";
        result += `- **Listed Models**: ${mods.length}\n`;

        result += "\n## License Distribution\n\n";
        for (const [license, count] of countBy(sets, (d) => d.licenseName ?? "Unknown").slice(0, 5)) {
            result += `- **${license}**: ${count} datasets\n`;
        }

        const [top] = categories;
        result += "\n## Insights\n\n";
        result += `- **Most Popular Category**: ${top ? top[0] : "Unknown"}\n`;
        result += `- **Cash-Prize Competitions**: ${comps.filter((c) => parsePrize(c.reward) !== null).length}\n`;
        return result;
    }

    const define = (
        uri: string,
        name: string,
        description: string,
        render: () => Promise<string>
    ): KaggleResource => ({
        uri,
        name,
        description,
        read: async () => {
            try {
                return await render();
            } catch (err) {
                if (err instanceof ResourceError) {
                    return formatError(err.envelope);
                }
                throw err;
            }
        },
    });

    return [
        define("kaggle://competitions/active", "Active competitions", "Competitions that are still open", activeCompetitions),
        define("kaggle://datasets/popular", "Popular datasets", "Currently hottest public datasets", popularDatasets),
        define("kaggle://trends/hot-topics", "Hot topics", "Competition categories, prizes and dataset sizes in vogue", hotTopics),
        define("kaggle://calendar/deadlines", "Upcoming deadlines", "Competitions closing within 60 days", upcomingDeadlines),
        define("kaggle://beginner/getting-started", "Getting started", "Beginner competitions and practice datasets", gettingStarted),
        define("kaggle://meta/platform-stats", "Platform statistics", "Counts and distributions across listings", platformStats),
    ];
}

/**
 * Read a resource by URI
 * @returns undefined for unknown URIs
 */
export async function readResource(resources: KaggleResource[], uri: string): Promise<string | undefined> {
    const resource = resources.find((r) => r.uri === uri);
    return resource ? resource.read() : undefined;
}
