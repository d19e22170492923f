import { describe, it, expect, afterEach } from "vitest";
import { createKaggleResources, parsePrize, readResource } from "../resources.js";
import { competitionsFixture, createTestSetup, datasetsFixture, json, modelsFixture } from "./helpers.js";

type Setup = Awaited<ReturnType<typeof createTestSetup>>;

const NOW = new Date("2026-10-18T12:00:00Z");

const listingRoutes = {
    "/competitions/list": () => json(competitionsFixture),
    "/datasets/list": () => json(datasetsFixture),
    "/models/list": () => json(modelsFixture),
};

describe("parsePrize", () => {
    it("should read dollar and usd amounts", () => {
        expect(parsePrize("$50,000")).toBe(50000);
        expect(parsePrize("25,000 Usd")).toBe(25000);
    });

    it("should ignore non-cash rewards", () => {
        expect(parsePrize("Knowledge")).toBeNull();
        expect(parsePrize("Kudos")).toBeNull();
        expect(parsePrize(null)).toBeNull();
    });
});

describe("Kaggle resources", () => {
    let setup: Setup | undefined;

    async function resourcesFor(routes: Parameters<typeof createTestSetup>[0]) {
        setup = await createTestSetup(routes);
        return createKaggleResources(setup.operations, { now: () => NOW });
    }

    afterEach(async () => {
        await setup?.cleanup();
        setup = undefined;
    });

    it("should expose six resources", async () => {
        const resources = await resourcesFor({});

        expect(resources.map((r) => r.uri)).toEqual([
            "kaggle://competitions/active",
            "kaggle://datasets/popular",
            "kaggle://trends/hot-topics",
            "kaggle://calendar/deadlines",
            "kaggle://beginner/getting-started",
            "kaggle://meta/platform-stats",
        ]);
    });

    it("should leave closed competitions out of the active list", async () => {
        const resources = await resourcesFor(listingRoutes);

        const text = await readResource(resources, "kaggle://competitions/active");

        expect(text).toContain("## Spaceship Titanic\n- **ID**: spaceship-titanic\n");
        expect(text).toContain("## Ocean Forecasting\n");
        expect(text).not.toContain("Closed Challenge");
    });

    it("should bucket deadlines by days left", async () => {
        const resources = await resourcesFor(listingRoutes);

        const text = await readResource(resources, "kaggle://calendar/deadlines");

        expect(text).toBe(
            "# Upcoming Competition Deadlines\n\n" +
                "## Next 30 Days\n\n" +
                "- **Ocean Forecasting** (URGENT)\n" +
                "  - Days left: 4\n" +
                "  - Reward: $50,000\n" +
                "  - Deadline: 2026-10-23T00:00:00Z\n\n" +
                "## In 31 to 60 Days\n\n" +
                "- **Protein Folding Lite**\n" +
                "  - Days left: 43\n" +
                "  - Reward: 25,000 Usd\n\n"
        );
    });

    it("should total cash prizes in the platform statistics", async () => {
        const resources = await resourcesFor(listingRoutes);

        const text = await readResource(resources, "kaggle://meta/platform-stats");

        expect(text).toContain("- **Listed Competitions**: 4\n");
        expect(text).toContain("- **Total Prize Pool**: $85,000\n");
        expect(text).toContain("- **Total Downloads**: 150\n");
        expect(text).toContain("- **Average Usability Rating**: 7.0/10\n");
        expect(text).toContain("- **Listed Models**: 1\n");
        expect(text).toContain("- **Most Popular Category**: Featured\n");
        expect(text).toContain("- **Cash-Prize Competitions**: 3\n");
    });

    it("should suggest beginner competitions and well-rated datasets", async () => {
        const resources = await resourcesFor(listingRoutes);

        const text = await readResource(resources, "kaggle://beginner/getting-started");

        expect(text).toContain("- **Spaceship Titanic**\n  - Reward: Knowledge\n");
        expect(text).toContain("- **City Weather**\n  - Reference: alice/city-weather\n  - Size: 2.0 KB\n  - Usability: 9.0/10\n");
        expect(text).not.toContain("Street Images");
    });

    it("should count dataset size buckets in hot topics", async () => {
        const resources = await resourcesFor(listingRoutes);

        const text = await readResource(resources, "kaggle://trends/hot-topics");

        expect(text).toContain("- **Featured**: 2 active competitions\n");
        expect(text).toContain("- **Small Datasets**: 1 popular entries\n");
        expect(text).toContain("- **Medium Datasets**: 0 popular entries\n");
        expect(text).toContain("- **Large Datasets**: 1 popular entries\n");
    });

    it("should share cached listings across resources", async () => {
        const resources = await resourcesFor(listingRoutes);

        await readResource(resources, "kaggle://competitions/active");
        await readResource(resources, "kaggle://calendar/deadlines");
        await readResource(resources, "kaggle://meta/platform-stats");

        expect(setup?.kaggle.count("/competitions/list")).toBe(1);
    });

    it("should render a failed listing as an error line", async () => {
        const resources = await resourcesFor({
            "/competitions/list": () => json({ message: "Unauthorized" }, 401),
        });

        const text = await readResource(resources, "kaggle://competitions/active");

        expect(text).toMatch(/^Error \[Auth\]: /);
    });

    it("should return undefined for an unknown uri", async () => {
        const resources = await resourcesFor({});

        await expect(readResource(resources, "kaggle://nowhere")).resolves.toBeUndefined();
    });
});
