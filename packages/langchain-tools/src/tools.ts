import { tool } from "@langchain/core/tools";
import type { CatalogEntry } from "./catalog.js";
import { toResponse } from "./responses.js";

/**
 * Wrap every catalog entry as a LangChain tool.
 *
 * Tools never throw: failures come back as an error envelope, e.g.
 * `{"status":"error","error":{"kind":"NotFound",...},"timestamp":"..."}`
 */
export function createKaggleTools(catalog: CatalogEntry[]) {
    return catalog.map((entry) =>
        tool(
            async (input) => {
                const result = await entry.run(input);
                return JSON.stringify(toResponse(result), null, 2);
            },
            {
                name: entry.name,
                description: entry.description,
                schema: entry.schema,
            }
        )
    );
}
