/**
 * tools/web-search.ts — Web search via Tavily
 *
 * The agent's news source: it looks topics up here, summarises them, and
 * files the summary through the MCP storage tools.
 *
 * Tool schema exposed to the agent:
 *   web_search(query, count?)
 *     - query: the search string
 *     - count: number of results to return (1-10, default 5)
 */

import { tavily } from "@tavily/core";
import type { ToolDefinition } from "./index.js";
import { logger } from "../logger.js";

export interface SearchHit {
    title: string;
    url: string;
    content?: string;
    publishedDate?: string;
}

export interface SearchResponse {
    answer?: string;
    results: SearchHit[];
}

export type SearchFn = (
    query: string,
    options: { maxResults: number; searchDepth: "basic"; includeAnswer: boolean; topic: "news" }
) => Promise<SearchResponse>;

export function formatSearchResults(query: string, response: SearchResponse): string {
    const lines: string[] = [];

    if (response.answer) {
        lines.push(`Summary: ${response.answer}\n`);
    }

    if (response.results.length === 0) {
        return lines.length > 0 ? lines.join("\n") : `No results found for: "${query}"`;
    }

    lines.push(`Search results for "${query}":\n`);

    response.results.forEach((r, i) => {
        const snippet = r.content?.trim() || "(no description)";
        const date = r.publishedDate ? ` · ${r.publishedDate.slice(0, 10)}` : "";
        lines.push(`${i + 1}. ${r.title}${date}\n   ${r.url}\n   ${snippet}`);
    });

    return lines.join("\n\n");
}

export function createWebSearchTool(apiKey: string, search?: SearchFn): ToolDefinition {
    const run: SearchFn = search ?? ((query, options) => tavily({ apiKey }).search(query, options));

    return {
        spec: {
            type: "function",
            function: {
                name: "web_search",
                description:
                    "Search the web for the latest news on a topic and return the top results with titles, " +
                    "snippets, dates and URLs. Use this whenever the user asks for current news or facts.",
                parameters: {
                    type: "object",
                    properties: {
                        query: {
                            type: "string",
                            description: "The search query to look up",
                        },
                        count: {
                            type: "number",
                            description: "Number of results to return (1-10). Default 5.",
                        },
                    },
                    required: ["query"],
                },
            },
        },

        async execute(args) {
            const query = String(args["query"] ?? "").trim();
            const requested = Number(args["count"] ?? 5);
            const count = Math.min(10, Math.max(1, Number.isFinite(requested) ? Math.round(requested) : 5));

            if (!query) throw new Error("search query cannot be empty");

            logger.info("web_search called (Tavily)", { query, count });

            const response = await run(query, {
                maxResults: count,
                searchDepth: "basic",
                includeAnswer: true,
                topic: "news",
            });

            logger.debug("Tavily search complete", { results: response.results.length });
            return formatSearchResults(query, response);
        },
    };
}
