import { describe, expect, it, vi } from "vitest";
import { createWebSearchTool, formatSearchResults, type SearchFn } from "./web-search.js";

describe("formatSearchResults", () => {
    it("lists numbered hits with date, url and snippet", () => {
        const text = formatSearchResults("rate cuts", {
            results: [
                { title: "Central bank holds", url: "https://news.example/a", content: " Rates unchanged. ", publishedDate: "2026-10-01T08:00:00Z" },
                { title: "Markets rally", url: "https://news.example/b" },
            ],
        });

        expect(text).toBe(
            'Search results for "rate cuts":\n' +
            "\n\n" +
            "1. Central bank holds · 2026-10-01\n   https://news.example/a\n   Rates unchanged." +
            "\n\n" +
            "2. Markets rally\n   https://news.example/b\n   (no description)"
        );
    });

    it("puts the answer first", () => {
        const text = formatSearchResults("q", {
            answer: "Short answer.",
            results: [{ title: "T", url: "https://news.example/t", content: "c" }],
        });

        expect(text.startsWith("Summary: Short answer.\n\n\nSearch results for \"q\":")).toBe(true);
    });

    it("says so when nothing was found", () => {
        expect(formatSearchResults("nothing here", { results: [] })).toBe('No results found for: "nothing here"');
        expect(formatSearchResults("q", { answer: "A.", results: [] })).toBe("Summary: A.\n");
    });
});

describe("createWebSearchTool", () => {
    it("asks for news results with a clamped count", async () => {
        const search = vi.fn<SearchFn>(async () => ({ results: [] }));
        const tool = createWebSearchTool("test-key", search);

        await tool.execute({ query: " fintech ", count: 50 });
        await tool.execute({ query: "fintech", count: 0 });
        await tool.execute({ query: "fintech" });

        expect(search.mock.calls.map(([query, options]) => [query, options.maxResults])).toEqual([
            ["fintech", 10],
            ["fintech", 1],
            ["fintech", 5],
        ]);
        expect(search.mock.calls[0]?.[1]).toEqual({
            maxResults: 10,
            searchDepth: "basic",
            includeAnswer: true,
            topic: "news",
        });
    });

    it("rejects an empty query without searching", async () => {
        const search = vi.fn<SearchFn>(async () => ({ results: [] }));
        const tool = createWebSearchTool("test-key", search);

        await expect(tool.execute({ query: "   " })).rejects.toThrow("search query cannot be empty");
        expect(search).not.toHaveBeenCalled();
    });

    it("exposes a web_search function that requires a query", () => {
        const tool = createWebSearchTool("test-key", async () => ({ results: [] }));

        expect(tool.spec.function.name).toBe("web_search");
        expect(tool.spec.function.parameters?.["required"]).toEqual(["query"]);
    });
});
