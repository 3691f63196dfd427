import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AGENT_ID_SETTING, createStateStore, type StateStore } from "./state.js";

describe("createStateStore", () => {
    let store: StateStore;

    beforeEach(() => {
        store = createStateStore(":memory:");
    });

    afterEach(() => {
        store.close();
    });

    it("returns an empty conversation for an unknown chat", () => {
        expect(store.getConversation("42")).toEqual({
            threadId: null,
            promptedForName: false,
            channelId: null,
            lastSeen: null,
        });
        expect(store.countConversations()).toBe(0);
    });

    it("saves and overwrites conversation data", () => {
        store.saveConversation("42", { threadId: null, promptedForName: true, channelId: null, lastSeen: null });
        store.saveConversation("42", {
            threadId: "thread_1",
            promptedForName: false,
            channelId: "telegram",
            lastSeen: "2026-10-19T09:00:00.000Z",
        });

        expect(store.getConversation("42")).toEqual({
            threadId: "thread_1",
            promptedForName: false,
            channelId: "telegram",
            lastSeen: "2026-10-19T09:00:00.000Z",
        });
        expect(store.countConversations()).toBe(1);
    });

    it("drops only the thread on reset", () => {
        store.saveConversation("42", {
            threadId: "thread_1",
            promptedForName: false,
            channelId: "telegram",
            lastSeen: "2026-10-19T09:00:00.000Z",
        });
        store.setUserName("7", "Ada");

        store.resetConversation("42");

        expect(store.getConversation("42").threadId).toBeNull();
        expect(store.getConversation("42").channelId).toBe("telegram");
        expect(store.getUserName("7")).toBe("Ada");
    });

    it("stores user names", () => {
        expect(store.getUserName("7")).toBeNull();

        store.setUserName("7", "Ada");
        store.setUserName("7", "Ada L.");

        expect(store.getUserName("7")).toBe("Ada L.");
    });

    it("stores settings", () => {
        expect(store.getSetting(AGENT_ID_SETTING)).toBeNull();

        store.setSetting(AGENT_ID_SETTING, "asst_1");
        store.setSetting(AGENT_ID_SETTING, "asst_2");
        expect(store.getSetting(AGENT_ID_SETTING)).toBe("asst_2");

        store.deleteSetting(AGENT_ID_SETTING);
        expect(store.getSetting(AGENT_ID_SETTING)).toBeNull();
    });
});
