/**
 * conversation.ts — Channel-independent conversation host
 *
 * Decides what to say back to one incoming message:
 *   - first contact: ask the user for their name, remember it on the next
 *     message and greet them
 *   - afterwards: run the message through the agent on the chat's thread
 *
 * bot.ts adapts Telegram updates onto handleMessage(); the state lives in
 * state.ts so it survives restarts.
 */

import { logger } from "./logger.js";
import type { StateStore } from "./state.js";
import type { AgentTurnResult } from "./agent.js";

export interface IncomingMessage {
    chatId: string;
    userId: string;
    /** Messaging channel the message arrived on, e.g. "telegram" */
    channelId: string;
    text: string;
}

export type TurnRunner = (threadId: string | null, text: string) => Promise<AgentTurnResult>;

export const NAME_PROMPT =
    "I am your AI assistant, here to help you research the latest news on any topic and file it in storage. " +
    "Can you tell me your name?";

export class ConversationHost {
    constructor(
        private readonly state: StateStore,
        private readonly runTurn: TurnRunner,
        private readonly now: () => Date = () => new Date()
    ) { }

    /** Returns the replies to send, in order */
    async handleMessage(msg: IncomingMessage): Promise<string[]> {
        const conversation = this.state.getConversation(msg.chatId);
        const userName = this.state.getUserName(msg.userId);

        if (userName === null) {
            if (conversation.promptedForName) {
                const name = msg.text.trim();
                if (!name) return [NAME_PROMPT];

                this.state.setUserName(msg.userId, name);
                this.state.saveConversation(msg.chatId, { ...conversation, promptedForName: false });
                logger.info("User profile saved", { userId: msg.userId });
                return [`Thanks ${name}. Let me know how I can help you today.`];
            }

            this.state.saveConversation(msg.chatId, { ...conversation, promptedForName: true });
            return [NAME_PROMPT];
        }

        logger.info("Incoming message", { chatId: msg.chatId, length: msg.text.length });

        const result = await this.runTurn(conversation.threadId, msg.text);
        if (conversation.threadId === null) {
            logger.info("Started a new thread for this conversation", {
                chatId: msg.chatId,
                threadId: result.threadId,
            });
        }

        this.state.saveConversation(msg.chatId, {
            threadId: result.threadId,
            promptedForName: false,
            channelId: msg.channelId,
            lastSeen: this.now().toISOString(),
        });

        return [result.reply];
    }

    /** Start over with a fresh thread on the next message */
    resetConversation(chatId: string): void {
        this.state.resetConversation(chatId);
        logger.info("Conversation cleared", { chatId });
    }
}
