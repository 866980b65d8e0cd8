export enum MessageRole {
    SYSTEM = "system",
    USER = "user",
    AGENT = "agent",
}

export interface MessageJSON {
    role: MessageRole;
    text: string;
}

/**
 * A conversational message kept in a state's message history.
 * Instances are immutable; nodes append new ones instead of editing old ones.
 */
export abstract class BaseMessage {
    constructor(
        public readonly role: MessageRole,
        public readonly text: string,
    ) { }

    toJSON(): MessageJSON {
        return { role: this.role, text: this.text };
    }
}

export class SystemMessage extends BaseMessage {
    constructor(text: string) {
        super(MessageRole.SYSTEM, text);
    }
}

export class UserMessage extends BaseMessage {
    constructor(text: string) {
        super(MessageRole.USER, text);
    }
}

/**
 * A reply produced by an agent node. Tool calls the agent wants made are
 * appended as separate {@link ToolRequest} messages after it.
 */
export class AgentMessage extends BaseMessage {
    constructor(text: string) {
        super(MessageRole.AGENT, text);
    }
}
