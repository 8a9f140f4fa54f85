export type MessageRole = "system" | "user" | "assistant";

/**
 * A message as handed to a backend adapter.
 */
export interface ChatMessage {
  role: MessageRole;
  text: string;
}

/**
 * One recorded message in a conversation. Never mutated after creation.
 */
export interface Turn extends ChatMessage {
  sequenceNumber: number;
  createdAt: number;
}
