export type { Chat, ChatMessage, CreateChatInput } from './types';
export type { ChatRepository } from './ChatRepository';
export { InMemoryChatRepository } from './InMemoryChatRepository';
export { MSSQLChatRepository } from './MSSQLChatRepository';
export { ChatService, chatTitleFromPrompt } from './ChatService';
