// Conversation log
export { createConversationContext } from './conversation-context.js';
export type { ConversationContext, ConversationContextOptions } from './conversation-context.js';
