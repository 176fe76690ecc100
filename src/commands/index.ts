/**
 * Commands Module - user and admin commands over one registry
 */

export { createCommandRegistry, parseCommand, describeError } from './registry';
export { createConversationStore } from './conversation';
export { createUserCommands, renderSubscription } from './user';
export { createAdminCommands } from './admin';

export type {
  CommandRegistry,
  CommandContext,
  CommandDefinition,
  CommandInfo,
  CommandServices,
} from './registry';
export type { ConversationStore } from './conversation';
