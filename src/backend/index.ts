/**
 * Backend modules export
 */

export { AnthropicBackend } from './anthropic';
export type { MessageCreator, MessageRequest, MessageReply } from './anthropic';
