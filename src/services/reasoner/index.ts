/**
 * Reasoner service - Anthropic client and itinerary prompt.
 */

export { AnthropicReasoner, toReasonerError } from './client.js';
export type { AnthropicReasonerOptions } from './client.js';

export { buildItineraryPrompt } from './prompts/itinerary.js';
