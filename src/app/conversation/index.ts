/**
 * Conversation App Layer - Re-exports
 */

export * from './conversation-store.js';
