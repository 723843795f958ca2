/**
 * Shared types and text helpers
 */

export type { CardRecord } from './cardRecord';
export * from './textUtils';
