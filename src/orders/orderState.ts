import { v4 as uuidv4 } from 'uuid';
import type { MutableOrderState, ValidatedIntent } from './types.js';

/**
 * New PENDING state for an intent
 */
export function createOrderState(intent: ValidatedIntent, parentId?: string): MutableOrderState {
  const now = Date.now();
  return {
    id: uuidv4(),
    intent,
    status: 'PENDING',
    filledQuantity: '0',
    attempts: [],
    ...(parentId !== undefined && { parentId }),
    children: [],
    createdAt: now,
    updatedAt: now,
  };
}
