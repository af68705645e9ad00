import type { EmbeddedSlot, EmbeddingSlot, EmbeddingVector, FailedSlot } from './types';

export function embeddedSlot(values: EmbeddingVector): EmbeddedSlot {
  return { kind: 'vector', values };
}

export function failedSlot(error: string): FailedSlot {
  return { kind: 'failed', error };
}

export function isEmbedded(slot: EmbeddingSlot): slot is EmbeddedSlot {
  return slot.kind === 'vector';
}

export function countFailed(slots: readonly EmbeddingSlot[]): number {
  return slots.reduce((count, slot) => (slot.kind === 'failed' ? count + 1 : count), 0);
}
