import type { StreamEvent } from '@codepane/shared-types';

/** Messages the network reader hands to the session's consumer loop. */
export type ReaderMessage =
  | { type: 'event'; payload: StreamEvent }
  | { type: 'error'; payload: { error: unknown } };
