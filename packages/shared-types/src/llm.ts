export type FinishReason = 'stop' | 'length' | 'other';

export type StreamEvent =
  | { type: 'content'; text: string }
  | { type: 'finish'; reason: FinishReason }
  | { type: 'error'; message: string; status?: number }
  | { type: 'done' }
  | { type: 'ignored' };

export interface ModelInfo {
  id: string;
  contextLength: number;
  free: boolean;
}
