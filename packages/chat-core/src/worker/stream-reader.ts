import { parseStreamLine, splitLines } from '../llm/openrouter/stream';
import type { Channel } from '../session/channel';
import type { ReaderMessage } from './protocol';

/**
 * Drains the response body on its own task. It owns the byte stream and only
 * talks to the consumer through `channel`; `isRunning` is polled between lines.
 */
export async function runStreamReader(
  body: ReadableStream<Uint8Array>,
  channel: Channel<ReaderMessage>,
  isRunning: () => boolean,
): Promise<void> {
  try {
    for await (const line of splitLines(body)) {
      if (!isRunning()) {
        break;
      }
      let done = false;
      for (const event of parseStreamLine(line)) {
        channel.push({ type: 'event', payload: event });
        done ||= event.type === 'done';
      }
      if (done) {
        break;
      }
    }
  } catch (error) {
    if (isRunning()) {
      channel.push({ type: 'error', payload: { error } });
    }
  } finally {
    channel.close();
  }
}
