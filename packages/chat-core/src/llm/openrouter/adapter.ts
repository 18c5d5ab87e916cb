import type { ChatTransport } from '../contracts';
import { openRouterStream, type OpenRouterClientConfig } from './client';

export function createOpenRouterTransport(config: OpenRouterClientConfig = {}): ChatTransport {
  return {
    open(request, signal) {
      return openRouterStream(config, request, signal);
    },
  };
}
