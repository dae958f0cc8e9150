import type { VendorAdapter } from './conversation.js';
import type { Message } from './types.js';
import { formatModelId, VENDORS, type ModelId } from './vendors.js';

/**
 * Wraps an adapter so every vendor round trip is logged. Errors are logged and
 * rethrown unchanged; conversions and caching pass straight through.
 */
export function withApiLogging<V, R>(adapter: VendorAdapter<V, R>): VendorAdapter<V, R> {
  const prefix = `[${VENDORS[adapter.vendor].displayName}]`;

  return {
    vendor: adapter.vendor,
    toVendorMessage: (message: Message) => adapter.toVendorMessage(message),
    async sendConversationToVendor(history: readonly V[], modelId: ModelId): Promise<R> {
      console.log(`${prefix} Request`, {
        model: formatModelId(modelId),
        messages: history.length,
      });
      try {
        const response = await adapter.sendConversationToVendor(history, modelId);
        console.log(`${prefix} Response`, JSON.stringify(response));
        return response;
      } catch (err) {
        console.error(`${prefix} Request failed:`, err);
        throw err;
      }
    },
    vendorResponseToVendorMessage: (response: R) => adapter.vendorResponseToVendorMessage(response),
    fromVendorResponse: (response: R) => adapter.fromVendorResponse(response),
    isCacheable: () => adapter.isCacheable(),
    configureCaching: (history: V[]) => adapter.configureCaching(history),
  };
}
