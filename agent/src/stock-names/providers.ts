/**
 * Stock list providers.
 */

import { parseNameMap } from "./cache-store.js";
import type { Market, NameMap, StockListProvider } from "./types.js";

/**
 * Fetches `{ code: name }` JSON for one market from a URL.
 */
export class JsonUrlListProvider implements StockListProvider {
  constructor(
    readonly market: Market,
    private readonly url: string,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  async fetchList(signal: AbortSignal): Promise<NameMap> {
    const response = await this.fetchImpl(this.url, {
      signal,
      headers: { accept: "application/json" },
    });
    if (!response.ok) {
      throw new Error(`Stock list request for ${this.market} failed: HTTP ${response.status}`);
    }
    const body: unknown = await response.json();
    if (body === null || typeof body !== "object" || Array.isArray(body)) {
      throw new Error(`Stock list for ${this.market} from ${this.url} is not a JSON object`);
    }
    return parseNameMap(body, this.url);
  }
}
