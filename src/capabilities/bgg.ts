/**
 * BoardGameGeek Lookup
 * Exact-name search against XML API 2
 */

import type { HttpClient } from "../core/http.js";
import { parseXml } from "../sources/html.js";
import type { ReferenceLookup } from "./types.js";

const SEARCH_URL = "https://boardgamegeek.com/xmlapi2/search";

export function bggGameUrl(id: string): string {
  return `https://boardgamegeek.com/boardgame/${id}`;
}

/**
 * The id of the first item in a search response, or null
 */
export function parseSearchResponse(xml: string): string | null {
  const id = parseXml(xml, "bgg-xml-api").querySelector("items > item")?.getAttribute("id");
  return id && /^\d+$/.test(id) ? id : null;
}

export class BggXmlLookup implements ReferenceLookup {
  constructor(
    private readonly http: HttpClient,
    private readonly apiToken?: string
  ) {}

  async lookupExact(name: string): Promise<string | null> {
    const headers: Record<string, string> = {};
    if (this.apiToken) {
      headers.Authorization = `Bearer ${this.apiToken}`;
    }

    // 401 surfaces as AuthRequiredError from the HTTP client
    const response = await this.http.get(SEARCH_URL, {
      source: "bgg-xml-api",
      headers,
      query: { query: name, type: "boardgame", exact: 1 },
    });

    const id = parseSearchResponse(response.text());
    return id ? bggGameUrl(id) : null;
  }
}
