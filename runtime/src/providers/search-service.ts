import { fetchText, type TextResponse } from "../../../agent/src/http.js";
import type { SearchProvider } from "../capabilities.js";
import type { SearchConfig } from "../config.js";

export interface WebSearchResult {
  title: string;
  url: string;
  snippet: string;
  engine: "brave_api" | "duckduckgo";
}

const USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0 Safari/537.36";

/**
 * Web search backed by the Brave Search API when a key is configured,
 * with DuckDuckGo's HTML endpoint as the fallback. `query` never rejects.
 */
export class SearchService implements SearchProvider {
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly config: SearchConfig,
    deps: { fetch?: typeof fetch } = {},
  ) {
    this.fetchImpl = deps.fetch ?? fetch;
  }

  async query(query: string): Promise<string> {
    try {
      const results = await this.search(query);
      if (results.length === 0) return "No results found.";
      return results
        .map((result) => `${result.title}: ${result.snippet}`)
        .join("\n");
    } catch (error) {
      return `Error during search: ${error instanceof Error ? error.message : String(error)}`;
    }
  }

  async search(query: string): Promise<WebSearchResult[]> {
    const q = String(query || "").trim();
    if (!q) throw new Error("search query is required");

    const limit = this.config.maxResults;
    const braveApiKey = this.config.braveApiKey;
    if (braveApiKey) {
      try {
        const brave = await this.searchBraveApi(q, braveApiKey);
        if (brave.length > 0) return brave.slice(0, limit);
      } catch (error) {
        console.warn(
          `⚠️ Brave search failed, falling back to DuckDuckGo: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    const results = await this.searchDuckDuckGoHtml(q);
    return results.slice(0, limit);
  }

  private async searchBraveApi(
    query: string,
    apiKey: string,
  ): Promise<WebSearchResult[]> {
    const url = `https://api.search.brave.com/res/v1/web/search?q=${encodeURIComponent(query)}&count=10`;
    const res = await this.fetchWithTimeout(url, {
      accept: "application/json",
      "x-subscription-token": apiKey,
    });
    if (!res.ok) {
      throw new Error(`Brave Search API responded with HTTP ${res.status}`);
    }

    const data = JSON.parse(res.body) as {
      web?: {
        results?: Array<{
          title?: string;
          url?: string;
          description?: string;
        }>;
      };
    };

    return (data.web?.results || [])
      .map((item) => ({
        title: stripHtml(String(item.title || "")),
        url: String(item.url || ""),
        snippet: stripHtml(String(item.description || "")),
        engine: "brave_api" as const,
      }))
      .filter((item) => item.title || item.snippet);
  }

  private async searchDuckDuckGoHtml(
    query: string,
  ): Promise<WebSearchResult[]> {
    const url = `https://html.duckduckgo.com/html/?q=${encodeURIComponent(query)}`;
    const res = await this.fetchWithTimeout(url, { "user-agent": USER_AGENT });
    if (!res.ok) {
      throw new Error(`DuckDuckGo responded with HTTP ${res.status}`);
    }
    return parseDuckDuckGoHtml(res.body);
  }

  private fetchWithTimeout(
    url: string,
    headers: Record<string, string>,
  ): Promise<TextResponse> {
    return fetchText(this.fetchImpl, url, { headers }, this.config.timeoutMs);
  }
}

export function parseDuckDuckGoHtml(html: string): WebSearchResult[] {
  const blocks = html.split(/<div class="result[ "]/i).slice(1);
  const out: WebSearchResult[] = [];

  for (const block of blocks) {
    const href = capture(block, /class="result__a"[^>]*href="([^"]+)"/i) ||
      capture(block, /href="([^"]+)"[^>]*class="result__a"/i);
    const title = stripHtml(capture(block, /result__a[^>]*>([\s\S]*?)<\/a>/i));
    const snippet = stripHtml(
      capture(block, /result__snippet[^>]*>([\s\S]*?)<\/a>/i) ||
        capture(block, /result__snippet[^>]*>([\s\S]*?)<\/div>/i),
    );
    if (!title) continue;
    out.push({
      title,
      url: normalizeSearchUrl(href),
      snippet,
      engine: "duckduckgo",
    });
  }

  return out;
}

function capture(text: string, pattern: RegExp): string {
  const match = text.match(pattern);
  return match?.[1] ? decode(match[1]) : "";
}

function stripHtml(input: string): string {
  return decode(String(input || "").replace(/<[^>]+>/g, " "))
    .replace(/\s+/g, " ")
    .trim();
}

function decode(input: string): string {
  return String(input || "")
    .replace(/&amp;/g, "&")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&#x27;/g, "'")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .trim();
}

function normalizeSearchUrl(input: string): string {
  const raw = String(input || "").trim();
  if (!raw) return "";

  const absolute = raw.startsWith("//") ? `https:${raw}` : raw;
  try {
    const url = new URL(absolute);
    const uddg = url.searchParams.get("uddg");
    return uddg || absolute;
  } catch {
    return absolute;
  }
}
