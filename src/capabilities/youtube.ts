/**
 * YouTube Capabilities
 * Video search (Data API v3), existence check (oEmbed) and captions (timedtext)
 */

import { google, type youtube_v3 } from "googleapis";
import type { HttpClient } from "../core/http.js";
import { NetworkError, SourceError } from "../core/errors.js";
import { logger } from "../core/logger.js";
import { parseXml } from "../sources/html.js";
import type { TranscriptFetcher, VideoCandidate, VideoSearcher } from "./types.js";

const OEMBED_URL = "https://www.youtube.com/oembed";
const TIMEDTEXT_URL = "https://video.google.com/timedtext";

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

function toCount(value: string | null | undefined): number {
  const n = Number(value ?? 0);
  return Number.isFinite(n) ? n : 0;
}

function describeApiError(error: unknown): { message: string; status?: number } {
  if (error instanceof Error) {
    const status = "code" in error && typeof error.code === "number" ? error.code : undefined;
    return { message: error.message, status };
  }
  return { message: String(error) };
}

/**
 * Existence check shared by every video source
 */
export async function validateYouTubeVideo(
  http: HttpClient,
  url: string,
  timeoutMs: number
): Promise<boolean> {
  try {
    await http.get(OEMBED_URL, {
      source: "youtube-oembed",
      timeoutMs,
      query: { url, format: "json" },
    });
    return true;
  } catch (error) {
    if (error instanceof SourceError || error instanceof NetworkError) {
      logger.debug("Video failed validation", { url, error: error.message });
      return false;
    }
    throw error;
  }
}

/**
 * Data API v3 search; requires YOUTUBE_API_KEY
 */
export class YouTubeApiSearcher implements VideoSearcher {
  private readonly youtube: youtube_v3.Youtube;

  constructor(
    apiKey: string,
    private readonly http: HttpClient
  ) {
    this.youtube = google.youtube({ version: "v3", auth: apiKey });
  }

  async searchVideos(queries: string[], perQuery: number): Promise<VideoCandidate[]> {
    const ids: string[] = [];

    for (const q of queries) {
      try {
        const res = await this.youtube.search.list({
          part: ["snippet"],
          q,
          type: ["video"],
          maxResults: perQuery,
        });
        for (const item of res.data.items ?? []) {
          const id = item.id?.videoId;
          if (id && !ids.includes(id)) ids.push(id);
        }
      } catch (error) {
        const { message, status } = describeApiError(error);
        throw new SourceError(`YouTube search failed: ${message}`, "youtube-api", {
          statusCode: status,
          context: { query: q },
        });
      }
    }

    if (ids.length === 0) return [];

    try {
      const res = await this.youtube.videos.list({
        part: ["snippet", "statistics"],
        id: ids,
        maxResults: ids.length,
      });

      return (res.data.items ?? []).flatMap((video): VideoCandidate[] => {
        if (!video.id) return [];
        return [
          {
            videoId: video.id,
            url: watchUrl(video.id),
            title: video.snippet?.title ?? "",
            channel: video.snippet?.channelTitle ?? "",
            viewCount: toCount(video.statistics?.viewCount),
            likeCount: toCount(video.statistics?.likeCount),
          },
        ];
      });
    } catch (error) {
      const { message, status } = describeApiError(error);
      throw new SourceError(`YouTube video details failed: ${message}`, "youtube-api", {
        statusCode: status,
      });
    }
  }

  validateVideo(url: string, timeoutMs: number): Promise<boolean> {
    return validateYouTubeVideo(this.http, url, timeoutMs);
  }
}

/**
 * Caption text from the public timedtext endpoint (English track)
 */
export class TimedTextTranscriptFetcher implements TranscriptFetcher {
  constructor(private readonly http: HttpClient) {}

  async fetchTranscript(videoId: string): Promise<string | null> {
    const response = await this.http.get(TIMEDTEXT_URL, {
      source: "youtube-timedtext",
      query: { lang: "en", v: videoId },
    });

    return parseTimedText(response.text());
  }
}

/**
 * Join the <text> cues of a timedtext document; null when there are none
 */
export function parseTimedText(xml: string): string | null {
  if (!xml.trim()) return null;

  const cues = Array.from(parseXml(xml, "youtube-timedtext").querySelectorAll("text"))
    .map((el) => (el.textContent ?? "").replace(/\s+/g, " ").trim())
    .filter((cue) => cue.length > 0);

  return cues.length > 0 ? cues.join(" ") : null;
}
