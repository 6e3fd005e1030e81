/**
 * Tutorial video discovery
 *
 * youtube-api: three phrasings, ten results each, scored; stops once a
 * candidate scores above EARLY_STOP_SCORE.
 * web-search: first YouTube link in generic search results.
 */

import type { ChildLogger } from "../core/logger.js";
import { runStrategies, type Strategy, type StrategyOutcome } from "../core/strategies.js";
import type { VideoCandidate, VideoSearcher, WebSearcher } from "../capabilities/types.js";
import type { TutorialVideo } from "../schemas/entity.js";
import { watchUrl } from "../capabilities/youtube.js";
import { youTubeVideoId } from "./urls.js";

export const TUTORIAL_CHANNELS = [
  "watch it played",
  "jongetsgames",
  "shut up & sit down",
  "the rules girl",
  "rodney smith",
  "man vs meeple",
  "rahdo",
  "dice tower",
  "actualol",
];

export const RESULTS_PER_QUERY = 10;
export const EARLY_STOP_SCORE = 50;

export function videoQueries(gameName: string): string[] {
  return [`how to play ${gameName} tutorial`, `${gameName} board game rules`, `learn to play ${gameName}`];
}

/**
 * Weighted score of a candidate for a game:
 * views (log scale, max 50), known tutorial channel (+30), tutorial wording (+20),
 * game name in title (+15), like ratio (max 10)
 */
export function scoreVideo(video: VideoCandidate, gameName: string): number {
  let score = 0;

  if (video.viewCount > 0) {
    score += Math.min(50, Math.log10(video.viewCount) * 10);
  }

  const channel = video.channel.toLowerCase();
  if (TUTORIAL_CHANNELS.some((c) => channel.includes(c))) {
    score += 30;
  }

  const title = video.title.toLowerCase();
  if (title.includes("how to play") || title.includes("tutorial")) {
    score += 20;
  }
  if (title.includes(gameName.toLowerCase())) {
    score += 15;
  }

  if (video.viewCount > 0 && video.likeCount > 0) {
    score += Math.min(10, (video.likeCount / video.viewCount) * 1000);
  }

  return score;
}

/**
 * Highest-scoring candidate; the earlier one wins a tie. Zero scores never win.
 */
export function pickBestVideo(
  candidates: VideoCandidate[],
  gameName: string
): { video: VideoCandidate; score: number } | null {
  let best: { video: VideoCandidate; score: number } | null = null;
  for (const video of candidates) {
    const score = scoreVideo(video, gameName);
    if (score > (best?.score ?? 0)) {
      best = { video, score };
    }
  }
  return best;
}

export interface VideoDeps {
  /** Absent when no YouTube API key is configured */
  videos?: VideoSearcher;
  searcher: WebSearcher;
}

export function videoStrategies(gameName: string, deps: VideoDeps, log: ChildLogger): Strategy<TutorialVideo>[] {
  const strategies: Strategy<TutorialVideo>[] = [];
  const videos = deps.videos;

  if (videos) {
    strategies.push({
      name: "youtube-api",
      run: async () => {
        const seen: VideoCandidate[] = [];
        let best: { video: VideoCandidate; score: number } | null = null;

        for (const query of videoQueries(gameName)) {
          const found = await videos.searchVideos([query], RESULTS_PER_QUERY);
          seen.push(...found.filter((v) => !seen.some((s) => s.videoId === v.videoId)));
          best = pickBestVideo(seen, gameName);
          log.debug("Video query scored", { query, candidates: found.length, bestScore: best?.score ?? 0 });
          if (best && best.score > EARLY_STOP_SCORE) {
            break;
          }
        }

        if (!best) return null;
        return { url: best.video.url, title: best.video.title, channel: best.video.channel || null };
      },
    });
  }

  strategies.push({
    name: "web-search",
    run: async () => {
      const results = await deps.searcher.search(`how to play ${gameName} tutorial site:youtube.com`, 10);
      for (const result of results) {
        const id = youTubeVideoId(result.url);
        if (id) {
          return { url: watchUrl(id), title: result.title || `${gameName} tutorial`, channel: null };
        }
      }
      return null;
    },
  });

  return strategies;
}

export function findTutorialVideo(
  gameName: string,
  deps: VideoDeps,
  log: ChildLogger
): Promise<StrategyOutcome<TutorialVideo>> {
  return runStrategies("tutorial-video", videoStrategies(gameName, deps, log), log);
}
