import { describe, it, expect } from "vitest";
import { TimedTextTranscriptFetcher, parseTimedText, validateYouTubeVideo, watchUrl } from "./youtube.js";
import { NetworkError } from "../core/errors.js";
import { FakeHttpClient } from "../testing/fakes.js";

const VIDEO_URL = "https://www.youtube.com/watch?v=abcdefghijk";

describe("watchUrl", () => {
  it("builds the canonical watch URL", () => {
    expect(watchUrl("abcdefghijk")).toBe(VIDEO_URL);
  });
});

describe("parseTimedText", () => {
  it("joins caption cues", () => {
    const xml = `<?xml version="1.0" encoding="utf-8" ?><transcript>
      <text start="0" dur="2">Welcome to</text>
      <text start="2" dur="3">how to   play &amp; win</text>
      <text start="5" dur="1"> </text>
    </transcript>`;

    expect(parseTimedText(xml)).toBe("Welcome to how to play & win");
  });

  it("is null without cues", () => {
    expect(parseTimedText("")).toBeNull();
    expect(parseTimedText("<transcript></transcript>")).toBeNull();
  });
});

describe("validateYouTubeVideo", () => {
  it("accepts a video the oEmbed endpoint knows", async () => {
    const http = new FakeHttpClient().route("https://www.youtube.com/oembed", {
      contentType: "application/json",
      body: '{"title": "How to play"}',
    });

    expect(await validateYouTubeVideo(http, VIDEO_URL, 1000)).toBe(true);
    expect(http.requests[0].url).toBe(
      "https://www.youtube.com/oembed?url=https%3A%2F%2Fwww.youtube.com%2Fwatch%3Fv%3Dabcdefghijk&format=json"
    );
    expect(http.requests[0].options.timeoutMs).toBe(1000);
  });

  it("rejects removed and unreachable videos", async () => {
    expect(await validateYouTubeVideo(new FakeHttpClient(), VIDEO_URL, 1000)).toBe(false);

    const offline = new FakeHttpClient().route("https://www.youtube.com/oembed", new NetworkError("timeout"));
    expect(await validateYouTubeVideo(offline, VIDEO_URL, 1000)).toBe(false);
  });
});

describe("TimedTextTranscriptFetcher", () => {
  it("requests the English track", async () => {
    const http = new FakeHttpClient().route("https://video.google.com/timedtext", {
      contentType: "text/xml",
      body: "<transcript><text>Roll the dice</text></transcript>",
    });

    const transcript = await new TimedTextTranscriptFetcher(http).fetchTranscript("abcdefghijk");

    expect(transcript).toBe("Roll the dice");
    expect(http.requests[0].url).toBe("https://video.google.com/timedtext?lang=en&v=abcdefghijk");
  });
});
