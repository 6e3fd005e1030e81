/**
 * Agent Prompts
 * Prompt builders for every model call made by the assistant
 */

/**
 * Board game name extraction from a chat message
 */
export function getGameNamePrompt(options: { userText: string; knownNames: string[] }): string {
  const library = options.knownNames.length > 0 ? options.knownNames.join(", ") : "(empty)";

  return `Extract the board game name from the user's message.

## Library
Games already in the library: ${library}

## Message
${options.userText}

## Rules
- If the user names or clearly refers to a board game, return its name as written
  (or the matching library name if it is obviously the same game).
- If no specific game is mentioned, return null.
- confidence is "high" only when the message names the game explicitly.

## Output Format
Return ONLY a JSON object:
\`\`\`json
{ "candidateName": "Catan", "confidence": "high" }
\`\`\``;
}

/**
 * Source discovery over live web search
 */
export function getWebResearchPrompt(options: { gameName: string; maxSources: number }): string {
  return `You are an expert research agent for board games.

## Your Task
Collect the best sources for the board game "${options.gameName}".

## Priorities
1. Official publisher rulebook page or PDF
2. BoardGameGeek game page
3. Official publisher site
4. Rules wikis and guides
5. YouTube tutorial videos with captions
6. Other high-quality guides

## Rules
- Use web search to find authoritative sources.
- Prefer direct PDFs of rulebooks when available.
- Include at least one YouTube tutorial ("how to play ${options.gameName}").
- Return de-duplicated results, at most ${options.maxSources}.

## Output Format
Return ONLY a JSON object, no commentary:
\`\`\`json
{
  "topic": "<canonical game name>",
  "sources": [
    { "title": "...", "url": "https://...", "type": "rulebook|publisher|bgg|wiki|guide|video|other", "notes": "short reason" }
  ]
}
\`\`\``;
}

/**
 * Difficulty and player count, read from the reference page only
 */
export function getMetadataPrompt(options: { gameName: string; pageContent: string }): string {
  return `You are reading the BoardGameGeek page for "${options.gameName}".

Extract data ONLY from the page content below. Do not use prior knowledge.

1. difficulty_score: the community weight / complexity, a number from 1.0 to 5.0
   (shown as "Weight: 2.45 / 5" or similar). null if absent.
2. player_count: the player range as a string such as "2-4" or "3". null if absent.

## Page Content
${options.pageContent}

## Output Format
Return ONLY a JSON object:
\`\`\`json
{ "difficulty_score": 2.45, "player_count": "3-4" }
\`\`\``;
}

/**
 * Short library-listing description
 */
export function getDescriptionPrompt(options: { gameName: string; sourcesSummary: string }): string {
  return `Write a description of the board game "${options.gameName}" for a game library listing.

## Requirements
- 2-3 short sentences, about 40 words at most
- Do not start with the game name
- Mention player count, theme, core mechanics and what makes the gameplay distinctive

## Sources
${options.sourcesSummary}

## Output Format
Return ONLY a JSON object:
\`\`\`json
{ "description": "..." }
\`\`\``;
}

/**
 * Generic web search returning result links
 */
export function getWebSearchPrompt(options: { query: string; limit: number }): string {
  return `Search the web for: ${options.query}

Return the top ${options.limit} results you found. Use the real URLs from the search results; do not invent links.

## Output Format
Return ONLY a JSON object:
\`\`\`json
{ "results": [ { "title": "...", "url": "https://...", "snippet": "..." } ] }
\`\`\``;
}

export const ANSWER_SYSTEM_PROMPT = `You are a helpful board game rules assistant.
- Answer questions about board games using the provided documents first, then web search.
- Be concise; enumerate rules and steps clearly.
- If the documents and search results do not contain the answer, say so.
- Never invent rules.`;

/**
 * Hybrid answer over retrieved context plus live web search
 */
export function getAnswerPrompt(options: {
  question: string;
  gameName: string | null;
  context: string;
  enableWebSearch: boolean;
}): string {
  const subject = options.gameName ? `Game: ${options.gameName}\n` : "";
  const contextSection = options.context
    ? `## Library Documents\n${options.context}`
    : "## Library Documents\n(none available)";
  const searchLine = options.enableWebSearch
    ? "Use web search to check and complete the answer."
    : "Answer from the documents and general knowledge only.";

  return `${subject}Question: ${options.question}

${contextSection}

${searchLine}

## Output Format
Return ONLY a JSON object. List every web page you relied on in "citations":
\`\`\`json
{ "answer": "...", "citations": [ { "title": "...", "url": "https://..." } ] }
\`\`\``;
}
