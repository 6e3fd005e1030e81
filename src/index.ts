#!/usr/bin/env node
/**
 * Game Scout CLI - Entry Point
 * Board game research and rules Q&A from the terminal
 *
 * EXECUTION FLOW:
 * ===============
 * 1. Load environment variables from .env (dotenv/config)
 * 2. Parse CLI arguments (parseArgs)
 * 3. Validate configuration (getConfig)
 * 4. Branch based on command:
 *    - "research" → startResearch() - build the knowledge base for a game
 *    - "ask"      → resolveAndAnswer() - hybrid answer with citations
 *    - "list" / "sources" / "files" → library browsing
 * 5. Display results to console
 *
 * USAGE:
 *   npm run research -- Catan
 *   npm run ask -- "how do you win in Catan?"
 *   npx tsx src/index.ts list --status ready
 */

import "dotenv/config";

import { logger } from "./core/logger.js";
import { getConfig } from "./core/config.js";
import { toUserMessage } from "./core/errors.js";
import { EntityStatusSchema, type EntityStatus } from "./schemas/entity.js";
import { createAssistant, type AnswerResult, type ResearchResult } from "./app.js";

const COMMANDS = ["research", "ask", "list", "sources", "files", "help"] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

interface ParsedArgs {
  command: Command;
  args: string[];
  options: {
    force: boolean;
    chatId: string;
    status?: EntityStatus;
    verbose: boolean;
  };
}

/**
 * Parse command line arguments
 */
function parseArgs(): ParsedArgs {
  const argv = process.argv.slice(2);

  const result: ParsedArgs = {
    command: "help",
    args: [],
    options: {
      force: false,
      chatId: "cli",
      verbose: false,
    },
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (i === 0 && isCommand(arg)) {
      result.command = arg;
    } else if (arg === "--force" || arg === "-f") {
      result.options.force = true;
    } else if (arg === "--chat" || arg === "-c") {
      result.options.chatId = argv[++i] ?? "cli";
    } else if (arg === "--status" || arg === "-s") {
      const parsed = EntityStatusSchema.safeParse(argv[++i]);
      if (parsed.success) {
        result.options.status = parsed.data;
      }
    } else if (arg === "--verbose" || arg === "-v") {
      result.options.verbose = true;
    } else if (!arg.startsWith("-")) {
      result.args.push(arg);
    }
  }

  return result;
}

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
Game Scout - Board game research assistant

USAGE:
  npx tsx src/index.ts <command> [arguments] [options]

COMMANDS:
  research <game>       Research a game and build its knowledge base
  ask <question>        Ask a question (uses the chat's history to find the game)
  list                  List games in the library
  sources <id>          List the source records of a game
  files <id>            List the downloaded files of a game
  help                  Show this help message

OPTIONS:
  -f, --force           Re-research a game that is already ready
  -c, --chat <id>       Conversation id for "ask" (default: cli)
  -s, --status <s>      Filter "list" by status: created, researching, ready, failed
  -v, --verbose         Enable debug logging

EXAMPLES:
  npx tsx src/index.ts research "Ticket to Ride"
  npx tsx src/index.ts ask "how many players can play?" --chat family
  npx tsx src/index.ts list --status ready
`);
}

/**
 * Summary line for a finished research run
 */
function formatResearch(result: ResearchResult): string {
  if (result.error) {
    return `Research of ${result.name} did not complete (${result.status}): ${result.error}`;
  }

  const lines = [
    `Knowledge base for ${result.name}: ${result.downloadedCount} saved files and ${result.linkedCount} links.`,
  ];
  if (result.description) {
    lines.push(`\n${result.description}`);
  }

  const facts: string[] = [];
  if (result.metadata?.difficulty) {
    facts.push(`Difficulty: ${result.metadata.difficulty}/5.0`);
  }
  if (result.metadata?.playerCount) {
    const { min, max } = result.metadata.playerCount;
    facts.push(`Players: ${min === max ? min : `${min}-${max}`}`);
  }
  if (facts.length > 0) {
    lines.push(facts.join(" • "));
  }

  const video = result.metadata?.tutorialVideo;
  if (video) {
    lines.push(`Tutorial: ${video.title}${video.channel ? ` by ${video.channel}` : ""} ${video.url}`);
  }
  if (result.metadata?.referenceUrl) {
    lines.push(`BoardGameGeek: ${result.metadata.referenceUrl}`);
  }

  return lines.join("\n");
}

function formatAnswer(result: AnswerResult): string {
  const lines = [result.text];
  if (result.webCitations.length > 0) {
    lines.push("\nWeb sources:");
    for (const citation of result.webCitations) {
      lines.push(`- ${citation.title || citation.url}: ${citation.url}`);
    }
  }
  return lines.join("\n");
}

function parseId(value: string | undefined): number | null {
  const id = Number(value);
  return Number.isInteger(id) && id > 0 ? id : null;
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================
async function main(): Promise<void> {
  const { command, args, options } = parseArgs();

  if (command === "help") {
    printHelp();
    return;
  }

  try {
    getConfig();
  } catch (error) {
    console.error("Configuration error:", error instanceof Error ? error.message : error);
    console.error("\nMake sure you have a .env file with the required variables (see .env.example).");
    process.exit(1);
  }

  const assistant = createAssistant();
  if (options.verbose) {
    logger.setLevel("debug");
  }

  try {
    switch (command) {
      case "research": {
        const name = args.join(" ");
        if (!name) {
          printHelp();
          process.exit(1);
        }
        console.log(`\nResearching "${name}"...\n`);
        const result = await assistant.startResearch(name, { force: options.force });
        console.log(formatResearch(result));
        break;
      }

      case "ask": {
        const question = args.join(" ");
        if (!question) {
          printHelp();
          process.exit(1);
        }
        const result = await assistant.resolveAndAnswer(question, { chatId: options.chatId });
        console.log(`\n${formatAnswer(result)}`);
        break;
      }

      case "list": {
        const entities = await assistant.listEntities(options.status);
        if (entities.length === 0) {
          console.log("No games in the library yet.");
        }
        for (const entity of entities) {
          console.log(`  [${entity.id}] ${entity.name} (${entity.status})`);
          if (entity.description) {
            console.log(`      ${entity.description}`);
          }
        }
        break;
      }

      case "sources":
      case "files": {
        const id = parseId(args[0]);
        if (id === null) {
          console.error("An entity id is required.");
          process.exit(1);
        }
        if (command === "sources") {
          for (const source of await assistant.listSources(id)) {
            const where = source.localPath ? "saved" : "link";
            console.log(`  [${source.id}] ${source.sourceType} (${where}) ${source.title ?? ""} ${source.originUrl}`);
          }
        } else {
          for (const file of await assistant.listArtifacts(id)) {
            console.log(`  ${file.filename} (${file.sizeBytes} bytes)`);
          }
        }
        break;
      }
    }
  } catch (error) {
    logger.error("Command failed", error, { command });
    console.error(`\n${toUserMessage(error)}`);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
