/**
 * Agent Runner - Claude Agent SDK Wrapper
 * Runs a prompt under a named profile with retries and cost tracking
 *
 * EXECUTION FLOW:
 * ===============
 * runner.run(request)
 *   ├─ Look up profile (model, maxTurns, budget, tools, retries)
 *   ├─ RETRY LOOP (up to profile.retries times):
 *   │   ├─ executeOnce() - calls SDK query() and streams messages
 *   │   ├─ If success → return result
 *   │   └─ If retryable error → exponential backoff, retry
 *   └─ All attempts failed → throw AgentError
 */

import { randomUUID } from "crypto";
import { query, type Options, type SDKResultMessage } from "@anthropic-ai/claude-agent-sdk";
import type { AgentProfile, ModelName, ProfileName } from "./config.js";
import { logger, type ChildLogger } from "./logger.js";
import { AgentError, isRetryableError, toError } from "./errors.js";

/**
 * Agent run request
 */
export interface AgentRunRequest {
  /** Profile to run under */
  profile: ProfileName;
  /** The prompt to send to the agent */
  prompt: string;
  /** Optional system prompt */
  systemPrompt?: string;
  /** Correlation ID for tracing */
  correlationId?: string;
  /** Additional context for logging */
  context?: Record<string, unknown>;
}

/**
 * Result from a successful agent run
 */
export interface AgentRunResult {
  /** The agent's final text output */
  output: string;
  /** Session ID from the agent */
  sessionId?: string;
  /** Cost in USD */
  costUsd: number;
  /** Duration in milliseconds */
  durationMs: number;
  /** Number of assistant turns */
  turns: number;
  /** Tools that were used */
  toolsUsed: string[];
}

/**
 * Anything that can run a prompt under a profile
 */
export interface AgentRunner {
  run(request: AgentRunRequest): Promise<AgentRunResult>;
}

// Built-in tools that never make sense for these agents
const BLOCKED_TOOLS = ["Bash", "Read", "Write", "Edit", "MultiEdit", "NotebookEdit", "Glob", "Grep", "Task"];

/**
 * Map profile model names to model IDs
 */
function getModelId(model: ModelName): string {
  const models: Record<ModelName, string> = {
    haiku: "claude-haiku-4-5",
    sonnet: "claude-sonnet-4-5",
    opus: "claude-opus-4-1",
  };
  return models[model];
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Claude Agent SDK runner
 */
export class ClaudeAgentRunner implements AgentRunner {
  private readonly profiles: Record<ProfileName, AgentProfile>;
  private readonly cwd: string;

  constructor(options: { profiles: Record<ProfileName, AgentProfile>; cwd?: string }) {
    this.profiles = options.profiles;
    this.cwd = options.cwd ?? process.cwd();
  }

  async run(request: AgentRunRequest): Promise<AgentRunResult> {
    const profile = this.profiles[request.profile];
    const correlationId = request.correlationId ?? randomUUID();

    const log = logger.child({
      correlationId,
      agentProfile: request.profile,
      ...request.context,
    });

    log.debug("Starting agent run", {
      model: profile.model,
      maxTurns: profile.maxTurns,
      tools: profile.tools,
    });

    let lastError: Error | undefined;
    let attempt = 0;

    while (attempt < profile.retries) {
      attempt++;

      try {
        const result = await this.executeOnce(request, profile, log);

        log.debug("Agent run completed", {
          costUsd: result.costUsd,
          durationMs: result.durationMs,
          turns: result.turns,
          attempt,
        });
        logger.metric("agent_cost_usd", result.costUsd, {
          correlationId,
          agentProfile: request.profile,
        });

        return result;
      } catch (error) {
        lastError = toError(error);

        log.warn(`Agent run failed (attempt ${attempt}/${profile.retries})`, {
          error: lastError.message,
        });

        if (!isRetryableError(error)) {
          break;
        }

        if (attempt < profile.retries) {
          const backoffMs = profile.backoffMs * Math.pow(2, attempt - 1);
          log.debug(`Retrying in ${backoffMs}ms`);
          await sleep(backoffMs);
        }
      }
    }

    throw new AgentError(lastError?.message ?? "Agent run failed", request.profile, {
      cause: lastError,
      context: { correlationId, attempts: attempt },
    });
  }

  /**
   * Execute a single agent run (no retries)
   */
  private async executeOnce(
    request: AgentRunRequest,
    profile: AgentProfile,
    log: ChildLogger
  ): Promise<AgentRunResult> {
    const startTime = Date.now();

    const options: Options = {
      model: getModelId(profile.model),
      systemPrompt: request.systemPrompt,
      allowedTools: profile.tools,
      disallowedTools: BLOCKED_TOOLS,
      maxTurns: profile.maxTurns,
      maxBudgetUsd: profile.maxBudgetUsd,
      permissionMode: "bypassPermissions",
      cwd: this.cwd,
    };

    const stream = query({ prompt: request.prompt, options });

    let output = "";
    let finalResult: SDKResultMessage | undefined;
    let turns = 0;
    const toolsUsed = new Set<string>();

    for await (const message of stream) {
      if (message.type === "assistant") {
        for (const block of message.message.content) {
          if (block.type === "text") {
            output += block.text;
          } else if (block.type === "tool_use") {
            toolsUsed.add(block.name);
            log.debug(`Tool used: ${block.name}`);
          }
        }
        turns++;
      } else if (message.type === "result") {
        finalResult = message;
      }
    }

    if (!finalResult) {
      throw new AgentError("Agent stream ended without a result", request.profile);
    }

    if (finalResult.subtype !== "success") {
      throw new AgentError(`Agent stopped: ${finalResult.subtype}`, request.profile, {
        context: { costUsd: finalResult.total_cost_usd },
      });
    }

    // The result message carries the final answer; streamed text may include preamble
    if (finalResult.result) {
      output = finalResult.result;
    }

    return {
      output,
      sessionId: finalResult.session_id,
      costUsd: finalResult.total_cost_usd ?? 0,
      durationMs: finalResult.duration_ms || Date.now() - startTime,
      turns,
      toolsUsed: Array.from(toolsUsed),
    };
  }
}
