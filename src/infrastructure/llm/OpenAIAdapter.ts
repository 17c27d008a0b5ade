/**
 * OpenAI integration for memory ingestion.
 *
 * - Client construction from configuration (timeout, retries, base URL)
 * - Fact extraction from a conversation transcript
 * - Reconciliation of new facts against existing memories
 *
 * Replies are requested as JSON objects and validated with Zod; anything
 * else is an error the engine surfaces to the gateway.
 */
import type { AppConfig } from "@config/index";
import type {
  ConversationMessage,
  ExistingMemoryRef,
  FactExtractorPort,
  MemoryAction,
} from "@domain/memory/ports";
import {
  factExtractionPrompt,
  MEMORY_RECONCILE_PROMPT,
  reconcileInput,
} from "@infrastructure/llm/prompts";
import { describeError, logEvent } from "@infrastructure/logging/Logger";
import OpenAI from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { z } from "zod";

export function createOpenAIClient(settings: AppConfig["openai"]): OpenAI {
  return new OpenAI({
    apiKey: settings.key,
    baseURL: settings.baseUrl,
    timeout: settings.timeoutMs,
    maxRetries: settings.maxRetries,
  });
}

const FactsReplySchema = z.object({
  facts: z.array(z.string()),
});

const ReconcileReplySchema = z.object({
  memory: z.array(
    z.object({
      id: z.coerce.string(),
      text: z.string(),
      event: z.enum(["ADD", "UPDATE", "DELETE", "NONE"]),
    })
  ),
});

function parseJsonObject(content: string, label: string): unknown {
  const trimmed = content
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "");

  try {
    return JSON.parse(trimmed);
  } catch {
    throw new Error(`${label}: LLM reply is not valid JSON`);
  }
}

export function parseFacts(content: string): string[] {
  const parsed = FactsReplySchema.safeParse(
    parseJsonObject(content, "Fact extraction")
  );

  if (!parsed.success) {
    throw new Error("Fact extraction: LLM reply has an unexpected shape");
  }

  return parsed.data.facts.map((f) => f.trim()).filter((f) => f.length > 0);
}

export function parseMemoryActions(content: string): MemoryAction[] {
  const parsed = ReconcileReplySchema.safeParse(
    parseJsonObject(content, "Memory reconciliation")
  );

  if (!parsed.success) {
    throw new Error("Memory reconciliation: LLM reply has an unexpected shape");
  }

  return parsed.data.memory.map((entry) => ({
    id: entry.id,
    text: entry.text.trim(),
    event: entry.event,
  }));
}

export function formatTranscript(messages: ConversationMessage[]): string {
  return messages.map((m) => `${m.role}: ${m.content}`).join("\n");
}

/** The part of the OpenAI client the extractor calls. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<{
        choices: Array<{ message: { content: string | null } }>;
      }>;
    };
  };
}

export class OpenAIFactExtractor implements FactExtractorPort {
  constructor(
    private readonly client: ChatCompletionsClient,
    private readonly settings: AppConfig["llm"]
  ) {}

  private async completeJson(
    system: string,
    user: string,
    operation: string
  ): Promise<string> {
    const startedAt = Date.now();

    try {
      const completion = await this.client.chat.completions.create({
        model: this.settings.model,
        temperature: this.settings.temperature,
        max_tokens: this.settings.maxTokens,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: system },
          { role: "user", content: user },
        ],
      });

      const content = completion.choices[0]?.message.content ?? "";

      logEvent("LLM_SUCCESS", {
        operation,
        model: this.settings.model,
        durationMs: Date.now() - startedAt,
        replyLength: content.length,
      });

      return content;
    } catch (error: unknown) {
      const caught = describeError(error);

      logEvent("LLM_FAILURE", {
        operation,
        model: this.settings.model,
        durationMs: Date.now() - startedAt,
        message: caught.message,
        name: caught.name,
      });

      throw error;
    }
  }

  async extractFacts(messages: ConversationMessage[]): Promise<string[]> {
    if (messages.length === 0) {
      return [];
    }

    const today = new Date().toISOString().slice(0, 10);
    const content = await this.completeJson(
      factExtractionPrompt(today),
      `Input:\n${formatTranscript(messages)}`,
      "facts.extract"
    );

    return parseFacts(content);
  }

  async reconcile(
    existing: ExistingMemoryRef[],
    facts: string[]
  ): Promise<MemoryAction[]> {
    const content = await this.completeJson(
      MEMORY_RECONCILE_PROMPT,
      reconcileInput(existing, facts),
      "memory.reconcile"
    );

    return parseMemoryActions(content);
  }
}
