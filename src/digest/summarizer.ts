import Anthropic from "@anthropic-ai/sdk";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { SummarizerError, describeError } from "../errors.js";

const TOOL_NAME = "record_scqr_summary";
const MAX_TOKENS = 600;
const MAX_CONTENT_LENGTH = 2000;
const DEFAULT_TIMEOUT_MS = 30_000;

const SYSTEM_PROMPT =
  "You are an expert at analyzing articles and extracting key insights using the SCQR framework " +
  "(Situation, Complication, Question, Resolution). Keep each section to 1-2 sentences.";

export const ScqrSummarySchema = Type.Object({
  situation: Type.String({ description: "Brief context: the current state or background" }),
  complication: Type.String({ description: "The problem, challenge, or tension being addressed" }),
  question: Type.String({ description: "The key question the article explores or answers" }),
  resolution: Type.String({ description: "The main insight, answer, or takeaway" }),
});

export type ScqrSummary = Static<typeof ScqrSummarySchema>;

export type SummaryInput = {
  title: string;
  text: string;
  feedTitle: string;
};

export interface Summarizer {
  summarize(input: SummaryInput): Promise<ScqrSummary>;
}

export type AnthropicSummarizerOptions = {
  apiKey: string;
  model: string;
  timeoutMs?: number;
};

export function buildSummaryPrompt(input: SummaryInput): string {
  const content =
    input.text.length > MAX_CONTENT_LENGTH ? `${input.text.slice(0, MAX_CONTENT_LENGTH)}...` : input.text;
  return [
    "Analyze this article and record a concise SCQR summary.",
    "",
    `Article Title: ${input.title}`,
    `Source: ${input.feedTitle}`,
    `Content Preview: ${content}`,
  ].join("\n");
}

/**
 * SCQR summaries through a forced tool call
 */
export class AnthropicSummarizer implements Summarizer {
  private readonly client: Anthropic;
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(options: AnthropicSummarizerOptions) {
    this.client = new Anthropic({ apiKey: options.apiKey, maxRetries: 1 });
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async summarize(input: SummaryInput): Promise<ScqrSummary> {
    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: MAX_TOKENS,
          system: SYSTEM_PROMPT,
          messages: [{ role: "user", content: buildSummaryPrompt(input) }],
          tools: [
            {
              name: TOOL_NAME,
              description: "Record the SCQR summary of the article.",
              input_schema: {
                type: "object",
                properties: ScqrSummarySchema.properties,
                required: ScqrSummarySchema.required,
              },
            },
          ],
          tool_choice: { type: "tool", name: TOOL_NAME },
        },
        { timeout: this.timeoutMs },
      );
    } catch (error) {
      throw new SummarizerError(`Summary request failed: ${describeError(error)}`, { cause: error });
    }

    for (const block of response.content) {
      if (block.type === "tool_use" && block.name === TOOL_NAME) {
        if (Value.Check(ScqrSummarySchema, block.input)) {
          return block.input;
        }
        throw new SummarizerError(`Summary for "${input.title}" did not match the SCQR shape`);
      }
    }
    throw new SummarizerError(`Summary for "${input.title}" returned no tool call`);
  }
}
