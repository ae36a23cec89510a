import OpenAI from "openai";
import { z } from "zod";
import type { AgentConfig } from "../config/appConfig";
import logger from "../logger";
import { ConfigurationError, describeError } from "../rag/errors";
import type { RetrievalService } from "../rag/services/RetrievalService";

type ChatMessage = OpenAI.Chat.ChatCompletionMessageParam;
type ToolCall = OpenAI.Chat.ChatCompletionMessageToolCall;

/**
 * The slice of `openai.chat.completions` the agent calls.
 */
export interface ChatCompletionsApi {
  create(body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<OpenAI.Chat.ChatCompletion>;
}

export interface AgentReply {
  answer: string;
  /** Queries the model searched for, in call order. */
  searches: string[];
}

const SYSTEM_PROMPT =
  "You are a helpful customer service assistant. You have access to company policy documents " +
  "and can search them to answer customer questions accurately. Always use the search_faq " +
  "function to find relevant information before answering policy-related questions.";

export const SEARCH_FAQ_FUNCTION: OpenAI.Chat.ChatCompletionTool = {
  type: "function",
  function: {
    name: "search_faq",
    description:
      "Search company policy PDFs for answers to questions about refunds, warranties, delivery, returns, and other policies.",
    parameters: {
      type: "object",
      properties: {
        query: {
          type: "string",
          description: "The question or topic to search for in the policy documents",
        },
        top_k: {
          type: "integer",
          description: "Number of results to return (default: 3)",
          default: 3,
        },
      },
      required: ["query"],
    },
  },
};

const searchArgsSchema = z.object({
  query: z.string(),
  top_k: z.number().int().positive().optional(),
});

export class FaqAgent {
  constructor(
    private readonly completions: ChatCompletionsApi,
    private readonly retrieval: RetrievalService,
    private readonly config: AgentConfig
  ) {}

  /**
   * Lets the model call search_faq up to `maxToolRounds` times, then returns
   * its final answer.
   */
  async ask(userMessage: string): Promise<AgentReply> {
    const messages: ChatMessage[] = [
      { role: "system", content: SYSTEM_PROMPT },
      { role: "user", content: userMessage },
    ];
    const searches: string[] = [];

    for (let round = 0; round < this.config.maxToolRounds; round++) {
      const message = await this.complete(messages, true);
      const toolCalls = message.tool_calls ?? [];
      if (toolCalls.length === 0) {
        return { answer: message.content ?? "", searches };
      }

      messages.push(message);
      for (const call of toolCalls) {
        messages.push({
          role: "tool",
          tool_call_id: call.id,
          content: await this.runTool(call, searches),
        });
      }
    }

    logger.warn("FaqAgent.ask reached the tool round limit", { rounds: this.config.maxToolRounds });
    const final = await this.complete(messages, false);
    return { answer: final.content ?? "", searches };
  }

  private async complete(
    messages: ChatMessage[],
    withTools: boolean
  ): Promise<OpenAI.Chat.ChatCompletionMessage> {
    try {
      const response = await this.completions.create({
        model: this.config.model,
        messages,
        ...(withTools ? { tools: [SEARCH_FAQ_FUNCTION], tool_choice: "auto" as const } : {}),
      });
      const message = response.choices[0]?.message;
      if (!message) throw new Error("Chat completion returned no choices");
      return message;
    } catch (error) {
      logger.error("FaqAgent.complete failed", { error, model: this.config.model });
      throw error;
    }
  }

  private async runTool(call: ToolCall, searches: string[]): Promise<string> {
    if (call.function.name !== SEARCH_FAQ_FUNCTION.function.name) {
      return JSON.stringify({ error: `Unknown tool: ${call.function.name}` });
    }

    try {
      const args = searchArgsSchema.parse(JSON.parse(call.function.arguments));
      searches.push(args.query);
      logger.info("FaqAgent searching policies", { query: args.query, topK: args.top_k });

      const results = await this.retrieval.search(args.query, args.top_k ?? this.retrieval.defaultTopK);
      return JSON.stringify(results, null, 2);
    } catch (error) {
      logger.warn("FaqAgent tool call failed", { error });
      return JSON.stringify({ error: describeError(error) });
    }
  }
}

export const createFaqAgent = (config: AgentConfig, retrieval: RetrievalService): FaqAgent => {
  if (!config.apiKey) {
    throw new ConfigurationError('Environment variable "OPENAI_API_KEY" is missing.');
  }
  const openai = new OpenAI({ apiKey: config.apiKey });
  return new FaqAgent(openai.chat.completions, retrieval, config);
};
