import { GoogleGenerativeAI, GoogleGenerativeAIError } from "@google/generative-ai";
import Groq from "groq-sdk";
import OpenAI from "openai";
import type { LlmConfig } from "../config";
import {
  ChatbotError,
  EmptyResponseFailure,
  TimeoutFailure,
  UpstreamServiceFailure,
} from "../errors";
import type { ChatMessage } from "../types";
import { describeError } from "../utils/logger";

export interface TextCompleter {
  /**
   * Resolves with non-empty text. An empty completion is a failure
   * (`EmptyResponseFailure`), never an empty string.
   */
  complete(systemPrompt: string, messages: ChatMessage[]): Promise<string>;
}

export class LlmService implements TextCompleter {
  private genAI?: GoogleGenerativeAI;
  private groq?: Groq;
  private openai?: OpenAI;

  constructor(private readonly config: LlmConfig) {}

  get provider() {
    return this.config.provider;
  }

  async complete(systemPrompt: string, messages: ChatMessage[]): Promise<string> {
    let text: string | null = null;
    try {
      switch (this.config.provider) {
        case "groq":
          text = await this.chatGroq(systemPrompt, messages);
          break;
        case "gemini":
          text = await this.chat(systemPrompt, messages);
          break;
        case "openai":
          text = await this.chatOpenAI(systemPrompt, messages);
          break;
      }
    } catch (error) {
      throw this.translateError(error);
    }

    if (!text || text.trim() === "") {
      throw new EmptyResponseFailure(this.config.provider);
    }
    return text.trim();
  }

  /** Gemini */
  async chat(systemPrompt: string, messages: ChatMessage[]): Promise<string | null> {
    if (!this.genAI) {
      this.genAI = new GoogleGenerativeAI(this.config.apiKey);
    }
    const model = this.genAI.getGenerativeModel({ model: this.config.model });

    const contents = messages.map((msg) => ({
      role: msg.role === "user" ? "user" : "model",
      parts: [{ text: msg.content }],
    }));

    // SDK aborts surface as GoogleGenerativeAIError; the deadline is tracked here
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeoutMs);
    try {
      const result = await model.generateContent(
        {
          contents,
          ...(systemPrompt.trim() !== "" ? { systemInstruction: systemPrompt } : {}),
        },
        { signal: controller.signal }
      );
      return result.response.text();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TimeoutFailure("gemini", this.config.timeoutMs, error);
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  async chatGroq(systemPrompt: string, messages: ChatMessage[]): Promise<string | null> {
    if (!this.groq) {
      this.groq = new Groq({
        apiKey: this.config.apiKey,
        timeout: this.config.timeoutMs,
        maxRetries: 0,
      });
    }

    const payload: Groq.Chat.Completions.ChatCompletionMessageParam[] = [];
    if (systemPrompt.trim() !== "") {
      payload.push({ role: "system", content: systemPrompt });
    }
    for (const msg of messages) {
      payload.push({ role: msg.role, content: msg.content });
    }

    const completion = await this.groq.chat.completions.create({
      model: this.config.model,
      messages: payload,
    });

    return completion.choices[0]?.message?.content ?? null;
  }

  async chatOpenAI(systemPrompt: string, messages: ChatMessage[]): Promise<string | null> {
    if (!this.openai) {
      this.openai = new OpenAI({
        apiKey: this.config.apiKey,
        timeout: this.config.timeoutMs,
        maxRetries: 0,
      });
    }

    const payload: OpenAI.Chat.Completions.ChatCompletionMessageParam[] = [];
    if (systemPrompt.trim() !== "") {
      payload.push({ role: "system", content: systemPrompt });
    }
    for (const msg of messages) {
      payload.push({ role: msg.role, content: msg.content });
    }

    const completion = await this.openai.chat.completions.create({
      model: this.config.model,
      messages: payload,
    });

    return completion.choices[0]?.message?.content ?? null;
  }

  private translateError(error: unknown): ChatbotError {
    const provider = this.config.provider;

    if (error instanceof ChatbotError) return error;

    if (
      error instanceof OpenAI.APIConnectionTimeoutError ||
      error instanceof Groq.APIConnectionTimeoutError ||
      (error instanceof Error && error.name === "AbortError") ||
      (error instanceof GoogleGenerativeAIError && /aborted/i.test(error.message))
    ) {
      return new TimeoutFailure(provider, this.config.timeoutMs, error);
    }

    if (error instanceof OpenAI.APIError || error instanceof Groq.APIError) {
      return new UpstreamServiceFailure(provider, error.message, error.status, error);
    }

    return new UpstreamServiceFailure(provider, describeError(error), undefined, error);
  }
}
