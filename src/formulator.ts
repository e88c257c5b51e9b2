/**
 * Query formulation: turns free text into a boolean keyword string with a
 * structured language-model call.
 *
 * The model must answer with a JSON object holding a single `keywords`
 * string. Anything else is a FormulationFailure; there is no retry and no
 * fallback to the raw text.
 */

import { z } from "zod";
import {
  LLM_BACKEND,
  LLM_MODEL,
  LLM_TEMPERATURE,
  OLLAMA_BASE_URL,
  getOpenAIApiKey,
} from "./config";
import { FormulationFailure } from "./errors";

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

export interface QueryFormulator {
  /** Produce a boolean search string for the given text. Rejects with FormulationFailure. */
  formulate(text: string): Promise<string>;
  readonly model: string;
}

// ---------------------------------------------------------------------------
// Prompt and output schema
// ---------------------------------------------------------------------------

export const KEYWORDS_SYSTEM_PROMPT = `You are a research assistant who writes precise, effective search queries for scientific literature databases.

Given a user query, write one comprehensive but concise boolean search string.

Aim for:
- Relevance: capture what the user is actually looking for.
- Specificity: use operators to exclude unrelated material.
- Coverage: include synonyms and closely related terms.

Use these techniques:
- Boolean operators (AND, OR, NOT) to combine terms.
- Double quotes for exact phrases and multi-word terms.
- Truncation (*) for word-stem variants.

Work through it step by step: identify the key concepts, brainstorm keywords and synonyms, combine them with boolean operators in the right order, then refine with phrases and truncation.

Respond with a JSON object of the form {"keywords": "<search string>"} and nothing else.`;

const keywordsSchema = z.object({
  keywords: z.string().trim().min(1),
});

/** JSON schema handed to the model so it can only answer with `{ keywords }`. */
export const KEYWORDS_JSON_SCHEMA = {
  type: "object",
  properties: {
    keywords: {
      type: "string",
      description: "The generated keywords in boolean format",
    },
  },
  required: ["keywords"],
  additionalProperties: false,
} as const;

/**
 * Extract the keyword string from the model's raw text answer.
 * Tolerates a surrounding markdown code fence.
 */
export function parseKeywords(content: string): string {
  const cleaned = content
    .trim()
    .replace(/^```(?:json)?\s*/, "")
    .replace(/\s*```$/, "");

  let json: unknown;
  try {
    json = JSON.parse(cleaned);
  } catch (error) {
    throw new FormulationFailure("Model response is not valid JSON", { cause: error });
  }

  const parsed = keywordsSchema.safeParse(json);
  if (!parsed.success) {
    throw new FormulationFailure("Model response is missing a non-empty 'keywords' string");
  }
  return parsed.data.keywords;
}

function userMessage(text: string): string {
  return `QUERY: ${text}`;
}

async function postJson(
  service: string,
  url: string,
  headers: Record<string, string>,
  payload: unknown,
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(payload),
    });
  } catch (error) {
    throw new FormulationFailure(
      `${service} request failed: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  if (!response.ok) {
    const body = await response.text();
    throw new FormulationFailure(`${service} request failed (${response.status}): ${body}`);
  }

  try {
    return await response.json();
  } catch (error) {
    throw new FormulationFailure(`${service} returned a non-JSON response`, { cause: error });
  }
}

function assertFormulable(text: string): void {
  if (!text.trim()) {
    throw new FormulationFailure("Cannot formulate keywords from empty text");
  }
}

// ---------------------------------------------------------------------------
// Ollama
// ---------------------------------------------------------------------------

const ollamaChatSchema = z.object({
  message: z.object({ content: z.string() }),
});

/** Formulator backed by Ollama's `/api/chat` with a JSON-schema `format`. */
export function createOllamaFormulator(
  baseUrl: string = OLLAMA_BASE_URL,
  model: string = LLM_MODEL,
  temperature: number = LLM_TEMPERATURE,
): QueryFormulator {
  const url = `${baseUrl.replace(/\/+$/, "")}/api/chat`;
  return {
    model,

    async formulate(text: string): Promise<string> {
      assertFormulable(text);
      const json = await postJson("Ollama", url, {}, {
        model,
        stream: false,
        format: KEYWORDS_JSON_SCHEMA,
        options: { temperature },
        messages: [
          { role: "system", content: KEYWORDS_SYSTEM_PROMPT },
          { role: "user", content: userMessage(text) },
        ],
      });

      const parsed = ollamaChatSchema.safeParse(json);
      if (!parsed.success) {
        throw new FormulationFailure("Unexpected Ollama chat response shape");
      }
      return parseKeywords(parsed.data.message.content);
    },
  };
}

// ---------------------------------------------------------------------------
// OpenAI
// ---------------------------------------------------------------------------

const openAIChatSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .nonempty(),
});

/** Formulator backed by OpenAI chat completions with a strict JSON schema. */
export function createOpenAIFormulator(
  apiKey?: string,
  model: string = LLM_MODEL,
  temperature: number = LLM_TEMPERATURE,
): QueryFormulator {
  return {
    model,

    async formulate(text: string): Promise<string> {
      assertFormulable(text);
      let key: string;
      try {
        key = apiKey ?? getOpenAIApiKey();
      } catch (error) {
        throw new FormulationFailure(
          error instanceof Error ? error.message : String(error),
          { cause: error },
        );
      }

      const json = await postJson(
        "OpenAI",
        "https://api.openai.com/v1/chat/completions",
        { Authorization: `Bearer ${key}` },
        {
          model,
          temperature,
          response_format: {
            type: "json_schema",
            json_schema: { name: "keywords", strict: true, schema: KEYWORDS_JSON_SCHEMA },
          },
          messages: [
            { role: "system", content: KEYWORDS_SYSTEM_PROMPT },
            { role: "user", content: userMessage(text) },
          ],
        },
      );

      const parsed = openAIChatSchema.safeParse(json);
      const content = parsed.success ? parsed.data.choices[0].message.content : null;
      if (content === null) {
        throw new FormulationFailure("Unexpected OpenAI chat response shape");
      }
      return parseKeywords(content);
    },
  };
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/** The formulator selected by LLM_BACKEND. */
export function createQueryFormulator(): QueryFormulator {
  return LLM_BACKEND === "openai" ? createOpenAIFormulator() : createOllamaFormulator();
}
