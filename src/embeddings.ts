import { z } from "zod";
import { EmbeddingError, toError } from "./errors.js";
import type { EmbeddingProvider } from "./types.js";

export interface ProviderConfig {
  provider: "openai" | "ollama" | "voyageai";
  apiKey?: string;
  model: string;
  baseUrl?: string;
  /** Overrides the dimension looked up from the model name. */
  dimensions?: number;
}

const KNOWN_DIMENSIONS: Record<string, number> = {
  "text-embedding-3-small": 1536,
  "text-embedding-3-large": 3072,
  "text-embedding-ada-002": 1536,
  "all-minilm": 384,
  "all-MiniLM-L6-v2": 384,
  "nomic-embed-text": 768,
  "voyage-2": 1024,
  "voyage-3": 1024,
};

/** Vector dimension implied by a model name, if it is one we know. */
export function modelDimensions(model: string): number | undefined {
  return KNOWN_DIMENSIONS[model] ?? KNOWN_DIMENSIONS[model.replace(/:.*$/, "")];
}

const OpenAIResponse = z.object({
  data: z.array(z.object({ index: z.number().optional(), embedding: z.array(z.number()) })),
});

const OllamaResponse = z.object({ embeddings: z.array(z.array(z.number())) });

function sanitize(texts: string[]): string[] {
  return texts.map((t) => {
    if (!t || typeof t !== "string") return " ";
    return t.replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, "").trim() || " ";
  });
}

async function postJSON(url: string, body: unknown, headers: Record<string, string>, label: string): Promise<unknown> {
  let resp: Response;
  try {
    resp = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(body),
    });
  } catch (err) {
    throw new EmbeddingError(`${label} unreachable at ${url}: ${toError(err).message}`, { cause: err });
  }
  if (!resp.ok) {
    throw new EmbeddingError(`${label} error (${resp.status}): ${await resp.text()}`);
  }
  return resp.json();
}

function parseOrThrow<T>(schema: z.ZodType<T>, data: unknown, label: string): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) throw new EmbeddingError(`${label} returned an unexpected response shape`, { cause: parsed.error });
  return parsed.data;
}

abstract class BaseEmbeddings implements EmbeddingProvider {
  dimensions: number;

  constructor(dimensions: number | undefined) {
    this.dimensions = dimensions ?? 0;
  }

  abstract embedBatch(texts: string[]): Promise<number[][]>;

  async embed(text: string): Promise<number[]> {
    const [result] = await this.embedBatch([text]);
    if (!result) throw new EmbeddingError("provider returned no embedding");
    return result;
  }

  /** Learn the dimension from one sample embedding when the model is not in the lookup. */
  async init(): Promise<void> {
    if (this.dimensions > 0) return;
    const sample = await this.embed("dimension check");
    this.dimensions = sample.length;
  }
}

class OpenAIEmbeddings extends BaseEmbeddings {
  private apiKey: string;
  private model: string;
  private baseUrl: string;
  private requestDimensions?: number;

  constructor(config: ProviderConfig) {
    super(config.dimensions ?? modelDimensions(config.model));
    if (!config.apiKey) throw new EmbeddingError("EMBEDDING_API_KEY required for OpenAI");
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.baseUrl = config.baseUrl || "https://api.openai.com/v1";
    // text-embedding-3 models can be shortened server-side
    if (config.dimensions && config.model.startsWith("text-embedding-3")) this.requestDimensions = config.dimensions;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const data = await postJSON(
      `${this.baseUrl}/embeddings`,
      { input: sanitize(texts), model: this.model, dimensions: this.requestDimensions },
      { Authorization: `Bearer ${this.apiKey}` },
      "Embedding API",
    );
    const parsed = parseOrThrow(OpenAIResponse, data, "Embedding API");
    const ordered = [...parsed.data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
    return ordered.map((d) => d.embedding);
  }
}

class OllamaEmbeddings extends BaseEmbeddings {
  private model: string;
  private baseUrl: string;

  constructor(config: ProviderConfig) {
    super(config.dimensions ?? modelDimensions(config.model));
    this.model = config.model || "all-minilm";
    this.baseUrl = config.baseUrl || "http://localhost:11434";
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const data = await postJSON(
      `${this.baseUrl}/api/embed`,
      { model: this.model, input: sanitize(texts) },
      {},
      "Ollama",
    );
    return parseOrThrow(OllamaResponse, data, "Ollama").embeddings;
  }
}

class VoyageEmbeddings extends BaseEmbeddings {
  private apiKey: string;
  private model: string;

  constructor(config: ProviderConfig) {
    super(config.dimensions ?? modelDimensions(config.model || "voyage-2"));
    if (!config.apiKey) throw new EmbeddingError("EMBEDDING_API_KEY required for VoyageAI");
    this.apiKey = config.apiKey;
    this.model = config.model || "voyage-2";
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const data = await postJSON(
      "https://api.voyageai.com/v1/embeddings",
      { input: sanitize(texts), model: this.model },
      { Authorization: `Bearer ${this.apiKey}` },
      "VoyageAI",
    );
    return parseOrThrow(OpenAIResponse, data, "VoyageAI").data.map((d) => d.embedding);
  }
}

export async function createEmbeddingProvider(config: ProviderConfig): Promise<EmbeddingProvider> {
  let provider: BaseEmbeddings;
  switch (config.provider) {
    case "openai":
      provider = new OpenAIEmbeddings(config);
      break;
    case "ollama":
      provider = new OllamaEmbeddings(config);
      break;
    case "voyageai":
      provider = new VoyageEmbeddings(config);
      break;
    default:
      throw new EmbeddingError(`Unknown embedding provider: ${String(config.provider)}`);
  }
  await provider.init();
  return provider;
}

export function prepareEmbeddingText(item: { title?: string | null; body?: string | null }): string {
  const title = (item.title || "Untitled").trim();
  const body = (item.body || "").trim().slice(0, 2000);
  return `${title}${body ? `\n\n${body}` : ""}`;
}
