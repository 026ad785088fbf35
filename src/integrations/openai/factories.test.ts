import { testSettings } from "../../__mocks__/cli.js";
import { createChatModel } from "./chat.js";
import { createOpenAIClient } from "./client.js";
import { EMBEDDING_BATCH_SIZE, createEmbeddings } from "./embeddings.js";

describe("OpenAI factories", () => {
  const settings = testSettings({ chatModel: "gpt-4o-mini", maxTokens: 150, temperature: 0.7 });

  it("configures the chat model from settings", () => {
    const chat = createChatModel(settings);

    expect(chat.model).toBe("gpt-4o-mini");
    expect(chat.temperature).toBe(0.7);
    expect(chat.maxTokens).toBe(150);
  });

  it("lets the caller pick a fine-tuned chat model", () => {
    expect(createChatModel(settings, "ft:gpt-3.5-turbo-0125:acme::abc123").model).toBe(
      "ft:gpt-3.5-turbo-0125:acme::abc123"
    );
  });

  it("batches embedding requests", () => {
    const embeddings = createEmbeddings(settings, "text-embedding-3-large");

    expect(embeddings.model).toBe("text-embedding-3-large");
    expect(embeddings.batchSize).toBe(EMBEDDING_BATCH_SIZE);
  });

  it("creates a client without retries", () => {
    const client = createOpenAIClient(settings);

    expect(client.apiKey).toBe("test-key");
    expect(client.maxRetries).toBe(0);
  });
});
