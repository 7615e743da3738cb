/**
 * OpenAI generator tests, against a recording client.
 *
 * Run: node --import tsx --test src/llm/openai.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, test } from "node:test";

import {
  EmptyCompletionError,
  OpenAITextGenerator,
  type ChatCompletionClient,
  type ChatCompletionReply,
  type ChatCompletionRequest,
  type ChatRequestOptions,
} from "./index.js";

// ============================================================
// Fixtures
// ============================================================

interface RecordedCall {
  body: ChatCompletionRequest;
  options: ChatRequestOptions;
}

function recordingClient(content: string | null): {
  client: ChatCompletionClient;
  calls: RecordedCall[];
} {
  const calls: RecordedCall[] = [];
  const client: ChatCompletionClient = {
    chat: {
      completions: {
        create(body, options): Promise<ChatCompletionReply> {
          calls.push({ body, options });
          return Promise.resolve({ choices: [{ message: { content } }] });
        },
      },
    },
  };
  return { client, calls };
}

function generator(client: ChatCompletionClient, system?: string): OpenAITextGenerator {
  return new OpenAITextGenerator({ apiKey: "test-secret", model: "test-model", client, system });
}

// ============================================================
// Requests
// ============================================================

describe("OpenAITextGenerator request", () => {
  test("sends the system and user messages at temperature 0", async () => {
    const { client, calls } = recordingClient("[]");

    await generator(client, "Be brief.").generate("List the topics.");

    assert.equal(calls.length, 1);
    assert.deepEqual(calls[0]?.body, {
      model: "test-model",
      messages: [
        { role: "system", content: "Be brief." },
        { role: "user", content: "List the topics." },
      ],
      temperature: 0,
    });
  });

  test("uses the configured temperature", async () => {
    const { client, calls } = recordingClient("[]");
    const custom = new OpenAITextGenerator({
      apiKey: "test-secret",
      model: "test-model",
      temperature: 0.7,
      client,
    });

    await custom.generate("x");

    assert.equal(calls[0]?.body.temperature, 0.7);
  });

  test("a default system message is sent when none is given", async () => {
    const { client, calls } = recordingClient("[]");

    await generator(client).generate("x");

    const first = calls[0]?.body.messages[0];
    assert.equal(first?.role, "system");
    assert.equal(typeof first?.content, "string");
    assert.notEqual(first?.content, "");
  });

  test("turns SDK retries off and passes the signal through", async () => {
    const { client, calls } = recordingClient("[]");
    const controller = new AbortController();

    await generator(client).generate("x", { signal: controller.signal });

    assert.equal(calls[0]?.options.maxRetries, 0);
    assert.equal(calls[0]?.options.signal, controller.signal);
  });
});

// ============================================================
// Replies
// ============================================================

describe("OpenAITextGenerator reply", () => {
  test("returns the message content unchanged", async () => {
    const { client } = recordingClient('  [{"topic": "x"}]\n');
    assert.equal(await generator(client).generate("x"), '  [{"topic": "x"}]\n');
  });

  test("null content is an empty completion", async () => {
    const { client } = recordingClient(null);
    await assert.rejects(
      generator(client).generate("x"),
      (err: unknown) => err instanceof EmptyCompletionError && err.model === "test-model"
    );
  });

  test("blank content is an empty completion", async () => {
    const { client } = recordingClient("  \n ");
    await assert.rejects(generator(client).generate("x"), EmptyCompletionError);
  });

  test("a reply without choices is an empty completion", async () => {
    const client: ChatCompletionClient = {
      chat: { completions: { create: () => Promise.resolve({ choices: [] }) } },
    };
    await assert.rejects(generator(client).generate("x"), EmptyCompletionError);
  });

  test("client errors propagate", async () => {
    const client: ChatCompletionClient = {
      chat: { completions: { create: () => Promise.reject(new Error("401 Unauthorized")) } },
    };
    await assert.rejects(generator(client).generate("x"), /401 Unauthorized/);
  });
});
