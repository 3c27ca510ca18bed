import { describe, it, expect, vi, afterEach } from "vitest";
import { GatewayClient, type ClientConfig } from "../src/client.js";
import {
  getDefaultClient,
  resetDefaultClient,
  setDefaultClient,
} from "../src/index.js";
import {
  APIError,
  AbortError,
  ConfigurationError,
  DecodeError,
  Image,
  ProtocolMismatchError,
  RequestTimeoutError,
  createSystemMessage,
  createUserMessage,
  type ChatRequest,
} from "../src/types/index.js";
import type { HttpRequest, HttpResponse } from "../src/utils/http.js";
import { FakeTransport, collect, streamResponse, textResponse, trackedStream } from "./helpers.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const BASE_URL = "https://gateway.test";
const EVENT_STREAM = { "Content-Type": "text/event-stream" };

function makeClient(
  handler: (request: HttpRequest) => HttpResponse,
  config: Partial<ClientConfig> = {},
): { client: GatewayClient; transport: FakeTransport } {
  const transport = new FakeTransport(handler);
  const client = new GatewayClient({ token: "test-secret", baseUrl: BASE_URL, transport, ...config });
  return { client, transport };
}

function jsonBody(request: HttpRequest): unknown {
  return JSON.parse(request.body ?? "");
}

const OPENAI_RESPONSE = JSON.stringify({
  id: "chatcmpl-1",
  object: "chat.completion",
  created: 1700000000,
  model: "gpt-4",
  choices: [{ index: 0, message: { role: "assistant", content: "Hi!" }, finish_reason: "stop" }],
});

const CLAUDE_RESPONSE = JSON.stringify({
  type: "completion",
  id: "compl_1",
  model: "claude-2.1",
  completion: " Hello.",
  stop_reason: "stop_sequence",
});

function chatRequest(model: string, stream?: boolean): ChatRequest {
  return {
    model,
    messages: [createSystemMessage("Be brief."), createUserMessage("Hi")],
    ...(stream === undefined ? {} : { stream }),
  };
}

// ===========================================================================
// Configuration
// ===========================================================================

describe("GatewayClient configuration", () => {
  it("requires a token", () => {
    expect(() => new GatewayClient({ token: "", baseUrl: BASE_URL })).toThrow(ConfigurationError);
  });

  it("requires a base URL", () => {
    expect(() => new GatewayClient({ token: "test-secret", baseUrl: "" })).toThrow(
      "A gateway base URL is required",
    );
  });

  it("rejects an invalid base URL", () => {
    expect(() => new GatewayClient({ token: "test-secret", baseUrl: "not a url" })).toThrow(
      'Invalid gateway base URL "not a url"',
    );
  });

  it("strips a trailing slash from the base URL", async () => {
    const { client, transport } = makeClient(() => textResponse(200, OPENAI_RESPONSE).response, {
      baseUrl: "https://gateway.test/",
    });

    await client.chat(chatRequest("gpt-4"));

    expect(transport.lastRequest.url).toBe("https://gateway.test/1/chat");
  });

  it("sends the fixed headers on every request", async () => {
    const { client, transport } = makeClient(() => textResponse(200, OPENAI_RESPONSE).response);

    await client.chat(chatRequest("gpt-4"));

    expect(transport.lastRequest.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
      "User-Agent": "gateway-client/0.1.0",
      Accept: "*/*",
    });
  });

  it("uses a custom user agent", async () => {
    const { client, transport } = makeClient(() => textResponse(200, OPENAI_RESPONSE).response, {
      userAgent: "my-app/2.0",
    });

    await client.chat(chatRequest("gpt-4"));

    expect(transport.lastRequest.headers["User-Agent"]).toBe("my-app/2.0");
  });
});

describe("GatewayClient.fromEnv", () => {
  it("reads the token and base URL", () => {
    const client = GatewayClient.fromEnv({
      GATEWAY_TOKEN: "test-secret",
      GATEWAY_BASE_URL: BASE_URL,
      GATEWAY_TIMEOUT_MS: "5000",
    });
    expect(client).toBeInstanceOf(GatewayClient);
  });

  it("fails without a token", () => {
    expect(() => GatewayClient.fromEnv({ GATEWAY_BASE_URL: BASE_URL })).toThrow(
      "GATEWAY_TOKEN is not set",
    );
  });

  it("fails without a base URL", () => {
    expect(() => GatewayClient.fromEnv({ GATEWAY_TOKEN: "test-secret" })).toThrow(
      "GATEWAY_BASE_URL is not set",
    );
  });

  it("rejects a timeout that is not a positive integer", () => {
    expect(() =>
      GatewayClient.fromEnv({
        GATEWAY_TOKEN: "test-secret",
        GATEWAY_BASE_URL: BASE_URL,
        GATEWAY_TIMEOUT_MS: "soon",
      }),
    ).toThrow('GATEWAY_TIMEOUT_MS must be a positive integer, got "soon"');
  });
});

describe("default client", () => {
  afterEach(() => {
    resetDefaultClient();
    vi.unstubAllEnvs();
  });

  it("returns the client that was set", () => {
    const { client } = makeClient(() => textResponse(200, "{}").response);
    setDefaultClient(client);
    expect(getDefaultClient()).toBe(client);
  });

  it("creates and caches a client from the environment", () => {
    vi.stubEnv("GATEWAY_TOKEN", "test-secret");
    vi.stubEnv("GATEWAY_BASE_URL", BASE_URL);

    const first = getDefaultClient();

    expect(first).toBeInstanceOf(GatewayClient);
    expect(getDefaultClient()).toBe(first);
  });
});

// ===========================================================================
// chat
// ===========================================================================

describe("GatewayClient.chat", () => {
  it("sends OpenAI-compatible models to the chat path", async () => {
    const { client, transport } = makeClient(() => textResponse(200, OPENAI_RESPONSE).response);

    const response = await client.chat({ ...chatRequest("gpt-4"), temperature: 0.2 });

    expect(transport.lastRequest.method).toBe("POST");
    expect(transport.lastRequest.url).toBe(`${BASE_URL}/1/chat`);
    expect(jsonBody(transport.lastRequest)).toEqual({
      model: "gpt-4",
      temperature: 0.2,
      messages: [
        { role: "system", content: "Be brief." },
        { role: "user", content: "Hi" },
      ],
    });
    expect(response.choices[0]?.message.content).toBe("Hi!");
    expect(response.id).toBe("chatcmpl-1");
  });

  it("sends claude models to the completion path", async () => {
    const { client, transport } = makeClient(() => textResponse(200, CLAUDE_RESPONSE).response);

    const response = await client.chat({ ...chatRequest("claude-2.1"), maxTokens: 100 });

    expect(transport.lastRequest.url).toBe(`${BASE_URL}/v1/complete`);
    expect(jsonBody(transport.lastRequest)).toEqual({
      model: "claude-2.1",
      stream: false,
      prompt: "\n\nHuman: Be brief.\n\nHuman: Hi\n\nAssistant:",
      max_tokens_to_sample: 100,
    });
    expect(response).toEqual({
      id: "compl_1",
      object: "chat.completion",
      created: 0,
      model: "claude-2.1",
      choices: [
        {
          index: 0,
          message: { role: "assistant", content: " Hello." },
          finish_reason: "stop_sequence",
        },
      ],
    });
  });

  it("refuses a streaming request without sending it", async () => {
    const { client, transport } = makeClient(() => textResponse(200, OPENAI_RESPONSE).response);

    await expect(client.chat(chatRequest("gpt-4", true))).rejects.toBeInstanceOf(
      ProtocolMismatchError,
    );
    expect(transport.requests).toHaveLength(0);
  });

  it("raises APIError with the status and raw body", async () => {
    const { client } = makeClient(() => textResponse(500, "upstream down").response);

    const error = await client.chat(chatRequest("gpt-4")).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(APIError);
    expect(error).toMatchObject({ status_code: 500, body: "upstream down" });
  });

  it("treats any status other than 200 as an error", async () => {
    const { client } = makeClient(() => textResponse(201, OPENAI_RESPONSE).response);

    await expect(client.chat(chatRequest("gpt-4"))).rejects.toBeInstanceOf(APIError);
  });

  it("raises DecodeError on a malformed body", async () => {
    const { client } = makeClient(() => textResponse(200, "<html>").response);

    await expect(client.chat(chatRequest("gpt-4"))).rejects.toBeInstanceOf(DecodeError);
  });

  it("propagates transport failures unchanged", async () => {
    const failure = new TypeError("fetch failed");
    const { client } = makeClient(() => {
      throw failure;
    });

    await expect(client.chat(chatRequest("gpt-4"))).rejects.toBe(failure);
  });

  it("does not send when the signal is already aborted", async () => {
    const { client, transport } = makeClient(() => textResponse(200, OPENAI_RESPONSE).response);
    const controller = new AbortController();
    controller.abort();

    await expect(
      client.chat(chatRequest("gpt-4"), { signal: controller.signal }),
    ).rejects.toBeInstanceOf(AbortError);
    expect(transport.requests).toHaveLength(0);
  });

  it("times out a body that never arrives and releases it", async () => {
    const { stream, cancel } = trackedStream([], { hang: true });
    const { client } = makeClient(() => streamResponse(200, stream));

    await expect(client.chat(chatRequest("gpt-4"), { timeout: 20 })).rejects.toBeInstanceOf(
      RequestTimeoutError,
    );
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it("times out a stalled image before anything is sent", async () => {
    const { stream: imageSource, cancel } = trackedStream([], { hang: true });
    const { client, transport } = makeClient(() => textResponse(200, OPENAI_RESPONSE).response);

    await expect(
      client.chat(
        {
          model: "gpt-4-vision-preview",
          messages: [createUserMessage("What is this?", [new Image(imageSource)])],
        },
        { timeout: 50 },
      ),
    ).rejects.toBeInstanceOf(RequestTimeoutError);
    expect(transport.requests).toHaveLength(0);
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it("stops encoding a stalled image when a stream is aborted", async () => {
    const { stream: imageSource, cancel } = trackedStream([], { hang: true });
    const { client, transport } = makeClient(
      () => textResponse(200, "data: [DONE]\n", EVENT_STREAM).response,
    );
    const controller = new AbortController();

    const pending = collect(
      client.stream(
        {
          model: "gpt-4-vision-preview",
          stream: true,
          messages: [createUserMessage("What is this?", [new Image(imageSource)])],
        },
        { signal: controller.signal },
      ),
    );
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(AbortError);
    expect(transport.requests).toHaveLength(0);
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it("applies the configured default timeout", async () => {
    const { stream } = trackedStream([], { hang: true });
    const { client } = makeClient(() => streamResponse(200, stream), { timeout: 20 });

    await expect(client.chat(chatRequest("gpt-4"))).rejects.toBeInstanceOf(RequestTimeoutError);
  });
});

// ===========================================================================
// stream / streamChat
// ===========================================================================

describe("GatewayClient.streamChat", () => {
  const SSE_BODY = 'data: {"delta":"He"}\n\ndata: {"delta":"llo"}\n\ndata: [DONE]\n\n';

  it("delivers deltas and then one final call", async () => {
    const { client, transport } = makeClient(
      () => textResponse(200, SSE_BODY, EVENT_STREAM).response,
    );
    const calls: Array<[string, boolean]> = [];

    await client.streamChat(chatRequest("gpt-4", true), (text, isFinal) => {
      calls.push([text, isFinal]);
    });

    expect(calls).toEqual([
      ["He", false],
      ["llo", false],
      ["", true],
    ]);
    expect(transport.lastRequest.url).toBe(`${BASE_URL}/1/chat`);
    expect(jsonBody(transport.lastRequest)).toMatchObject({ model: "gpt-4", stream: true });
  });

  it("streams claude models from the completion path", async () => {
    const body =
      'event: completion\ndata: {"type":"completion","completion":" Hi","model":"claude-2.1"}\n\n' +
      'event: ping\ndata: {"type":"ping"}\n\n';
    const { client, transport } = makeClient(() => textResponse(200, body, EVENT_STREAM).response);

    const deltas = await collect(client.stream(chatRequest("claude-2.1", true)));

    expect(deltas).toEqual([
      { text: " Hi", isFinal: false, model: "claude-2.1" },
      { text: "", isFinal: true },
    ]);
    expect(transport.lastRequest.url).toBe(`${BASE_URL}/v1/complete`);
    expect(jsonBody(transport.lastRequest)).toMatchObject({ stream: true });
  });

  it("accepts an event-stream content type with parameters", async () => {
    const { client } = makeClient(
      () =>
        textResponse(200, SSE_BODY, { "Content-Type": "text/event-stream; charset=utf-8" })
          .response,
    );

    const deltas = await collect(client.stream(chatRequest("gpt-4", true)));

    expect(deltas.map((d) => d.text)).toEqual(["He", "llo", ""]);
  });

  it("refuses a non-streaming request without sending it", async () => {
    const { client, transport } = makeClient(() => textResponse(200, SSE_BODY, EVENT_STREAM).response);
    const onDelta = vi.fn();

    await expect(client.streamChat(chatRequest("gpt-4"), onDelta)).rejects.toBeInstanceOf(
      ProtocolMismatchError,
    );
    await expect(
      collect(client.stream(chatRequest("gpt-4", false))),
    ).rejects.toBeInstanceOf(ProtocolMismatchError);
    expect(onDelta).not.toHaveBeenCalled();
    expect(transport.requests).toHaveLength(0);
  });

  it("raises APIError for a non-200 status", async () => {
    const { client } = makeClient(() => textResponse(401, "bad token", EVENT_STREAM).response);
    const onDelta = vi.fn();

    const error = await client
      .streamChat(chatRequest("gpt-4", true), onDelta)
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(APIError);
    expect(error).toMatchObject({ status_code: 401, body: "bad token" });
    expect(onDelta).not.toHaveBeenCalled();
  });

  it("raises APIError when a 200 response is not an event stream", async () => {
    const { client } = makeClient(() => textResponse(200, '{"error":"quota"}').response);
    const onDelta = vi.fn();

    const error = await client
      .streamChat(chatRequest("gpt-4", true), onDelta)
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(APIError);
    expect(error).toMatchObject({ status_code: 200, body: '{"error":"quota"}' });
    expect(onDelta).not.toHaveBeenCalled();
  });

  it("stops at a malformed record without a final call", async () => {
    const body = 'data: {"delta":"a"}\ndata: {oops\ndata: {"delta":"b"}\n';
    const { client } = makeClient(() => textResponse(200, body, EVENT_STREAM).response);
    const calls: Array<[string, boolean]> = [];

    await expect(
      client.streamChat(chatRequest("gpt-4", true), (text, isFinal) => {
        calls.push([text, isFinal]);
      }),
    ).rejects.toBeInstanceOf(DecodeError);
    expect(calls).toEqual([["a", false]]);
  });

  it("ends with a final call when the body closes without [DONE]", async () => {
    const { client } = makeClient(
      () => textResponse(200, 'data: {"delta":"x"}', EVENT_STREAM).response,
    );
    const calls: Array<[string, boolean]> = [];

    await client.streamChat(chatRequest("gpt-4", true), (text, isFinal) => {
      calls.push([text, isFinal]);
    });

    expect(calls).toEqual([
      ["x", false],
      ["", true],
    ]);
  });

  it("aborts mid-stream, releases the body once and skips the final call", async () => {
    const { stream, cancel } = trackedStream(['data: {"delta":"He"}\n'], { hang: true });
    const { client } = makeClient(() => streamResponse(200, stream, EVENT_STREAM));
    const controller = new AbortController();
    const calls: Array<[string, boolean]> = [];

    await expect(
      client.streamChat(
        chatRequest("gpt-4", true),
        (text, isFinal) => {
          calls.push([text, isFinal]);
          controller.abort();
        },
        { signal: controller.signal },
      ),
    ).rejects.toBeInstanceOf(AbortError);

    expect(calls).toEqual([["He", false]]);
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it("releases the body once when the consumer stops early", async () => {
    const { stream, cancel } = trackedStream(['data: {"delta":"a"}\n'], { hang: true });
    const { client } = makeClient(() => streamResponse(200, stream, EVENT_STREAM));

    for await (const delta of client.stream(chatRequest("gpt-4", true))) {
      expect(delta.text).toBe("a");
      break;
    }

    expect(cancel).toHaveBeenCalledTimes(1);
    expect(stream.locked).toBe(false);
  });
});

// ===========================================================================
// Images
// ===========================================================================

describe("GatewayClient.generateImage", () => {
  it("posts the request and decodes the images", async () => {
    const { client, transport } = makeClient(
      () => textResponse(200, '{"image_data":["aGVsbG8=","YWJj"]}').response,
    );

    const images = await client.generateImage({
      width: 512,
      height: 512,
      num: 2,
      model: "dall-e-3",
      prompt: "a lighthouse",
      dallE: { quality: "standard", style: "vivid" },
    });

    expect(transport.lastRequest.url).toBe(`${BASE_URL}/1/images/generations`);
    expect(jsonBody(transport.lastRequest)).toEqual({
      width: 512,
      height: 512,
      num: 2,
      model: "dall-e-3",
      prompt: "a lighthouse",
      dallE: { quality: "standard", style: "vivid" },
    });
    const decoder = new TextDecoder();
    expect(images.map((bytes) => decoder.decode(bytes))).toEqual(["hello", "abc"]);
  });

  it("returns an empty list when the response has no images", async () => {
    const { client } = makeClient(() => textResponse(200, "{}").response);

    expect(
      await client.generateImage({ width: 1, height: 1, num: 0, model: "dall-e-2", prompt: "" }),
    ).toEqual([]);
  });

  it("rejects an entry that is not base64", async () => {
    const { client } = makeClient(() => textResponse(200, '{"image_data":["%%%"]}').response);

    await expect(
      client.generateImage({ width: 1, height: 1, num: 1, model: "dall-e-2", prompt: "x" }),
    ).rejects.toThrow("image_data[0] is not valid base64");
  });
});

// ===========================================================================
// Speech
// ===========================================================================

describe("GatewayClient.synthesizeSpeech", () => {
  const AUDIO = "ID3-fake-audio";

  it("posts JSON and returns the raw audio", async () => {
    const { client, transport } = makeClient(
      () => textResponse(200, AUDIO, { "Content-Type": "audio/mpeg" }).response,
    );

    const audio = await client.synthesizeSpeech({ input: "Hello", voice: "alloy", model: "tts-1" });

    expect(new TextDecoder().decode(audio)).toBe(AUDIO);
    expect(transport.lastRequest.url).toBe(`${BASE_URL}/v1/audio/speech`);
    expect(transport.lastRequest.headers["Content-Type"]).toBe("application/json");
    expect(jsonBody(transport.lastRequest)).toEqual({
      input: "Hello",
      voice: "alloy",
      model: "tts-1",
    });
  });

  it("sends SSML to the Azure route for the azure sentinel", async () => {
    const { client, transport } = makeClient(() => textResponse(200, AUDIO).response);

    await client.synthesizeSpeech({
      input: "Fish & chips",
      voice: "en-US-JennyNeural",
      model: "__azure",
    });

    const request = transport.lastRequest;
    expect(request.url).toBe(`${BASE_URL}/cognitiveservices/v1`);
    expect(request.headers).toEqual({
      "Content-Type": "application/ssml+xml",
      Authorization: "Bearer test-secret",
      "User-Agent": "gateway-client/0.1.0",
      Accept: "*/*",
      "X-Microsoft-OutputFormat": "audio-16khz-128kbitrate-mono-mp3",
      "X-Region": "eastasia",
    });
    expect(request.body).toBe(
      '\n<speak version="1.0" xml:lang="en-US">\n' +
        '<voice xml:lang="en-US" name="en-US-JennyNeural">Fish &amp; chips</voice>\n' +
        "</speak>\n",
    );
  });

  it("uses the configured Azure output format and region", async () => {
    const { client, transport } = makeClient(() => textResponse(200, AUDIO).response, {
      azureSpeech: { outputFormat: "riff-24khz-16bit-mono-pcm", region: "westeurope" },
    });

    await client.synthesizeSpeech({ input: "Hi", voice: "v", model: "__azure" });

    expect(transport.lastRequest.headers["X-Microsoft-OutputFormat"]).toBe(
      "riff-24khz-16bit-mono-pcm",
    );
    expect(transport.lastRequest.headers["X-Region"]).toBe("westeurope");
  });

  it("raises APIError on failure", async () => {
    const { client } = makeClient(() => textResponse(400, "unknown voice").response);

    await expect(
      client.synthesizeSpeech({ input: "Hi", voice: "nobody", model: "tts-1" }),
    ).rejects.toThrow("API returned error: code=400, body=unknown voice");
  });
});

// ===========================================================================
// Usage
// ===========================================================================

describe("GatewayClient.usage", () => {
  it("gets and decodes the usage list", async () => {
    const body = JSON.stringify({
      data: [
        { id: "u1", limit: 1000, product: "chat", usage: { tokens: 250 } },
        { id: "u2", product: "image" },
      ],
    });
    const { client, transport } = makeClient(() => textResponse(200, body).response);

    const usage = await client.usage();

    expect(transport.lastRequest.method).toBe("GET");
    expect(transport.lastRequest.url).toBe(`${BASE_URL}/1.1/me/usage`);
    expect(transport.lastRequest.body).toBeUndefined();
    expect(usage).toEqual([
      { id: "u1", limit: 1000, product: "chat", usage: { tokens: 250 } },
      { id: "u2", limit: 0, product: "image", usage: {} },
    ]);
  });

  it("rejects an entry that is not an object", async () => {
    const { client } = makeClient(() => textResponse(200, '{"data":[1]}').response);

    await expect(client.usage()).rejects.toThrow("data[0] must be an object");
  });
});
