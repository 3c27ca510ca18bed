/**
 * Example: streaming a chat completion through the gateway.
 *
 * Reads GATEWAY_TOKEN and GATEWAY_BASE_URL from the environment, asks one
 * question, and prints the answer as it arrives. Pass a model id as the
 * first argument to try another provider (e.g. `claude-2.1`).
 *
 * Usage:
 *   npx tsx examples/stream-chat.ts [model]
 */

import {
  ChatModel,
  GatewayClient,
  createSystemMessage,
  createUserMessage,
  getModelInfo,
} from "@chatgate/gateway-client";

async function main(): Promise<void> {
  const model = process.argv[2] ?? ChatModel.GPT_3_5_TURBO;
  const info = getModelInfo(model);
  console.log(`=== ${info?.displayName ?? model} (${info?.dialect ?? "unknown dialect"}) ===\n`);

  const client = GatewayClient.fromEnv();

  await client.streamChat(
    {
      model,
      stream: true,
      messages: [
        createSystemMessage("Answer in one short paragraph."),
        createUserMessage("Why is the sky blue?"),
      ],
    },
    (text, isFinal) => {
      process.stdout.write(isFinal ? "\n" : text);
    },
    { timeout: 60_000 },
  );
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
