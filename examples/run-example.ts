/**
 * Example: chatting through RegistryProvider.
 *
 * This script demonstrates how to:
 *   1. Plug a completion transport into RegistryProvider
 *   2. Let the registry resolve the routed model name and overrides
 *   3. Read the normalized response, including tool calls
 *
 * The transport here is scripted in memory, so no API keys or network are
 * needed. A real deployment passes a function that forwards the request to
 * a multiplexing completion library or proxy.
 *
 * Usage:
 *   npm run example
 */

import {
  MemoryEnvStore,
  RegistryProvider,
  createSystemMessage,
  createToolResultMessage,
  createUserMessage,
  type ChatMessage,
  type CompletionRequest,
  type CompletionTransport,
  type TransportChunk,
} from "@modelgate/llm-provider";

// ---------------------------------------------------------------------------
// Scripted transport
// ---------------------------------------------------------------------------

async function* streamReply(request: CompletionRequest): AsyncIterableIterator<TransportChunk> {
  yield { choices: [{ delta: { content: `<think>routing ${request.model}</think>` } }] };
  yield { choices: [{ delta: { content: "Checking the weather." } }] };
  yield {
    choices: [
      {
        delta: {
          tool_calls: [
            { index: 0, id: "call_1", function: { name: "get_weather", arguments: '{"city":' } },
          ],
        },
      },
    ],
  };
  yield { choices: [{ delta: { tool_calls: [{ index: 0, function: { arguments: '"Oslo"}' } }] } }] };
  yield { choices: [{ delta: {}, finish_reason: "tool_calls" }] };
  yield { choices: [], usage: { prompt_tokens: 12, completion_tokens: 9, total_tokens: 21 } };
}

const transport: CompletionTransport = async (request) => {
  console.log(`[TRANSPORT] model=${request.model} stream=${request.stream} temperature=${request.temperature}`);
  if (request.stream) {
    return streamReply(request);
  }
  return {
    choices: [
      {
        message: { role: "assistant", content: `Hello from ${request.model}` },
        finish_reason: "stop",
      },
    ],
    usage: { prompt_tokens: 5, completion_tokens: 4, total_tokens: 9 },
  };
};

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  console.log("=== RegistryProvider Example ===\n");

  const env = new MemoryEnvStore();
  const direct = new RegistryProvider({
    transport,
    env,
    apiKey: "test-key",
    defaultModel: "kimi-k2.5",
  });
  console.log(`Published credentials: ${JSON.stringify(env.snapshot())}`);

  const plain = await direct.chat({
    messages: [createUserMessage("Say hello")],
    temperature: 0.2,
  });
  console.log(`Content: ${plain.content}`);
  console.log(`Usage: ${JSON.stringify(plain.usage)}\n`);

  // A base URL containing "openwebui" selects the always-streaming local
  // deployment, so the request streams and chunks are reassembled.
  const local = new RegistryProvider({
    transport,
    env,
    apiBase: "http://openwebui.example.internal/api",
    defaultModel: "llama3",
  });
  console.log(`Detected gateway: ${local.gatewayName}`);

  const conversation: ChatMessage[] = [
    createSystemMessage("Answer briefly."),
    createUserMessage("What's the weather in Oslo?"),
  ];
  const streamed = await local.chat({
    messages: conversation,
    tools: [
      {
        type: "function",
        function: {
          name: "get_weather",
          parameters: { type: "object", properties: { city: { type: "string" } } },
        },
      },
    ],
  });
  console.log(`Content: ${streamed.content}`);
  console.log(`Finish reason: ${streamed.finish_reason}`);
  for (const call of streamed.tool_calls) {
    console.log(`  [TOOL] ${call.name}(${JSON.stringify(call.arguments)}) id=${call.id}`);
    conversation.push(createToolResultMessage(call.id, call.name, "4°C, cloudy"));
  }
  console.log(`Conversation now has ${conversation.length} messages`);
}

main().catch((error: unknown) => {
  console.error("Example failed:", error);
  process.exitCode = 1;
});
