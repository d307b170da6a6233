import { describe, it, expect } from "vitest";
import { StreamReassembler, reassembleStream } from "../src/normalize/stream.js";
import { parseResponse } from "../src/normalize/response.js";
import {
  AbortError,
  StreamStateError,
  type TransportChunk,
} from "../src/types/index.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function* chunkStream(chunks: TransportChunk[]): AsyncIterableIterator<TransportChunk> {
  for (const chunk of chunks) {
    yield chunk;
  }
}

function contentChunk(content: string, finishReason: string | null = null): TransportChunk {
  return { choices: [{ index: 0, delta: { content }, finish_reason: finishReason }] };
}

function toolChunk(
  index: number,
  fragment: { id?: string; name?: string; arguments?: string },
): TransportChunk {
  return {
    choices: [
      {
        index: 0,
        delta: {
          tool_calls: [
            {
              index,
              id: fragment.id,
              type: fragment.id ? "function" : undefined,
              function: { name: fragment.name, arguments: fragment.arguments },
            },
          ],
        },
      },
    ],
  };
}

function finishChunk(finishReason: string): TransportChunk {
  return { choices: [{ index: 0, delta: {}, finish_reason: finishReason }] };
}

// ===========================================================================
// StreamReassembler
// ===========================================================================

describe("StreamReassembler", () => {
  it("concatenates content fragments in arrival order", () => {
    const reassembler = new StreamReassembler();
    reassembler.push(contentChunk("Hello "));
    reassembler.push(contentChunk("world"));
    reassembler.push(contentChunk("!", "stop"));

    expect(reassembler.text).toBe("Hello world!");
    expect(reassembler.finish()).toEqual({
      content: "Hello world!",
      tool_calls: [],
      finish_reason: "stop",
      usage: {},
      reasoning_content: null,
    });
  });

  it("merges split argument text for the same index", () => {
    const reassembler = new StreamReassembler();
    reassembler.push(toolChunk(0, { id: "call_1", name: "set", arguments: '{"a":' }));
    reassembler.push(toolChunk(0, { arguments: "1}" }));

    const response = reassembler.finish();
    expect(response.tool_calls).toEqual([{ id: "call_1", name: "set", arguments: { a: 1 } }]);
  });

  it("fills in an id or name that arrives after the first fragment", () => {
    const reassembler = new StreamReassembler();
    reassembler.push(toolChunk(0, { arguments: '{"q":' }));
    reassembler.push(toolChunk(0, { id: "call_late", name: "search", arguments: '"x"}' }));

    expect(reassembler.finish().tool_calls).toEqual([
      { id: "call_late", name: "search", arguments: { q: "x" } },
    ]);
  });

  it("keeps the earlier id when a later fragment has an empty one", () => {
    const reassembler = new StreamReassembler();
    reassembler.push(toolChunk(0, { id: "call_1", name: "search", arguments: "{}" }));
    reassembler.push(toolChunk(0, { id: "", name: "" }));

    expect(reassembler.finish().tool_calls).toEqual([
      { id: "call_1", name: "search", arguments: {} },
    ]);
  });

  it("orders tool calls by index, not by first arrival", () => {
    const reassembler = new StreamReassembler();
    reassembler.push(toolChunk(1, { id: "call_b", name: "second", arguments: '{"n":2}' }));
    reassembler.push(toolChunk(0, { id: "call_a", name: "first", arguments: '{"n":1}' }));
    reassembler.push(finishChunk("tool_calls"));

    expect(reassembler.pendingToolCalls).toBe(2);
    const response = reassembler.finish();
    expect(response.tool_calls.map((tc) => tc.name)).toEqual(["first", "second"]);
    expect(response.finish_reason).toBe("tool_calls");
  });

  it("interleaves fragments of several tool calls", () => {
    const reassembler = new StreamReassembler();
    reassembler.push(toolChunk(0, { id: "call_a", name: "alpha", arguments: '{"x"' }));
    reassembler.push(toolChunk(1, { id: "call_b", name: "beta", arguments: '{"y"' }));
    reassembler.push(toolChunk(0, { arguments: ":1}" }));
    reassembler.push(toolChunk(1, { arguments: ":2}" }));

    expect(reassembler.finish().tool_calls).toEqual([
      { id: "call_a", name: "alpha", arguments: { x: 1 } },
      { id: "call_b", name: "beta", arguments: { y: 2 } },
    ]);
  });

  it("wraps argument text that never became valid JSON", () => {
    const reassembler = new StreamReassembler();
    reassembler.push(toolChunk(0, { id: "call_1", name: "run", arguments: '{"cmd":' }));

    expect(reassembler.finish().tool_calls).toEqual([
      { id: "call_1", name: "run", arguments: { raw: '{"cmd":' } },
    ]);
  });

  it("gives a tool call without argument fragments empty arguments", () => {
    const reassembler = new StreamReassembler();
    reassembler.push(toolChunk(0, { id: "call_1", name: "ping" }));

    expect(reassembler.finish().tool_calls).toEqual([
      { id: "call_1", name: "ping", arguments: {} },
    ]);
  });

  it("reads a missing tool-call index as 0", () => {
    const reassembler = new StreamReassembler();
    reassembler.push({
      choices: [
        { delta: { tool_calls: [{ id: "call_1", function: { name: "f", arguments: "{" } }] } },
      ],
    });
    reassembler.push({
      choices: [{ delta: { tool_calls: [{ function: { arguments: "}" } }] } }],
    });

    expect(reassembler.finish().tool_calls).toEqual([{ id: "call_1", name: "f", arguments: {} }]);
  });

  it("keeps the last finish reason reported", () => {
    const reassembler = new StreamReassembler();
    reassembler.push(contentChunk("a", "length"));
    reassembler.push(contentChunk("b"));
    reassembler.push(finishChunk("stop"));

    expect(reassembler.finish().finish_reason).toBe("stop");
  });

  it("defaults the finish reason to stop", () => {
    const reassembler = new StreamReassembler();
    reassembler.push(contentChunk("a"));

    expect(reassembler.finish().finish_reason).toBe("stop");
  });

  it("captures usage from a usage-only trailing chunk", () => {
    const reassembler = new StreamReassembler();
    reassembler.push(contentChunk("done", "stop"));
    reassembler.push({
      choices: [],
      usage: { prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 },
    });

    expect(reassembler.finish().usage).toEqual({
      prompt_tokens: 12,
      completion_tokens: 3,
      total_tokens: 15,
    });
  });

  it("keeps the last usage reported", () => {
    const reassembler = new StreamReassembler();
    reassembler.push({ ...contentChunk("a"), usage: { prompt_tokens: 1, completion_tokens: 1, total_tokens: 2 } });
    reassembler.push({ ...contentChunk("b"), usage: { prompt_tokens: 1, completion_tokens: 2, total_tokens: 3 } });

    expect(reassembler.finish().usage).toEqual({
      prompt_tokens: 1,
      completion_tokens: 2,
      total_tokens: 3,
    });
  });

  it("strips think blocks split across fragments", () => {
    const reassembler = new StreamReassembler();
    reassembler.push(contentChunk("<thi"));
    reassembler.push(contentChunk("nk>plan</think>"));
    reassembler.push(contentChunk("Answer"));

    expect(reassembler.text).toBe("<think>plan</think>Answer");
    expect(reassembler.finish().content).toBe("Answer");
  });

  it("returns null content for a stream with no content", () => {
    const reassembler = new StreamReassembler();
    reassembler.push(finishChunk("stop"));

    expect(reassembler.finish().content).toBeNull();
  });

  it("accumulates reasoning fragments without stripping them", () => {
    const reassembler = new StreamReassembler();
    reassembler.push({ choices: [{ delta: { reasoning_content: "Let me " } }] });
    reassembler.push({ choices: [{ delta: { reasoning_content: "think..." } }] });
    reassembler.push(contentChunk("42", "stop"));

    const response = reassembler.finish();
    expect(response.reasoning_content).toBe("Let me think...");
    expect(response.content).toBe("42");
  });

  it("rejects chunks after finish()", () => {
    const reassembler = new StreamReassembler();
    reassembler.finish();

    expect(() => reassembler.push(contentChunk("late"))).toThrow(StreamStateError);
    expect(() => reassembler.finish()).toThrow("Stream was already finalized");
  });
});

// ===========================================================================
// reassembleStream
// ===========================================================================

describe("reassembleStream", () => {
  it("consumes an async chunk sequence", async () => {
    const response = await reassembleStream(
      chunkStream([contentChunk("Hi"), contentChunk(" there", "stop")]),
    );

    expect(response.content).toBe("Hi there");
    expect(response.finish_reason).toBe("stop");
  });

  it("matches the non-streaming parse of the same reply", async () => {
    const streamed = await reassembleStream(
      chunkStream([
        contentChunk("<think>hmm</think>Checking "),
        contentChunk("the weather."),
        toolChunk(0, { id: "call_1", name: "get_weather", arguments: '{"city":' }),
        toolChunk(0, { arguments: '"Paris"}' }),
        finishChunk("tool_calls"),
      ]),
    );

    const parsed = parseResponse({
      choices: [
        {
          message: {
            content: "<think>hmm</think>Checking the weather.",
            tool_calls: [
              {
                id: "call_1",
                type: "function",
                function: { name: "get_weather", arguments: '{"city":"Paris"}' },
              },
            ],
          },
          finish_reason: "tool_calls",
        },
      ],
    });

    expect(streamed.content).toBe("Checking the weather.");
    expect(streamed.content).toEqual(parsed.content);
    expect(streamed.tool_calls).toEqual(parsed.tool_calls);
    expect(streamed.finish_reason).toEqual(parsed.finish_reason);
  });

  it("reports empty reasoning as null on both paths", async () => {
    const streamed = await reassembleStream(
      chunkStream([{ choices: [{ delta: { content: "42", reasoning_content: "" }, finish_reason: "stop" }] }]),
    );
    const parsed = parseResponse({
      choices: [{ message: { content: "42", reasoning_content: "" }, finish_reason: "stop" }],
    });

    expect(streamed.reasoning_content).toBeNull();
    expect(parsed.reasoning_content).toBeNull();
  });

  it("returns null content and no tool calls for an empty stream", async () => {
    const response = await reassembleStream(chunkStream([]));

    expect(response).toEqual({
      content: null,
      tool_calls: [],
      finish_reason: "stop",
      usage: {},
      reasoning_content: null,
    });
  });

  it("rejects with AbortError when the signal fires mid-stream", async () => {
    const controller = new AbortController();
    let closed = false;

    async function* cancellable(): AsyncIterableIterator<TransportChunk> {
      try {
        yield contentChunk("partial ");
        controller.abort();
        yield contentChunk("never used");
        yield contentChunk("unreachable");
      } finally {
        closed = true;
      }
    }

    await expect(reassembleStream(cancellable(), controller.signal)).rejects.toThrow(AbortError);
    expect(closed).toBe(true);
  });
});
