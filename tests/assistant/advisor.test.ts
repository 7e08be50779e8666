import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import type { PromptResult } from "../../src/acp/client.js";

interface FakeAcpClient {
  connected: boolean;
  connect: Mock<() => Promise<void>>;
  createSession: Mock<(cwd: string) => Promise<string>>;
  sendPrompt: Mock<(sessionId: string, prompt: string, timeoutMs?: number) => Promise<PromptResult>>;
  endSession: Mock<(sessionId: string) => void>;
  disconnect: Mock<() => Promise<void>>;
}

const mocks = vi.hoisted(() => ({
  instances: [] as FakeAcpClient[],
  sessionCounter: 0,
}));

vi.mock("../../src/acp/client.js", () => ({
  AcpClient: vi.fn().mockImplementation(() => {
    const instance: FakeAcpClient = {
      connected: false,
      connect: vi.fn(async () => {
        instance.connected = true;
      }),
      createSession: vi.fn(async (_cwd: string) => `acp-${++mocks.sessionCounter}`),
      sendPrompt: vi.fn(async (_sessionId: string, _prompt: string, _timeoutMs?: number) => ({
        response: "  Keep WIP low.\n",
        stopReason: "end_turn",
      })),
      endSession: vi.fn((_sessionId: string) => {}),
      disconnect: vi.fn(async () => {
        instance.connected = false;
      }),
    };
    mocks.instances.push(instance);
    return instance;
  }),
}));

import { CopilotAdvisor, SYSTEM_PROMPT } from "../../src/assistant/advisor.js";

function makeAdvisor(): CopilotAdvisor {
  return new CopilotAdvisor({
    client: { command: "copilot", permissions: { autoApprove: false, allowPatterns: [] } },
    cwd: "/tmp/team",
    timeoutMs: 5_000,
  });
}

describe("CopilotAdvisor", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mocks.instances.length = 0;
    mocks.sessionCounter = 0;
  });

  it("connects lazily and primes a new session with the system prompt", async () => {
    const advisor = makeAdvisor();
    expect(mocks.instances).toHaveLength(0);

    const answer = await advisor.ask("chat-1", "What should we focus on?");

    expect(answer).toBe("Keep WIP low.");
    const client = mocks.instances[0];
    expect(client?.connect).toHaveBeenCalledTimes(1);
    expect(client?.createSession).toHaveBeenCalledWith("/tmp/team");
    expect(client?.sendPrompt.mock.calls).toEqual([
      ["acp-1", SYSTEM_PROMPT, 5_000],
      ["acp-1", "What should we focus on?", 5_000],
    ]);
  });

  it("reuses the ACP session of a conversation", async () => {
    const advisor = makeAdvisor();
    await advisor.ask("chat-1", "one");
    await advisor.ask("chat-1", "two");
    await advisor.ask("chat-2", "three");

    const client = mocks.instances[0];
    expect(mocks.instances).toHaveLength(1);
    expect(client?.createSession).toHaveBeenCalledTimes(2);
    expect(client?.sendPrompt.mock.calls.map((c) => c[0])).toEqual(["acp-1", "acp-1", "acp-1", "acp-2", "acp-2"]);
  });

  it("shares one connection attempt between concurrent callers", async () => {
    const advisor = makeAdvisor();
    await Promise.all([advisor.ask("a", "x"), advisor.ask("b", "y")]);
    expect(mocks.instances).toHaveLength(1);
  });

  it("starts a fresh session after forget", async () => {
    const advisor = makeAdvisor();
    await advisor.ask("chat-1", "one");
    advisor.forget("chat-1");
    await advisor.ask("chat-1", "two");

    const client = mocks.instances[0];
    expect(client?.endSession).toHaveBeenCalledWith("acp-1");
    expect(client?.createSession).toHaveBeenCalledTimes(2);
  });

  it("ignores forget for unknown conversations", () => {
    expect(() => makeAdvisor().forget("nobody")).not.toThrow();
  });

  it("disconnects on shutdown and reconnects on the next question", async () => {
    const advisor = makeAdvisor();
    await advisor.ask("chat-1", "one");
    await advisor.shutdown();

    expect(mocks.instances[0]?.disconnect).toHaveBeenCalledTimes(1);

    await advisor.ask("chat-1", "two");
    expect(mocks.instances).toHaveLength(2);
  });
});
